import fs from 'fs';
import os from 'os';
import path from 'path';

import { EXIT_INVALID_ARGS, EXIT_PROVIDER_ERROR, loadEnvironmentFile } from 'crosstalk-core';

import { runCli } from '../index';

import { loadConfig, loadPanelistContext, parseAliasList } from './debate';

interface SentMessage {
  role: string;
  content: string;
}

interface SentBody {
  model: string;
  messages: SentMessage[];
}

const mockCreate = jest.fn<Promise<unknown>, [SentBody]>();

// Every OpenAI-compatible backend goes through this stand-in; nothing leaves the process.
jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    chat: { completions: { create: mockCreate } },
  })),
}));

jest.mock('crosstalk-core', () => ({
  ...jest.requireActual<typeof import('crosstalk-core')>('crosstalk-core'),
  loadEnvironmentFile: jest.fn(),
}));

const mockedLoadEnvironmentFile = jest.mocked(loadEnvironmentFile);

function completion(content: string): unknown {
  return { choices: [{ message: { content } }], usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 } };
}

function answerEverything(body: SentBody): Promise<unknown> {
  const text = body.messages.map((message) => message.content).join('\n');
  if (text.includes('Reference answer:')) {
    return Promise.resolve(completion('ACCURACY: 5\nCOMPLETENESS: 4\nEXPLANATION: Close enough.'));
  }
  return Promise.resolve(completion('Answer'));
}

const GPT_ONLY = ['--panel', 'gpt', '--synthesizer', 'gpt'];

describe('CLI debate command', () => {
  const originalEnv = process.env;
  let tmpDir: string;
  let cwdSpy: jest.SpyInstance;
  let stdoutSpy: jest.SpyInstance;
  let stderrSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  const stdout = (): string => stdoutSpy.mock.calls.map(([chunk]) => String(chunk)).join('');
  const stderr = (): string => stderrSpy.mock.calls.map(([chunk]) => String(chunk)).join('');
  const consoleLines = (): string[] => consoleErrorSpy.mock.calls.map(([line]) => String(line));

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'crosstalk-cli-'));
    process.env = { OPENAI_API_KEY: 'test-secret' };
    cwdSpy = jest.spyOn(process, 'cwd').mockReturnValue(tmpDir);
    stdoutSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderrSpy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    mockCreate.mockImplementation(answerEverything);
  });

  afterEach(() => {
    process.env = originalEnv;
    cwdSpy.mockRestore();
    stdoutSpy.mockRestore();
    stderrSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('prints the synthesis to stdout', async () => {
    await runCli(['debate', 'What is 2+2?', ...GPT_ONLY]);

    expect(stdout()).toBe('Answer\n');
    // initial + one reflection + synthesis
    expect(mockCreate).toHaveBeenCalledTimes(3);
  });

  it('warns that the config file is missing and uses defaults', async () => {
    await runCli(['debate', 'What is 2+2?', ...GPT_ONLY]);

    const configPath = path.resolve(tmpDir, 'crosstalk.config.json');
    expect(consoleLines().some((line) => line.endsWith(`Config not found at ${configPath}. Using built-in defaults.`))).toBe(true);
  });

  it('requires a query', async () => {
    await expect(runCli(['debate'])).rejects.toHaveProperty('code', EXIT_INVALID_ARGS);
    expect(stderrSpy).toHaveBeenCalledWith('Invalid arguments: query is required\n');
    expect(mockCreate).not.toHaveBeenCalled();
  });

  it('rejects a non-integer round count', async () => {
    await expect(runCli(['debate', 'What is 2+2?', '--rounds', 'two'])).rejects.toHaveProperty('code', EXIT_INVALID_ARGS);
    expect(stderrSpy).toHaveBeenCalledWith("Invalid arguments: --rounds must be an integer, got 'two'\n");
  });

  it('rejects a round count above the maximum', async () => {
    await expect(runCli(['debate', 'What is 2+2?', ...GPT_ONLY, '--rounds', '4'])).rejects.toHaveProperty(
      'code',
      EXIT_INVALID_ARGS
    );
    expect(stderrSpy).toHaveBeenCalledWith('Rounds must be an integer between 1 and 3, got 4\n');
  });

  it('runs the requested number of reflection rounds', async () => {
    await runCli(['debate', 'What is 2+2?', ...GPT_ONLY, '--rounds', '2']);
    expect(mockCreate).toHaveBeenCalledTimes(4);
  });

  it('prints a verbose summary on stderr', async () => {
    await runCli(['debate', 'What is 2+2?', ...GPT_ONLY, '--verbose']);

    const diagnostics = stderr();
    expect(diagnostics).toContain('Summary (verbose)\n');
    expect(diagnostics).toContain('Round 0 (initial)\n');
    expect(diagnostics).toContain('Round 1 (reflection)\n');
    expect(diagnostics).toMatch(/ {2}\[gpt\] ok \([\d.]+ms, tokens=5\) via openai\n/);
    expect(stdout()).toBe('Answer\n');
  });

  it('fails with a provider error when the synthesis fails', async () => {
    mockCreate.mockRejectedValue(new Error('connection reset'));

    await expect(runCli(['debate', 'What is 2+2?', ...GPT_ONLY])).rejects.toHaveProperty('code', EXIT_PROVIDER_ERROR);
    expect(stderr()).toMatch(/^Synthesis failed: /m);
    expect(consoleLines().some((line) => line.includes('[gpt] round 0 failed: '))).toBe(true);
    expect(stdout()).toBe('');
  });

  it('writes the synthesis text to a non-JSON output file', async () => {
    await runCli(['debate', 'What is 2+2?', ...GPT_ONLY, '-o', 'answer.md']);

    expect(fs.readFileSync(path.join(tmpDir, 'answer.md'), 'utf-8')).toBe('Answer\n');
    expect(stdout()).toBe('');
  });

  it('writes the full transcript to a JSON output file', async () => {
    await runCli(['debate', 'What is 2+2?', ...GPT_ONLY, '-o', 'out/transcript.json']);

    const saved: unknown = JSON.parse(fs.readFileSync(path.join(tmpDir, 'out/transcript.json'), 'utf-8'));
    expect(saved).toMatchObject({
      schemaVersion: expect.anything(),
      query: 'What is 2+2?',
      panel: ['gpt'],
      synthesizer: 'gpt',
      maxRounds: 1,
      synthesis: { alias: 'gpt', content: 'Answer', error: null },
    });
  });

  it('prepends per-panelist context to prompts', async () => {
    fs.writeFileSync(path.join(tmpDir, 'ctx.json'), JSON.stringify({ gpt: 'You are terse.' }));

    await runCli(['debate', 'What is 2+2?', ...GPT_ONLY, '--context', 'ctx.json']);

    const firstPrompt = mockCreate.mock.calls[0]?.[0].messages[0]?.content ?? '';
    expect(firstPrompt.startsWith('You are terse.\n\n')).toBe(true);
  });

  it('scores the synthesis against a ground-truth file', async () => {
    fs.writeFileSync(path.join(tmpDir, 'truth.txt'), '4\n');

    await runCli(['debate', 'What is 2+2?', ...GPT_ONLY, '--ground-truth', 'truth.txt']);

    expect(consoleLines().some((line) => line.endsWith('Ground-truth score: accuracy=5 completeness=4 overall=4.5'))).toBe(true);
  });

  it('rejects an empty ground-truth file', async () => {
    fs.writeFileSync(path.join(tmpDir, 'truth.txt'), '  \n');

    await expect(runCli(['debate', 'What is 2+2?', ...GPT_ONLY, '--ground-truth', 'truth.txt'])).rejects.toHaveProperty(
      'code',
      EXIT_INVALID_ARGS
    );
    expect(stderrSpy).toHaveBeenCalledWith('Invalid arguments: ground-truth file is empty\n');
  });

  describe('environment file loading', () => {
    it('loads the default env file', async () => {
      await runCli(['debate', 'What is 2+2?', ...GPT_ONLY]);
      expect(mockedLoadEnvironmentFile).toHaveBeenCalledWith(undefined, undefined);
    });

    it('passes a custom env file and the verbose flag', async () => {
      await runCli(['debate', 'What is 2+2?', ...GPT_ONLY, '--env-file', 'production.env', '--verbose']);
      expect(mockedLoadEnvironmentFile).toHaveBeenCalledWith('production.env', true);
    });

    it('surfaces env loading errors', async () => {
      mockedLoadEnvironmentFile.mockImplementationOnce(() => {
        throw new Error('Environment file not found: /tmp/missing.env');
      });

      await expect(runCli(['debate', 'What is 2+2?', '--env-file', 'missing.env'])).rejects.toThrow(
        'Environment file not found: /tmp/missing.env'
      );
      expect(mockCreate).not.toHaveBeenCalled();
    });
  });

  describe('loadConfig', () => {
    it('parses an existing config file relative to the working directory', async () => {
      fs.writeFileSync(
        path.join(tmpDir, 'crosstalk.config.json'),
        JSON.stringify({ defaults: { panel: ['gpt'], rounds: 2 }, routing: { default: 'openrouter' } })
      );

      const config = await loadConfig();

      expect(config).toEqual({
        configDir: tmpDir,
        defaults: { panel: ['gpt'], rounds: 2 },
        routing: { default: 'openrouter' },
      });
    });

    it('rejects malformed JSON', async () => {
      fs.writeFileSync(path.join(tmpDir, 'broken.json'), '{ "defaults": ');
      await expect(loadConfig('broken.json')).rejects.toHaveProperty('code', EXIT_INVALID_ARGS);
    });
  });

  describe('parseAliasList', () => {
    it('splits on commas and drops blanks', () => {
      expect(parseAliasList(' claude, gpt,,anthropic/claude-opus-4 ')).toEqual(['claude', 'gpt', 'anthropic/claude-opus-4']);
    });
  });

  describe('loadPanelistContext', () => {
    it('reads a map of alias to text', () => {
      fs.writeFileSync(path.join(tmpDir, 'ctx.json'), JSON.stringify({ claude: 'Focus on safety.' }));
      expect(loadPanelistContext('ctx.json')).toEqual({ claude: 'Focus on safety.' });
    });

    it('rejects non-string values', () => {
      fs.writeFileSync(path.join(tmpDir, 'ctx.json'), JSON.stringify({ claude: 3 }));
      expect(() => loadPanelistContext('ctx.json')).toThrow("Invalid arguments: context for 'claude' must be a string");
    });
  });
});
