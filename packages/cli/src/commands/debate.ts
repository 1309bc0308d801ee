import fs from 'fs';
import path from 'path';

import { Command } from 'commander';
import {
  EXIT_INVALID_ARGS, EXIT_GENERAL_ERROR, EXIT_PROVIDER_ERROR, ErrorWithCode, writeStderr,
  CrosstalkFileConfig, DebateHooks, DebateRound, DebateTranscript, GroundTruthScore, RoundResult,
  DEFAULT_CONFIG_FILENAME, Logger, createConfigSnapshot, parseConfigFile, runDebate, serializeTranscript,
  loadEnvironmentFile, createValidationError, writeFileWithDirectories, readJsonFile, isRecord,
  getErrorMessage,
} from 'crosstalk-core';

import { infoUser, warnUser } from '../index';

// File handling constants
const FILE_ENCODING_UTF8 = 'utf-8';
const JSON_FILE_EXTENSION = '.json';
const JSON_INDENT_SPACES = 2;

const LIST_SEPARATOR = ',';

export interface DebateCommandOptions {
  panel?: string;
  synthesizer?: string;
  rounds?: string;
  config?: string;
  envFile?: string;
  output?: string;
  context?: string;
  groundTruth?: string;
  verbose?: boolean;
}

/**
 * Loads the config file, or falls back to built-in defaults with a warning when
 * it does not exist. Malformed files are an error.
 *
 * @param configPath - Path relative to the current directory; defaults to ./crosstalk.config.json.
 */
export async function loadConfig(configPath?: string): Promise<CrosstalkFileConfig> {
  const finalPath = path.resolve(process.cwd(), configPath ?? DEFAULT_CONFIG_FILENAME);

  if (!fs.existsSync(finalPath)) {
    warnUser(`Config not found at ${finalPath}. Using built-in defaults.`);
    return { configDir: process.cwd() };
  }

  return parseConfigFile(readJsonFile(finalPath, 'Config file'), path.dirname(finalPath));
}

/**
 * Parses a comma-separated alias list, dropping blanks.
 */
export function parseAliasList(value: string): string[] {
  return value.split(LIST_SEPARATOR).map((alias) => alias.trim()).filter((alias) => alias.length > 0);
}

function parseRounds(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const rounds = Number(value);
  if (!Number.isInteger(rounds)) {
    throw createValidationError(`Invalid arguments: --rounds must be an integer, got '${value}'`, EXIT_INVALID_ARGS);
  }
  return rounds;
}

/**
 * Reads per-panelist context from a JSON file mapping alias to text.
 */
export function loadPanelistContext(contextPath: string): Record<string, string> {
  const raw = readJsonFile(contextPath, 'Context file');
  if (!isRecord(raw)) {
    throw createValidationError('Invalid arguments: context file must map aliases to strings', EXIT_INVALID_ARGS);
  }
  const context: Record<string, string> = {};
  for (const [alias, text] of Object.entries(raw)) {
    if (typeof text !== 'string') {
      throw createValidationError(`Invalid arguments: context for '${alias}' must be a string`, EXIT_INVALID_ARGS);
    }
    context[alias] = text;
  }
  return context;
}

function readGroundTruth(groundTruthPath: string): string {
  const abs = path.resolve(process.cwd(), groundTruthPath);
  if (!fs.existsSync(abs) || !fs.statSync(abs).isFile()) {
    throw createValidationError(`Invalid arguments: ground-truth file not found: ${abs}`, EXIT_INVALID_ARGS);
  }
  const text = fs.readFileSync(abs, FILE_ENCODING_UTF8).trim();
  if (text.length === 0) {
    throw createValidationError('Invalid arguments: ground-truth file is empty', EXIT_INVALID_ARGS);
  }
  return text;
}

function describeResult(result: RoundResult): string {
  if (result.error !== undefined) {
    return `  [${result.alias}] ERROR: ${result.error}\n`;
  }
  const tokens = result.usage?.totalTokens !== undefined ? `, tokens=${result.usage.totalTokens}` : '';
  const route = result.routing ? ` via ${result.routing.backend}${result.routing.viaFallback ? ' (fallback)' : ''}` : '';
  return `  [${result.alias}] ok (${result.latencyMs}ms${tokens})${route}\n`;
}

function outputRoundSummary(round: DebateRound): void {
  writeStderr(`Round ${round.roundNumber} (${round.roundType})\n`);
  round.results.forEach((result) => writeStderr(describeResult(result)));
}

/**
 * Writes the synthesis to stdout (or the output file) and reports member errors on stderr.
 * A `.json` output path receives the full serialized transcript instead.
 *
 * @throws {ErrorWithCode} EXIT_PROVIDER_ERROR when the synthesis itself failed.
 */
export async function outputResults(transcript: DebateTranscript, options: DebateCommandOptions): Promise<void> {
  const failures = transcript.rounds.flatMap((round) => round.results.filter((result) => result.error !== undefined));
  failures.forEach((result) => warnUser(`[${result.alias}] round ${result.roundNumber} failed: ${result.error ?? ''}`));

  if (options.verbose) {
    writeStderr('\nSummary (verbose)\n');
    transcript.rounds.forEach(outputRoundSummary);
    if (transcript.synthesis) {
      writeStderr(`Synthesis\n${describeResult(transcript.synthesis)}`);
    }
  }

  if (options.output) {
    const content = options.output.toLowerCase().endsWith(JSON_FILE_EXTENSION)
      ? JSON.stringify(serializeTranscript(transcript), null, JSON_INDENT_SPACES)
      : (transcript.synthesis?.content ?? '') + '\n';
    const written = await writeFileWithDirectories(options.output, content);
    infoUser(`Saved output to ${written}`);
  }

  const synthesis = transcript.synthesis;
  if (!synthesis || synthesis.error !== undefined) {
    throw createValidationError(`Synthesis failed: ${synthesis?.error ?? 'no result'}`, EXIT_PROVIDER_ERROR);
  }
  if (!options.output) {
    process.stdout.write(synthesis.content + '\n');
  }

  const score = transcript.metadata.groundTruthScore;
  if (isGroundTruthScore(score)) {
    infoUser(`Ground-truth score: accuracy=${score.accuracy} completeness=${score.completeness} overall=${score.overall}`);
  }
}

function isGroundTruthScore(value: unknown): value is GroundTruthScore {
  return isRecord(value)
    && typeof value.accuracy === 'number'
    && typeof value.completeness === 'number'
    && typeof value.overall === 'number';
}

function progressHooks(verbose: boolean): DebateHooks {
  if (!verbose) {
    return {};
  }
  return {
    onRoundStart: (roundNumber, roundType, totalRounds) =>
      infoUser(`Starting ${roundType} round ${roundNumber} of ${totalRounds}`),
    onSynthesisStart: (synthesizer) => infoUser(`Synthesizing with ${synthesizer}`),
  };
}

/**
 * Registers the `debate` command.
 */
export function debateCommand(program: Command): void {
  program
    .command('debate')
    .argument('[query]', 'Question to put to the panel')
    .option('-p, --panel <aliases>', 'Comma-separated model aliases or full model ids')
    .option('-s, --synthesizer <alias>', 'Model alias that writes the final answer')
    .option('-r, --rounds <number>', 'Number of reflection rounds (1-3)')
    .option('-c, --config <path>', `Path to configuration file (default ./${DEFAULT_CONFIG_FILENAME})`)
    .option('-e, --env-file <path>', 'Path to environment file (default: .env)')
    .option('-o, --output <path>', 'Output file; .json writes the full transcript, others write the synthesis text')
    .option('--context <path>', 'JSON file mapping aliases to context text prepended to their prompts')
    .option('--ground-truth <path>', 'Text file with a reference answer to score the synthesis against')
    .option('-v, --verbose', 'Verbose output')
    .action(async (query: string | undefined, options: DebateCommandOptions): Promise<void> => {
      try {
        if (query === undefined || query.trim().length === 0) {
          throw createValidationError('Invalid arguments: query is required', EXIT_INVALID_ARGS);
        }
        loadEnvironmentFile(options.envFile, options.verbose);

        const fileConfig = await loadConfig(options.config);
        const config = createConfigSnapshot(fileConfig, process.env);
        const panel = options.panel !== undefined ? parseAliasList(options.panel) : undefined;
        const rounds = parseRounds(options.rounds);
        const panelistContext = options.context !== undefined ? loadPanelistContext(options.context) : undefined;
        const groundTruth = options.groundTruth !== undefined ? readGroundTruth(options.groundTruth) : undefined;
        const verbose = options.verbose === true;

        infoUser('Running debate');
        const transcript = await runDebate(query, config, {
          logger: new Logger(verbose),
          hooks: progressHooks(verbose),
          ...(panel !== undefined && { panel }),
          ...(options.synthesizer !== undefined && { synthesizer: options.synthesizer }),
          ...(rounds !== undefined && { rounds }),
          ...(panelistContext !== undefined && { panelistContext }),
          ...(groundTruth !== undefined && { groundTruth }),
          ...(options.config !== undefined && { configFileName: path.basename(options.config) }),
        });

        await outputResults(transcript, options);
      } catch (err: unknown) {
        const code = errorCode(err);
        const message = getErrorMessage(err);
        writeStderr(message + '\n');
        // Rethrow for runCli catch to set process exit when direct run
        throw Object.assign(new Error(message), { code });
      }
    });
}

function errorCode(err: unknown): number {
  const withCode: ErrorWithCode | undefined = err instanceof Error ? err : undefined;
  return withCode !== undefined && typeof withCode.code === 'number' ? withCode.code : EXIT_GENERAL_ERROR;
}
