import {
  BackendClientOptions, BackendConfigError, BackendKind, BackendRequest, createConfigSnapshot, DebateRound,
  InvalidRequestError, RESULT_ROLES, RoundResult, runDebate,
} from 'crosstalk-core';

import { createMockLogger, FakeBackendClient } from '../utils/test-utils';

class JudgingClient extends FakeBackendClient {
  override async complete(request: BackendRequest): Promise<RoundResult> {
    if (request.role !== RESULT_ROLES.SCORING) {
      return super.complete(request);
    }
    return {
      alias: request.alias,
      modelId: request.modelId,
      roundNumber: request.roundNumber,
      role: request.role,
      content: 'ACCURACY: 4\nCOMPLETENESS: 5\nEXPLANATION: Matches the reference.',
      latencyMs: 1,
      timestamp: new Date(),
    };
  }
}

describe('runDebate', () => {
  const config = createConfigSnapshot(
    { configDir: '/cfg', defaults: { panel: ['claude', 'gpt'], synthesizer: 'claude', rounds: 1 } },
    { ANTHROPIC_API_KEY: 'test-secret', OPENAI_API_KEY: 'test-secret' }
  );

  let created: FakeBackendClient[];
  let options: { kind: BackendKind; options: BackendClientOptions }[];

  const createClient = (kind: BackendKind, clientOptions: BackendClientOptions): FakeBackendClient => {
    const client = new JudgingClient(kind);
    created.push(client);
    options.push({ kind, options: clientOptions });
    return client;
  };

  beforeEach(() => {
    created = [];
    options = [];
  });

  it('runs the configured panel and closes every client afterwards', async () => {
    const transcript = await runDebate('What is 2+2?', config, { createClient, logger: createMockLogger() });

    expect(transcript.panel).toEqual(['claude', 'gpt']);
    expect(transcript.rounds.map((round) => round.roundType)).toEqual(['initial', 'reflection']);
    expect(transcript.synthesis?.content).toBe('reply:claude');
    expect(created.map((client) => client.kind).sort()).toEqual(['anthropic', 'openai']);
    expect(created.every((client) => !client.isOpen())).toBe(true);
  });

  it('passes backend settings and the api key to each client', async () => {
    await runDebate('What is 2+2?', config, { createClient, logger: createMockLogger() });

    const openai = options.find((entry) => entry.kind === 'openai');
    expect(openai?.options).toMatchObject({ apiKey: 'test-secret', timeoutMs: 120_000, maxConcurrency: 8 });
  });

  it('lets run options override the configured panel and rounds', async () => {
    const transcript = await runDebate('What is 2+2?', config, {
      createClient,
      logger: createMockLogger(),
      panel: ['gpt'],
      synthesizer: 'gpt',
      rounds: 2,
    });

    expect(transcript.panel).toEqual(['gpt']);
    expect(transcript.rounds).toHaveLength(3);
    expect(created.map((client) => client.kind)).toEqual(['openai']);
  });

  it('rejects an invalid request before creating any client', async () => {
    await expect(runDebate('   ', config, { createClient })).rejects.toThrow(InvalidRequestError);
    expect(created).toHaveLength(0);
  });

  it('propagates client construction errors', async () => {
    const failing = (): FakeBackendClient => {
      throw new BackendConfigError('openai: API key is required');
    };
    await expect(runDebate('What is 2+2?', config, { createClient: failing })).rejects.toThrow(BackendConfigError);
  });

  it('closes every client when one fails to open', async () => {
    const openFailure = new BackendConfigError('openai: endpoint unreachable');
    const closed: string[] = [];
    const failingOpen = (kind: BackendKind, clientOptions: BackendClientOptions): FakeBackendClient => {
      const client = createClient(kind, clientOptions);
      const close = client.close.bind(client);
      jest.spyOn(client, 'close').mockImplementation(async () => {
        closed.push(kind);
        await close();
      });
      if (kind === 'openai') {
        jest.spyOn(client, 'open').mockRejectedValue(openFailure);
      }
      return client;
    };

    await expect(runDebate('What is 2+2?', config, { createClient: failingOpen, logger: createMockLogger() })).rejects.toBe(openFailure);

    expect(closed.sort()).toEqual(['anthropic', 'openai']);
    expect(created.every((client) => !client.isOpen())).toBe(true);
    expect(created.every((client) => client.received.length === 0)).toBe(true);
  });

  it('warns about a backend without a key and fails only its members', async () => {
    const logger = createMockLogger();
    const transcript = await runDebate('What is 2+2?', config, {
      createClient,
      logger,
      panel: ['claude', 'grok'],
    });

    expect(logger.warn).toHaveBeenCalledWith('[grok] no xai API key configured; routing through openrouter');
    expect(logger.warn).toHaveBeenCalledWith('No API key configured for openrouter; its calls will fail');
    const initial = transcript.rounds[0]?.results ?? [];
    expect(initial.find((result) => result.alias === 'claude')?.content).toBe('reply:claude');
    expect(initial.find((result) => result.alias === 'grok')?.error).toBe("No open client for backend 'openrouter'");
  });

  it('scores the synthesis against a ground truth with the synthesizer as judge', async () => {
    const transcript = await runDebate('What is 2+2?', config, {
      createClient,
      logger: createMockLogger(),
      groundTruth: '4',
    });

    expect(transcript.metadata.groundTruthScore).toEqual({
      accuracy: 4,
      completeness: 5,
      overall: 4.5,
      explanation: 'Matches the reference.',
      judgeModel: 'claude',
    });
  });

  it('stores experiment tags on the transcript', async () => {
    const transcript = await runDebate('What is 2+2?', config, {
      createClient,
      logger: createMockLogger(),
      experiment: { experimentId: 'exp-3', sourceTool: 'batch', condition: 'baseline', variables: {} },
    });

    expect(transcript.metadata.experiment).toEqual({
      experimentId: 'exp-3',
      sourceTool: 'batch',
      condition: 'baseline',
      variables: {},
    });
  });

  it('notifies the per-run round observer', async () => {
    const seen: DebateRound[] = [];
    await runDebate('What is 2+2?', config, {
      createClient,
      logger: createMockLogger(),
      onRoundComplete: (round) => {
        seen.push(round);
      },
    });

    expect(seen.map((round) => round.roundNumber)).toEqual([0, 1]);
  });
});
