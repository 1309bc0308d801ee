import {
  DebateOrchestrator, DebateHooks, DebateRound, DebateTranscript, InvalidRequestError, ReplayOptions, PromptTemplates, RoutedRequest, ROUTING_MODES,
} from 'crosstalk-core';

import { createMockLogger, createRoutingInputs, Responder, ScriptedDispatcher } from '../utils/test-utils';

const templates: PromptTemplates = {
  initial: 'I:{query}',
  reflection: 'R:{query}|OWN:{own_response}|PEERS:{other_responses}',
  synthesis: 'S:{query}|T:{formatted_transcript}',
  scoring: 'unused',
};

const echo: Responder = (request) => `${request.alias}@${request.roundNumber}`;

function promptOf(requests: readonly RoutedRequest[], alias: string): string | undefined {
  return requests.find((request) => request.alias === alias)?.prompt;
}

function createOrchestrator(dispatcher: ScriptedDispatcher, hooks?: DebateHooks, routing = createRoutingInputs()) {
  const logger = createMockLogger();
  const orchestrator = new DebateOrchestrator({
    dispatcher,
    routing,
    templates,
    logger,
    ...(hooks !== undefined && { hooks }),
  });
  return { orchestrator, logger };
}

describe('DebateOrchestrator', () => {
  describe('round flow', () => {
    it('runs an initial round, each reflection round, then synthesis', async () => {
      const dispatcher = new ScriptedDispatcher(echo);
      const { orchestrator } = createOrchestrator(dispatcher);

      const transcript = await orchestrator.run('Q', ['claude', 'gpt', 'gemini'], 'claude', 2);

      expect(dispatcher.batches.map((batch) => batch.map((r) => `${r.alias}:${r.roundNumber}:${r.role}`))).toEqual([
        ['claude:0:initial', 'gpt:0:initial', 'gemini:0:initial'],
        ['claude:1:reflection', 'gpt:1:reflection', 'gemini:1:reflection'],
        ['claude:2:reflection', 'gpt:2:reflection', 'gemini:2:reflection'],
        ['claude:-1:synthesis'],
      ]);
      expect(transcript.rounds.map((round) => [round.roundNumber, round.roundType])).toEqual([
        [0, 'initial'],
        [1, 'reflection'],
        [2, 'reflection'],
      ]);
      expect(transcript.synthesis).toMatchObject({ alias: 'claude', roundNumber: -1, role: 'synthesis', content: 'claude@-1' });
      expect(transcript.maxRounds).toBe(2);
      expect(transcript.panel).toEqual(['claude', 'gpt', 'gemini']);
    });

    it('sends the filled initial prompt to every member', async () => {
      const dispatcher = new ScriptedDispatcher(echo);
      const { orchestrator } = createOrchestrator(dispatcher);

      await orchestrator.run('What is entropy?', ['claude', 'gpt'], 'gpt', 1);

      expect(dispatcher.batches[0]?.map((r) => r.prompt)).toEqual(['I:What is entropy?', 'I:What is entropy?']);
    });

    it('shows each member its own answer and only its peers', async () => {
      const dispatcher = new ScriptedDispatcher(echo);
      const { orchestrator } = createOrchestrator(dispatcher);

      await orchestrator.run('Q', ['claude', 'gpt', 'gemini'], 'claude', 2);

      const firstReflection = dispatcher.batches[1] ?? [];
      expect(promptOf(firstReflection, 'claude')).toBe('R:Q|OWN:claude@0|PEERS:[gpt]:\ngpt@0\n\n[gemini]:\ngemini@0');
      expect(promptOf(firstReflection, 'gpt')).toBe('R:Q|OWN:gpt@0|PEERS:[claude]:\nclaude@0\n\n[gemini]:\ngemini@0');
      const secondReflection = dispatcher.batches[2] ?? [];
      expect(promptOf(secondReflection, 'gemini')).toBe('R:Q|OWN:gemini@1|PEERS:[claude]:\nclaude@1\n\n[gpt]:\ngpt@1');
    });

    it('gives the synthesizer every round in order', async () => {
      const dispatcher = new ScriptedDispatcher(echo);
      const { orchestrator } = createOrchestrator(dispatcher);

      await orchestrator.run('Q', ['claude', 'gpt'], 'grok', 1);

      expect(dispatcher.batches[2]?.[0]?.prompt).toBe(
        'S:Q|T:=== INITIAL ROUND ===\n\n[claude]:\nclaude@0\n\n[gpt]:\ngpt@0' +
        '\n\n=== REFLECTION ROUND ===\n\n[claude]:\nclaude@1\n\n[gpt]:\ngpt@1'
      );
      expect(dispatcher.batches[2]?.[0]?.alias).toBe('grok');
    });
  });

  describe('failures', () => {
    it('keeps a failed member on the panel with a placeholder for its own answer', async () => {
      const dispatcher = new ScriptedDispatcher((request) => {
        if (request.alias === 'gpt' && request.roundNumber === 0) {
          throw new Error('HTTP 503: overloaded');
        }
        return echo(request);
      });
      const { orchestrator, logger } = createOrchestrator(dispatcher);

      const transcript = await orchestrator.run('Q', ['claude', 'gpt', 'gemini'], 'claude', 1);

      expect(transcript.rounds[0]?.results[1]).toMatchObject({ alias: 'gpt', content: '', error: 'HTTP 503: overloaded' });
      const reflection = dispatcher.batches[1] ?? [];
      expect(promptOf(reflection, 'gpt')).toBe('R:Q|OWN:[No response available]|PEERS:[claude]:\nclaude@0\n\n[gemini]:\ngemini@0');
      expect(promptOf(reflection, 'claude')).toBe('R:Q|OWN:claude@0|PEERS:[gemini]:\ngemini@0');
      expect(transcript.rounds[1]?.results[1]?.content).toBe('gpt@1');
      expect(logger.warn).toHaveBeenCalledWith('[gpt] initial call failed: HTTP 503: overloaded');
    });

    it('leaves failed results out of the synthesis transcript', async () => {
      const dispatcher = new ScriptedDispatcher((request) => {
        if (request.alias === 'gpt') {
          throw new Error('down');
        }
        return echo(request);
      });
      const { orchestrator } = createOrchestrator(dispatcher);

      await orchestrator.run('Q', ['claude', 'gpt'], 'claude', 1);

      expect(dispatcher.batches[2]?.[0]?.prompt).toBe(
        'S:Q|T:=== INITIAL ROUND ===\n\n[claude]:\nclaude@0\n\n=== REFLECTION ROUND ===\n\n[claude]:\nclaude@1'
      );
    });

    it('records a failed synthesis without throwing', async () => {
      const dispatcher = new ScriptedDispatcher((request) => {
        if (request.role === 'synthesis') {
          throw new Error('timeout');
        }
        return echo(request);
      });
      const { orchestrator } = createOrchestrator(dispatcher);

      const transcript = await orchestrator.run('Q', ['claude'], 'claude', 1);

      expect(transcript.synthesis).toMatchObject({ error: 'timeout', content: '' });
    });

    it('contains a routing failure in that member slot', async () => {
      const routing = createRoutingInputs({
        routing: { defaultMode: ROUTING_MODES.DIRECT, overrides: {} },
        credentials: { anthropic: 'test-secret', openai: 'test-secret' },
      });
      const dispatcher = new ScriptedDispatcher(echo);
      const { orchestrator } = createOrchestrator(dispatcher, undefined, routing);

      const transcript = await orchestrator.run('Q', ['claude', 'gemini', 'gpt'], 'claude', 1);

      expect(dispatcher.batches[0]?.map((r) => r.alias)).toEqual(['claude', 'gpt']);
      expect(transcript.rounds[0]?.results.map((r) => r.alias)).toEqual(['claude', 'gemini', 'gpt']);
      expect(transcript.rounds[0]?.results[1]).toMatchObject({
        modelId: 'google/gemini-2.5-pro',
        content: '',
        error: "Direct routing for 'gemini' requires a google API key, but none is configured",
      });
    });
  });

  describe('panelist context', () => {
    it('prepends a member context to every prompt it receives, synthesis included', async () => {
      const dispatcher = new ScriptedDispatcher(echo);
      const { orchestrator } = createOrchestrator(dispatcher);

      await orchestrator.run('Q', ['claude', 'gpt'], 'claude', 2, { panelistContext: { claude: 'You are a physicist.' } });

      const claudePrompts = dispatcher.requests.filter((r) => r.alias === 'claude').map((r) => r.prompt ?? '');
      expect(claudePrompts).toHaveLength(4);
      claudePrompts.forEach((prompt) => expect(prompt.startsWith('You are a physicist.\n\n')).toBe(true));
      expect(dispatcher.requests.filter((r) => r.alias === 'gpt').map((r) => r.prompt?.slice(0, 2))).toEqual(['I:', 'R:', 'R:']);
    });
  });

  describe('observers', () => {
    it('reports round start with number, type and total', async () => {
      const starts: string[] = [];
      const dispatcher = new ScriptedDispatcher(echo);
      const { orchestrator } = createOrchestrator(dispatcher, {
        onRoundStart: (roundNumber, roundType, total) => { starts.push(`${roundNumber}/${roundType}/${total}`); },
        onSynthesisStart: (synthesizer) => { starts.push(`synth:${synthesizer}`); },
      });

      await orchestrator.run('Q', ['claude', 'gpt'], 'gpt', 2);

      expect(starts).toEqual(['0/initial/2', '1/reflection/2', '2/reflection/2', 'synth:gpt']);
    });

    it('calls the orchestrator hook before the per-run observer, once per round', async () => {
      const calls: string[] = [];
      const dispatcher = new ScriptedDispatcher(echo);
      const { orchestrator } = createOrchestrator(dispatcher, {
        onRoundComplete: (round: DebateRound) => { calls.push(`hook:${round.roundNumber}`); },
      });

      await orchestrator.run('Q', ['claude'], 'claude', 1, {
        onRoundComplete: async (round) => { calls.push(`run:${round.roundNumber}`); },
      });

      expect(calls).toEqual(['hook:0', 'run:0', 'hook:1', 'run:1']);
    });

    it('logs a failing observer and finishes the debate', async () => {
      const dispatcher = new ScriptedDispatcher(echo);
      const { orchestrator, logger } = createOrchestrator(dispatcher, {
        onRoundStart: () => { throw new Error('boom'); },
        onSynthesisComplete: async () => { throw new Error('late boom'); },
      });

      const transcript = await orchestrator.run('Q', ['claude', 'gpt'], 'claude', 1, {
        onRoundComplete: () => Promise.reject(new Error('rejected')),
      });

      expect(transcript.synthesis?.content).toBe('claude@-1');
      expect(logger.error).toHaveBeenCalledWith('onRoundStart callback failed: boom');
      expect(logger.error).toHaveBeenCalledWith('onRoundComplete callback failed: rejected');
      expect(logger.error).toHaveBeenCalledWith('onSynthesisComplete callback failed: late boom');
    });
  });

  describe('preconditions', () => {
    it.each([
      ['an empty query', '  ', ['claude'], 'claude', 1, 'Query must not be empty'],
      ['an empty panel', 'Q', [], 'claude', 1, 'Panel must contain at least one model'],
      ['a duplicate alias', 'Q', ['gpt', 'gpt'], 'claude', 1, "Panel contains 'gpt' more than once"],
      ['an unknown alias', 'Q', ['nope'], 'claude', 1, "Unknown model alias 'nope'"],
      ['an unknown synthesizer', 'Q', ['gpt'], 'nope', 1, "Unknown model alias 'nope'"],
      ['zero rounds', 'Q', ['gpt'], 'claude', 0, 'Rounds must be an integer between 1 and 3, got 0'],
      ['too many rounds', 'Q', ['gpt'], 'claude', 4, 'Rounds must be an integer between 1 and 3, got 4'],
      ['fractional rounds', 'Q', ['gpt'], 'claude', 1.5, 'Rounds must be an integer between 1 and 3, got 1.5'],
      ['an inherited property name as synthesizer', 'Q', ['claude'], 'constructor', 1, "Unknown model alias 'constructor'"],
      ['an inherited property name on the panel', 'Q', ['toString'], 'claude', 1, "Unknown model alias 'toString'"],
    ])('rejects %s before dispatching anything', async (_label, query, panel, synthesizer, rounds, message) => {
      const dispatcher = new ScriptedDispatcher(echo);
      const { orchestrator } = createOrchestrator(dispatcher);

      const run = orchestrator.run(query, panel, synthesizer, rounds);

      await expect(run).rejects.toThrow(InvalidRequestError);
      await expect(run).rejects.toThrow(message);
      expect(dispatcher.batches).toHaveLength(0);
    });

    it('accepts a full model id on the panel', async () => {
      const dispatcher = new ScriptedDispatcher(echo);
      const { orchestrator } = createOrchestrator(dispatcher);

      await orchestrator.run('Q', ['meta-llama/llama-3.3-70b-instruct'], 'claude', 1);

      expect(dispatcher.batches[0]?.[0]).toMatchObject({
        modelId: 'meta-llama/llama-3.3-70b-instruct',
        routing: { backend: 'openrouter' },
      });
    });
  });

  describe('transcript', () => {
    it('is deeply frozen', async () => {
      const { orchestrator } = createOrchestrator(new ScriptedDispatcher(echo));
      const transcript = await orchestrator.run('Q', ['claude'], 'claude', 1);

      expect(Object.isFrozen(transcript)).toBe(true);
      expect(Object.isFrozen(transcript.rounds)).toBe(true);
      expect(Object.isFrozen(transcript.rounds[0]?.results)).toBe(true);
      expect(Object.isFrozen(transcript.rounds[0]?.results[0])).toBe(true);
      expect(Object.isFrozen(transcript.metadata)).toBe(true);
    });

    it('uses the given transcript id and copies metadata', async () => {
      const { orchestrator } = createOrchestrator(new ScriptedDispatcher(echo));
      const metadata: Record<string, unknown> = { experiment: { experimentId: 'exp-1', condition: 'control' } };

      const transcript = await orchestrator.run('Q', ['claude'], 'claude', 1, { transcriptId: 't-42', metadata });
      metadata.experiment = 'changed';

      expect(transcript.transcriptId).toBe('t-42');
      expect(transcript.metadata).toEqual({ experiment: { experimentId: 'exp-1', condition: 'control' } });
    });

    it('stores experiment tags under metadata.experiment with the default source tool', async () => {
      const { orchestrator } = createOrchestrator(new ScriptedDispatcher(echo));

      const transcript = await orchestrator.run('Q', ['claude'], 'claude', 1, {
        metadata: { experiment: 'replaced', note: 'kept' },
        experiment: { experimentId: 'exp-7', condition: 'two-rounds', variables: { rounds: 2 } },
      });

      expect(transcript.metadata).toEqual({
        note: 'kept',
        experiment: { experimentId: 'exp-7', sourceTool: 'manual', condition: 'two-rounds', variables: { rounds: 2 } },
      });
    });

    it('rejects experiment tags without an id before dispatching', async () => {
      const dispatcher = new ScriptedDispatcher(echo);
      const { orchestrator } = createOrchestrator(dispatcher);

      await expect(orchestrator.run('Q', ['claude'], 'claude', 1, {
        experiment: { experimentId: ' ', condition: 'control', variables: {} },
      })).rejects.toThrow('Experiment id must not be empty');
      expect(dispatcher.batches).toHaveLength(0);
    });

    it('generates a fresh id per run', async () => {
      const { orchestrator } = createOrchestrator(new ScriptedDispatcher(echo));
      const first = await orchestrator.run('Q', ['claude'], 'claude', 1);
      const second = await orchestrator.run('Q', ['claude'], 'claude', 1);
      expect(first.transcriptId).not.toBe(second.transcriptId);
    });
  });

  describe('replay', () => {
    async function sourceTranscript(): Promise<DebateTranscript> {
      const { orchestrator } = createOrchestrator(new ScriptedDispatcher(echo));
      return orchestrator.run('Q', ['claude', 'gpt'], 'claude', 1, { transcriptId: 'source-1', metadata: { tag: 'a' } });
    }

    it('re-synthesizes only, keeping the source rounds', async () => {
      const source = await sourceTranscript();
      const dispatcher = new ScriptedDispatcher((request) => `again:${request.alias}`);
      const { orchestrator } = createOrchestrator(dispatcher);

      const replayed = await orchestrator.replay(source);

      expect(dispatcher.batches.map((batch) => batch.map((r) => `${r.alias}:${r.role}`))).toEqual([['claude:synthesis']]);
      expect(replayed.transcriptId).not.toBe('source-1');
      expect(replayed.rounds).toEqual(source.rounds);
      expect(replayed.maxRounds).toBe(1);
      expect(replayed.synthesizer).toBe('claude');
      expect(replayed.synthesis?.content).toBe('again:claude');
      expect(replayed.metadata).toEqual({
        sourceTranscriptId: 'source-1',
        replayConfig: { synthesizerOverride: null, additionalRounds: 0 },
      });
    });

    it('appends reflection rounds numbered on from the source', async () => {
      const source = await sourceTranscript();
      const dispatcher = new ScriptedDispatcher(echo);
      const { orchestrator } = createOrchestrator(dispatcher);

      const replayed = await orchestrator.replay(source, { additionalRounds: 2, synthesizer: 'gpt' });

      expect(replayed.rounds.map((round) => [round.roundNumber, round.roundType])).toEqual([
        [0, 'initial'],
        [1, 'reflection'],
        [2, 'reflection'],
        [3, 'reflection'],
      ]);
      expect(replayed.maxRounds).toBe(3);
      expect(replayed.rounds.length).toBeLessThanOrEqual(replayed.maxRounds + 1);
      expect(promptOf(dispatcher.batches[0] ?? [], 'claude')).toBe('R:Q|OWN:claude@1|PEERS:[gpt]:\ngpt@1');
      expect(replayed.synthesis).toMatchObject({ alias: 'gpt', content: 'gpt@-1' });
      expect(replayed.metadata.replayConfig).toEqual({ synthesizerOverride: 'gpt', additionalRounds: 2 });
    });

    it('leaves the source transcript unchanged', async () => {
      const source = await sourceTranscript();
      const { orchestrator } = createOrchestrator(new ScriptedDispatcher(echo));

      await orchestrator.replay(source, { additionalRounds: 1 });

      expect(source.rounds).toHaveLength(2);
      expect(source.synthesis?.content).toBe('claude@-1');
      expect(source.metadata).toEqual({ tag: 'a' });
    });

    it.each<[string, ReplayOptions, string]>([
      ['a negative round count', { additionalRounds: -1 }, 'Additional rounds must be an integer >= 0, got -1'],
      ['a fractional round count', { additionalRounds: 0.5 }, 'Additional rounds must be an integer >= 0, got 0.5'],
      ['an unknown synthesizer', { synthesizer: 'nope' }, "Unknown model alias 'nope'"],
    ])('rejects %s before dispatching anything', async (_label, options, message) => {
      const source = await sourceTranscript();
      const dispatcher = new ScriptedDispatcher(echo);
      const { orchestrator } = createOrchestrator(dispatcher);

      const replay = orchestrator.replay(source, options);

      await expect(replay).rejects.toThrow(InvalidRequestError);
      await expect(replay).rejects.toThrow(message);
      expect(dispatcher.batches).toHaveLength(0);
    });

    it('rejects a transcript missing reflection rounds', async () => {
      const source = await sourceTranscript();
      const truncated: DebateTranscript = { ...source, rounds: source.rounds.slice(0, 1) };
      const { orchestrator } = createOrchestrator(new ScriptedDispatcher(echo));

      await expect(orchestrator.replay(truncated)).rejects.toThrow('Transcript source-1 has 1 round(s); expected 2');
    });
  });
});
