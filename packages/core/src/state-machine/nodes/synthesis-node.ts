import { fillTemplate, formatTranscriptForSynthesis, RoundSummary } from '../../prompts/debate-prompts';
import { RESULT_ROLES, SYNTHESIS_ROUND } from '../../types/backend.types';
import { DebateRound, ROUND_TYPES } from '../../types/debate.types';
import { DEBATE_EVENTS, createEvent } from '../events';
import { DebateNode, NodeContext, NodeResult, NodeResultImpl } from '../node';
import { executeRound } from '../round-executor';
import { NODE_TYPES } from '../types';

/**
 * Summarizes rounds for the synthesis prompt, dropping errored results.
 */
export function summarizeRounds(rounds: readonly DebateRound[]): RoundSummary[] {
  return rounds.map((round) => ({
    roundType: round.roundType,
    responses: round.results
      .filter((result) => result.error === undefined)
      .map((result) => ({ alias: result.alias, text: result.content })),
  }));
}

/**
 * Synthesis node: the designated synthesizer turns the whole debate into one answer.
 */
export class SynthesisNode implements DebateNode {
  readonly nodeType = NODE_TYPES.SYNTHESIS;

  async execute(context: NodeContext): Promise<NodeResult> {
    const { state, templates, hooks } = context;
    await hooks.synthesisStart(state.synthesizer);

    const prompt = fillTemplate(templates.synthesis, {
      query: state.query,
      formatted_transcript: formatTranscriptForSynthesis(summarizeRounds(state.rounds)),
    });
    const round = await executeRound(context, {
      roundNumber: SYNTHESIS_ROUND,
      roundType: ROUND_TYPES.SYNTHESIS,
      role: RESULT_ROLES.SYNTHESIS,
      aliases: [state.synthesizer],
      buildPrompt: () => prompt,
    });
    const synthesis = round.results[0];
    if (!synthesis) {
      throw new Error('Synthesis produced no result');
    }

    await hooks.synthesisComplete(synthesis);
    return NodeResultImpl.createResult(
      createEvent(DEBATE_EVENTS.COMPLETE),
      { state: { ...state, synthesis } }
    );
  }
}
