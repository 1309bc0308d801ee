import { fillTemplate } from '../../prompts/debate-prompts';
import { INITIAL_ROUND, RESULT_ROLES } from '../../types/backend.types';
import { ROUND_TYPES } from '../../types/debate.types';
import { DEBATE_EVENTS, createEvent } from '../events';
import { DebateNode, NodeContext, NodeResult, NodeResultImpl } from '../node';
import { executeRound } from '../round-executor';
import { NODE_TYPES } from '../types';

/**
 * Initial node: every panel member answers the query independently (round 0).
 */
export class InitialNode implements DebateNode {
  readonly nodeType = NODE_TYPES.INITIAL;

  async execute(context: NodeContext): Promise<NodeResult> {
    const { state, templates, hooks } = context;
    await hooks.roundStart(INITIAL_ROUND, ROUND_TYPES.INITIAL, state.maxRounds);

    const prompt = fillTemplate(templates.initial, { query: state.query });
    const round = await executeRound(context, {
      roundNumber: INITIAL_ROUND,
      roundType: ROUND_TYPES.INITIAL,
      role: RESULT_ROLES.INITIAL,
      aliases: state.panel,
      buildPrompt: () => prompt,
    });

    await hooks.roundComplete(round);
    return NodeResultImpl.createResult(
      createEvent(DEBATE_EVENTS.INITIAL_COMPLETE),
      { state: { ...state, rounds: [...state.rounds, round] } }
    );
  }
}
