import {
  AttributedResponse, fillTemplate, formatAttributedResponses, NO_RESPONSE_PLACEHOLDER,
} from '../../prompts/debate-prompts';
import { RESULT_ROLES } from '../../types/backend.types';
import { DebateRound, ROUND_TYPES } from '../../types/debate.types';
import { DEBATE_EVENTS, createEvent } from '../events';
import { DebateNode, NodeContext, NodeResult, NodeResultImpl } from '../node';
import { executeRound } from '../round-executor';
import { NODE_TYPES } from '../types';

/**
 * Builds the reflection inputs for one member from the previous round: its own
 * answer (or a placeholder when that call failed) and every other member's
 * successful answer. A member never appears among its own peers.
 */
export function buildReflectionInputs(previous: DebateRound, alias: string): { ownResponse: string; peers: AttributedResponse[] } {
  const own = previous.results.find((result) => result.alias === alias);
  const ownResponse = own !== undefined && own.error === undefined ? own.content : NO_RESPONSE_PLACEHOLDER;
  const peers = previous.results
    .filter((result) => result.alias !== alias && result.error === undefined)
    .map((result) => ({ alias: result.alias, text: result.content }));
  return { ownResponse, peers };
}

/**
 * Reflection node: each member critiques its peers' previous answers and revises its own.
 * Members whose previous call failed are still asked.
 */
export class ReflectionNode implements DebateNode {
  readonly nodeType = NODE_TYPES.REFLECTION;

  async execute(context: NodeContext): Promise<NodeResult> {
    const { state, templates, hooks } = context;
    const previous = state.rounds[state.rounds.length - 1];
    if (!previous) {
      throw new Error('Reflection round requested before the initial round');
    }
    const roundNumber = state.rounds.length;
    await hooks.roundStart(roundNumber, ROUND_TYPES.REFLECTION, state.maxRounds);

    const round = await executeRound(context, {
      roundNumber,
      roundType: ROUND_TYPES.REFLECTION,
      role: RESULT_ROLES.REFLECTION,
      aliases: state.panel,
      buildPrompt: (alias) => {
        const { ownResponse, peers } = buildReflectionInputs(previous, alias);
        return fillTemplate(templates.reflection, {
          query: state.query,
          own_response: ownResponse,
          other_responses: formatAttributedResponses(peers),
        });
      },
    });

    await hooks.roundComplete(round);
    return NodeResultImpl.createResult(
      createEvent(DEBATE_EVENTS.REFLECTION_COMPLETE, { roundNumber }),
      { state: { ...state, rounds: [...state.rounds, round] } }
    );
  }
}
