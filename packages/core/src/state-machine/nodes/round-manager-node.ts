import { DEBATE_EVENTS, createEvent } from '../events';
import { DebateNode, NodeContext, NodeResult, NodeResultImpl } from '../node';
import { NODE_TYPES } from '../types';

/**
 * Round manager node that decides whether another reflection round runs or the
 * debate moves on to synthesis. The round count is fixed when the debate starts.
 */
export class RoundManagerNode implements DebateNode {
  readonly nodeType = NODE_TYPES.ROUND_MANAGER;

  async execute(context: NodeContext): Promise<NodeResult> {
    const { state } = context;
    // rounds[0] is the initial round
    const completedReflections = Math.max(0, state.rounds.length - 1);

    if (completedReflections >= state.maxRounds) {
      return NodeResultImpl.createResult(createEvent(DEBATE_EVENTS.MAX_ROUNDS_REACHED));
    }

    return NodeResultImpl.createResult(
      createEvent(DEBATE_EVENTS.BEGIN_REFLECTION, { roundNumber: completedReflections + 1 })
    );
  }
}
