import type { Logger } from '../utils/logger';

import { DebateEvent, DebateEventType } from './events';
import { NodeContext } from './node';
import { NodeType, NODE_TYPES } from './types';

/**
 * Transition rule defining how the state machine moves between nodes.
 */
export type TransitionRule = {
  from: NodeType;
  event: DebateEventType;
  to: NodeType | null;
  condition?: (context: NodeContext) => boolean;
};

/**
 * Default transition rules. The flow only moves forward: initial, then
 * reflection rounds through the round manager, then synthesis.
 */
export const DEFAULT_TRANSITIONS: TransitionRule[] = [
  { from: NODE_TYPES.INITIAL, event: 'INITIAL_COMPLETE', to: NODE_TYPES.ROUND_MANAGER },
  { from: NODE_TYPES.ROUND_MANAGER, event: 'BEGIN_REFLECTION', to: NODE_TYPES.REFLECTION },
  { from: NODE_TYPES.REFLECTION, event: 'REFLECTION_COMPLETE', to: NODE_TYPES.ROUND_MANAGER },
  { from: NODE_TYPES.ROUND_MANAGER, event: 'MAX_ROUNDS_REACHED', to: NODE_TYPES.SYNTHESIS },
  { from: NODE_TYPES.SYNTHESIS, event: 'COMPLETE', to: null }, // Terminal
];

/**
 * Transition graph that routes events to the next node based on transition rules.
 * When a logger is provided, logs each transition at debug level.
 */
export class TransitionGraph {
  constructor(
    private rules: TransitionRule[] = DEFAULT_TRANSITIONS,
    private logger?: Logger
  ) {}

  /**
   * Gets the next node type based on the current node and event.
   *
   * @param currentNode - The current node type
   * @param event - The event that was emitted
   * @param context - The current node context (for conditional transitions)
   * @returns The next node type, or null if terminal
   * @throws {Error} If no rule matches; an unmatched event is a wiring bug.
   */
  getNextNode(currentNode: NodeType, event: DebateEvent, context: NodeContext): NodeType | null {
    const rule = this.rules.find(
      (r) => r.from === currentNode && r.event === event.type && (!r.condition || r.condition(context))
    );
    if (!rule) {
      throw new Error(`No transition from ${currentNode} on ${event.type}`);
    }
    const toLabel = rule.to === null ? 'terminal' : rule.to;
    this.logger?.debug(`Transition: ${currentNode} --[${event.type}]--> ${toLabel}`);
    return rule.to;
  }
}
