import type { Dispatcher } from '../dispatch/batch-dispatcher';
import type { PromptTemplates } from '../prompts/debate-prompts';
import type { RoutingInputs } from '../routing/routing-resolver';
import type { DebateState } from '../types/debate.types';
import type { Logger } from '../utils/logger';

import { DebateEvent } from './events';
import type { GuardedHooks } from './guarded-hooks';
import { NodeType } from './types';

/**
 * Context passed to nodes during execution: the current state and everything
 * needed to build and dispatch a round.
 */
export interface NodeContext {
  state: DebateState;
  dispatcher: Dispatcher;
  routing: RoutingInputs;
  templates: PromptTemplates;
  /** Per-alias text prepended to every prompt for that alias. */
  panelistContext: Readonly<Record<string, string>>;
  hooks: GuardedHooks;
  logger: Logger;
}

/**
 * Result returned by a node after execution.
 * Contains the event to trigger transitions and optional context updates.
 */
export interface NodeResult {
  event: DebateEvent;
  updatedContext?: Partial<NodeContext>;
  /**
   * Applies the updated context to the given context, returning a new merged context.
   * If no updates are present, returns the original context unchanged.
   */
  applyToContext(context: NodeContext): NodeContext;
}

/**
 * Implementation of NodeResult that encapsulates creation logic.
 */
export class NodeResultImpl implements NodeResult {
  event: DebateEvent;
  updatedContext?: Partial<NodeContext>;

  private constructor(event: DebateEvent, updatedContext?: Partial<NodeContext>) {
    this.event = event;
    if (updatedContext !== undefined) {
      this.updatedContext = updatedContext;
    }
  }

  applyToContext(context: NodeContext): NodeContext {
    if (!this.updatedContext) {
      return context;
    }
    return { ...context, ...this.updatedContext };
  }

  /**
   * Creates a NodeResult instance.
   *
   * @param event - The debate event to trigger transitions.
   * @param updatedContext - Optional partial context updates to merge into the current context.
   */
  static createResult(event: DebateEvent, updatedContext?: Partial<NodeContext>): NodeResult {
    return new NodeResultImpl(event, updatedContext);
  }
}

/**
 * Base interface for all debate state machine nodes.
 */
export interface DebateNode {
  readonly nodeType: NodeType;
  execute(context: NodeContext): Promise<NodeResult>;
}
