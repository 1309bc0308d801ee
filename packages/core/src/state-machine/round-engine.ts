import type { Dispatcher } from '../dispatch/batch-dispatcher';
import type { PromptTemplates } from '../prompts/debate-prompts';
import type { RoutingInputs } from '../routing/routing-resolver';
import type { DebateHooks, DebateState, RoundObserver } from '../types/debate.types';
import { defaultLogger, Logger } from '../utils/logger';

import { TransitionGraph } from './graph';
import { GuardedHooks } from './guarded-hooks';
import { DebateNode, NodeContext } from './node';
import { InitialNode } from './nodes/initial-node';
import { ReflectionNode } from './nodes/reflection-node';
import { RoundManagerNode } from './nodes/round-manager-node';
import { SynthesisNode } from './nodes/synthesis-node';
import { NODE_TYPES, NodeType } from './types';

export interface RoundEngineOptions {
  dispatcher: Dispatcher;
  routing: RoutingInputs;
  templates: PromptTemplates;
  panelistContext?: Readonly<Record<string, string>>;
  hooks?: DebateHooks;
  /** Per-run round observer, called after `hooks.onRoundComplete`. */
  onRoundComplete?: RoundObserver;
  logger?: Logger;
}

/**
 * Drives one debate through the node graph: initial round, reflection rounds
 * until the configured count, then synthesis. Each node awaits its whole batch
 * before the next node starts, so rounds never overlap.
 */
export class RoundEngine {
  private readonly graph: TransitionGraph;
  private readonly nodes: Map<NodeType, DebateNode>;
  private readonly logger: Logger;

  constructor(private readonly options: RoundEngineOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.graph = new TransitionGraph(undefined, this.logger);
    this.nodes = this.createNodes();
  }

  /**
   * Creates all node instances for the state machine.
   */
  private createNodes(): Map<NodeType, DebateNode> {
    const nodes = new Map<NodeType, DebateNode>();
    nodes.set(NODE_TYPES.INITIAL, new InitialNode());
    nodes.set(NODE_TYPES.ROUND_MANAGER, new RoundManagerNode());
    nodes.set(NODE_TYPES.REFLECTION, new ReflectionNode());
    nodes.set(NODE_TYPES.SYNTHESIS, new SynthesisNode());
    return nodes;
  }

  private createNodeContext(state: DebateState): NodeContext {
    const { dispatcher, routing, templates, panelistContext, hooks, onRoundComplete } = this.options;
    return {
      state,
      dispatcher,
      routing,
      templates,
      panelistContext: panelistContext ?? {},
      hooks: new GuardedHooks(hooks ?? {}, this.logger, onRoundComplete),
      logger: this.logger,
    };
  }

  /**
   * Verifies that a node is registered for the given node type.
   *
   * @throws {Error} If no node is registered.
   */
  private verifyNode(node: DebateNode | undefined, nodeType: NodeType): DebateNode {
    if (!node) {
      throw new Error(`Node not found: ${nodeType}`);
    }
    return node;
  }

  /**
   * Runs the debate from `startNode` until the terminal transition.
   *
   * @param initialState - State with query, panel, synthesizer and round count. Empty
   * `rounds` when starting at the initial node; earlier rounds when resuming at the round manager.
   * @returns The final state with every round and the synthesis result.
   */
  async run(initialState: DebateState, startNode: NodeType = NODE_TYPES.INITIAL): Promise<DebateState> {
    let nodeContext = this.createNodeContext(initialState);
    let currentNode: NodeType | null = startNode;

    while (currentNode !== null) {
      const node = this.verifyNode(this.nodes.get(currentNode), currentNode);
      const result = await node.execute(nodeContext);
      nodeContext = result.applyToContext(nodeContext);
      currentNode = this.graph.getNextNode(currentNode, result.event, nodeContext);
    }

    return nodeContext.state;
  }
}
