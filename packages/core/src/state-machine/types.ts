/**
 * Node type constants for the debate state machine.
 * Each node represents a distinct phase of the debate flow.
 */
export const NODE_TYPES = {
  INITIAL: 'initial',
  ROUND_MANAGER: 'round_manager',
  REFLECTION: 'reflection',
  SYNTHESIS: 'synthesis',
} as const;

/**
 * Union type of all node types.
 */
export type NodeType = typeof NODE_TYPES[keyof typeof NODE_TYPES];

// Re-export node types for convenience
export type { DebateNode, NodeContext } from './node';
