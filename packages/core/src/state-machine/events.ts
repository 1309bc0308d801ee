/**
 * Event constants for the debate state machine.
 * These events drive transitions between nodes in the debate flow.
 */
export const DEBATE_EVENTS = {
  INITIAL_COMPLETE: 'INITIAL_COMPLETE',
  BEGIN_REFLECTION: 'BEGIN_REFLECTION',
  REFLECTION_COMPLETE: 'REFLECTION_COMPLETE',
  MAX_ROUNDS_REACHED: 'MAX_ROUNDS_REACHED',
  COMPLETE: 'COMPLETE',
} as const;

export type DebateEventType = keyof typeof DEBATE_EVENTS;

/**
 * Event type representing a debate state machine event.
 */
export interface DebateEvent {
  type: DebateEventType;
  payload?: Record<string, unknown> | undefined;
  timestamp: Date;
}

/**
 * Factory function to create a DebateEvent with a timestamp.
 *
 * @param type - The event type (must be a key of DEBATE_EVENTS)
 * @param payload - Optional payload data for the event
 * @returns A DebateEvent with the current timestamp
 */
export function createEvent(type: DebateEventType, payload?: Record<string, unknown> | undefined): DebateEvent {
  return {
    type,
    ...(payload !== undefined && { payload }),
    timestamp: new Date(),
  };
}
