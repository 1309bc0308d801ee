import type { Langfuse } from 'langfuse';

/**
 * String literal constants for trace options.
 */
export const TRACE_OPTIONS = {
  LANGFUSE: 'langfuse',
} as const;

/**
 * Union type of all trace options.
 */
export type TraceOption = (typeof TRACE_OPTIONS)[keyof typeof TRACE_OPTIONS];

/**
 * Metadata to include in the top-level Langfuse trace.
 */
export interface TraceMetadata {
  /** Transcript id of the debate being traced. */
  transcriptId: string;
  query: string;
  panel: string[];
  synthesizer: string;
  rounds: number;
  /** Configuration file name used for this debate, if any. */
  configFileName?: string;
}

/**
 * String literal constants for span level values.
 */
export const SPAN_LEVEL = {
  ERROR: 'ERROR',
} as const;

export type SpanLevel = (typeof SPAN_LEVEL)[keyof typeof SPAN_LEVEL];

export type LangfuseTrace = ReturnType<Langfuse['trace']>;

/**
 * Type alias for a Langfuse generation object created on a trace.
 */
export type LangfuseGeneration = ReturnType<LangfuseTrace['generation']>;

/**
 * Context object for tracing operations: the Langfuse client and the top-level
 * trace for one debate. Not part of the transcript.
 */
export interface TracingContext {
  langfuse: Langfuse;
  trace: LangfuseTrace;
}
