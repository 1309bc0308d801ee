// In-process stand-in for the langfuse package; no events leave the test process.
export interface RecordedTrace {
  id: string;
  name?: unknown;
  generation: jest.Mock;
}

export class Langfuse {
  readonly traces: RecordedTrace[] = [];
  readonly flushAsync = jest.fn((): Promise<void> => Promise.resolve());

  constructor(readonly config?: unknown) {}

  trace(body?: { name?: unknown }): RecordedTrace {
    const recorded: RecordedTrace = {
      id: `mock-trace-${this.traces.length + 1}`,
      name: body?.name,
      generation: jest.fn().mockReturnValue({ end: jest.fn() }),
    };
    this.traces.push(recorded);
    return recorded;
  }
}
