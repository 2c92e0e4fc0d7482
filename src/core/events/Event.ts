export type EventData = Record<string, unknown>;

/**
 * A named event carrying a subject and a mutable data bag. Listeners can stop
 * propagation; the last non-undefined listener return value is kept as `result`.
 */
export class Event<TSubject = unknown> {
  result: unknown;
  private stopped = false;

  constructor(
    readonly name: string,
    readonly subject?: TSubject,
    public data: EventData = {},
  ) {}

  stopPropagation(): void {
    this.stopped = true;
  }

  isStopped(): boolean {
    return this.stopped;
  }
}
