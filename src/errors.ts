/** A single schedule record could not be read. The batch carries on without it. */
export class RecordParseError extends Error {
  constructor(
    message: string,
    readonly field?: string
  ) {
    super(message);
    this.name = "RecordParseError";
  }
}

/** The schedule as a whole could not be obtained; the caller decides whether to retry. */
export class ScheduleUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScheduleUnavailableError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
