export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ExtractionError extends SyncError {}

export class StatementApplyError extends SyncError {
  constructor(
    readonly index: number,
    readonly statement: string,
    cause: unknown
  ) {
    super(`Statement #${index + 1} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
