export class StayhoundError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A single source failed to produce candidates. The pass continues without it. */
export class FetchError extends StayhoundError {
  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${source}] ${message}`, options);
  }
}

/** Durable storage failed. Ends the current pass; the next cadence retries. */
export class StorageError extends StayhoundError {
  constructor(
    readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super(`Storage operation "${operation}" failed: ${describeError(options?.cause)}`, options);
  }
}

export class NotifyError extends StayhoundError {}

export class ConfigError extends StayhoundError {}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}
