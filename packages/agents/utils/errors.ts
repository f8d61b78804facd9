// Error taxonomy. Only ConfigError is meant to reach a caller of the pipeline.

/** An external call exceeded its time budget */
export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** Structured output could not be recovered from the model's reply */
export class MalformedOutputError extends Error {
  constructor(readonly raw: string) {
    super('Model output did not contain a parseable JSON object');
    this.name = 'MalformedOutputError';
  }
}

/** Invalid settings or a violated call contract, raised before any work starts */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
