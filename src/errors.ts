/**
 * Error taxonomy for the memory core
 *
 * Provider failures are transient and always recoverable: callers receive
 * them inside result objects, never as thrown exceptions.
 */

export class EmbeddingUnavailableError extends Error {
  readonly kind = "embedding_unavailable" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingUnavailableError";
  }
}

export class IncompatibleEmbeddingError extends Error {
  readonly kind = "incompatible_embedding" as const;

  constructor(
    message: string,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(message);
    this.name = "IncompatibleEmbeddingError";
  }
}

export class SummarizationFailedError extends Error {
  readonly kind = "summarization_failed" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SummarizationFailedError";
  }
}

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    readonly issues: string[],
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

export type EmbeddingFailure = EmbeddingUnavailableError | IncompatibleEmbeddingError;

export type Result<T, E extends Error = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/** Wrap an arbitrary thrown value as an EmbeddingUnavailableError, keeping typed failures as-is. */
export function toEmbeddingFailure(err: unknown): EmbeddingFailure {
  if (err instanceof EmbeddingUnavailableError || err instanceof IncompatibleEmbeddingError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new EmbeddingUnavailableError(message, { cause: err });
}

export function toSummarizationFailure(err: unknown): SummarizationFailedError {
  if (err instanceof SummarizationFailedError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new SummarizationFailedError(message, { cause: err });
}
