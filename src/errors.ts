/**
 * Error taxonomy shared by the ingestion, index and retrieval layers.
 *
 * Every error raised on purpose carries a `kind` so callers can branch on it
 * without `instanceof` chains; the MCP boundary maps kinds to protocol codes.
 */
export type RagErrorKind =
  | "input"
  | "embedding_unavailable"
  | "index_corruption"
  | "not_found"
  | "invariant_violation";

/** Base class for every error this package throws deliberately. */
export class RagError extends Error {
  public readonly kind: RagErrorKind;
  /** Document the error is scoped to, when there is one. */
  public readonly documentId?: string;

  public constructor(
    kind: RagErrorKind,
    message: string,
    options: { documentId?: string; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "RagError";
    this.kind = kind;
    this.documentId = options.documentId;
  }
}

/** Unreadable, empty or unsupported upload; also a blank query. */
export class InputError extends RagError {
  public constructor(message: string, options: { documentId?: string; cause?: unknown } = {}) {
    super("input", message, options);
    this.name = "InputError";
  }
}

/** The embedding backend could not be reached or answered nonsense. Retryable. */
export class EmbeddingUnavailable extends RagError {
  public constructor(message: string, options: { documentId?: string; cause?: unknown } = {}) {
    super("embedding_unavailable", message, options);
    this.name = "EmbeddingUnavailable";
  }
}

/** Chunk and vector sets of a document disagree. */
export class IndexCorruption extends RagError {
  public constructor(documentId: string, message: string) {
    super("index_corruption", message, { documentId });
    this.name = "IndexCorruption";
  }
}

/** Referenced document does not exist for the caller. */
export class NotFound extends RagError {
  public constructor(documentId: string) {
    super("not_found", `Document not found: ${documentId}`, { documentId });
    this.name = "NotFound";
  }
}

/**
 * Programming-level violation (dimension mismatch, duplicate chunk id,
 * illegal status transition). Never expected at runtime.
 */
export class InvariantViolation extends RagError {
  public constructor(message: string, options: { documentId?: string } = {}) {
    super("invariant_violation", message, options);
    this.name = "InvariantViolation";
  }
}

export function isRagError(e: unknown): e is RagError {
  return e instanceof RagError;
}

/** Human-readable one-liner for logs and the `reason` column. */
export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
