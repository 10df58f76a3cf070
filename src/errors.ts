/**
 * Error taxonomy for request handling. Each error carries a stable `kind`
 * that transports map onto status codes; abstention is a successful result
 * and has no error type.
 */
export type ErrorKind =
  | "missing_fields"
  | "invalid_input"
  | "not_found"
  | "storage"
  | "generation";

export abstract class RagError extends Error {
  public abstract readonly kind: ErrorKind;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A required request field is absent or empty. */
export class MissingFieldsError extends RagError {
  public readonly kind = "missing_fields";

  public constructor(public readonly fields: string[]) {
    super(`Missing required fields: ${fields.join(", ")}`);
  }
}

/** A field is present but cannot be used (e.g. a version containing the slug marker). */
export class InvalidInputError extends RagError {
  public readonly kind = "invalid_input";

  public constructor(message: string) {
    super(message);
  }
}

/** The resolved slug has no base corpus. */
export class NotFoundError extends RagError {
  public readonly kind = "not_found";

  public constructor(
    public readonly project: string,
    public readonly version: string,
  ) {
    super(`No index found for ${project}/${version}`);
  }
}

/** Durable write failed; the request that triggered it must not mutate any index. */
export class StorageWriteFailure extends RagError {
  public readonly kind = "storage";

  public constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

/** A persisted index exists but could not be read back. */
export class IndexLoadError extends RagError {
  public readonly kind = "storage";

  public constructor(
    public readonly dir: string,
    cause?: unknown,
  ) {
    super(`Failed to load index from ${dir}`, { cause });
  }
}

/** Embedding or generation provider failure (quota, auth, timeout). */
export class GenerationError extends RagError {
  public readonly kind = "generation";

  public constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export function isRagError(e: unknown): e is RagError {
  return e instanceof RagError;
}

/** Render an unknown thrown value for a log line. */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
