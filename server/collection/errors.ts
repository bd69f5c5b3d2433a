export type CollectionErrorCode =
  | "UNRESOLVED_IDENTITY"
  | "MALFORMED_RECORD"
  | "CORRUPT_PROGRESS_STORE"
  | "RECORD_STORE_UNAVAILABLE"
  | "INVALID_CONFIG";

/**
 * Base class for collection failures. `status` is read by the v1 error handler.
 */
export class CollectionError extends Error {
  constructor(
    readonly code: CollectionErrorCode,
    message: string,
    readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A raw university name matched nothing in the reference table. */
export class UnresolvedIdentityError extends CollectionError {
  constructor(
    readonly rawName: string,
    readonly bestCandidate: string | null = null,
    readonly confidence = 0,
  ) {
    const hint = bestCandidate ? ` (closest: "${bestCandidate}", confidence ${confidence.toFixed(2)})` : "";
    super("UNRESOLVED_IDENTITY", `Unresolved university name "${rawName}"${hint}`, 404);
  }
}

/** A record or filename whose financial year could not be determined. */
export class MalformedRecordError extends CollectionError {
  constructor(readonly source: string, reason: string) {
    super("MALFORMED_RECORD", `Malformed record ${source}: ${reason}`, 422);
  }
}

export class CorruptProgressStoreError extends CollectionError {
  constructor(readonly path: string, reason: string, cause?: unknown) {
    super("CORRUPT_PROGRESS_STORE", `Progress snapshot ${path} is unreadable: ${reason}`, 500, { cause });
  }
}

/** The record store cannot be read at all. Fatal for the run. */
export class RecordStoreUnavailableError extends CollectionError {
  constructor(reason: string, cause?: unknown) {
    super("RECORD_STORE_UNAVAILABLE", `Record store unavailable: ${reason}`, 503, { cause });
  }
}

export class InvalidConfigError extends CollectionError {
  constructor(message: string) {
    super("INVALID_CONFIG", message, 400);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
