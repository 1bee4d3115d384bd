import type { TagRole } from '../shared/schema.js';
import type { UploadStage } from '../shared/types.js';

/**
 * Error taxonomy for the sync pipeline.
 *
 * Every failure reaches the caller with the label, stage or file it concerns.
 * Nothing is downgraded to a warning.
 */
export type SyncErrorCategory =
  | 'SCHEMA_MISMATCH'
  | 'LABEL_RESOLUTION_FAILED'
  | 'UPLOAD_FAILED'
  | 'INVALID_STAGE'
  | 'PERSISTENCE_FAILED'
  | 'STORE_REQUEST_FAILED'
  | 'CONFIGURATION_ERROR';

export class SyncError extends Error {
  readonly category: SyncErrorCategory;

  constructor(category: SyncErrorCategory, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.category = category;
  }
}

/** A label has no resolved id, or a field value does not fit its remote type. Not retryable. */
export class SchemaMismatchError extends SyncError {
  constructor(message: string) {
    super('SCHEMA_MISMATCH', message);
  }
}

/** Remote lookup of a label failed; resolution was abandoned at this label */
export class LabelResolutionError extends SyncError {
  readonly label: string;
  readonly role: TagRole;

  constructor(role: TagRole, label: string, cause: unknown) {
    super('LABEL_RESOLUTION_FAILED', `Failed to resolve ${role} label "${label}": ${describeError(cause)}`, { cause });
    this.label = label;
    this.role = role;
  }
}

/** A remote write failed; the article stays at `stage` */
export class UploadError extends SyncError {
  readonly stage: UploadStage;
  readonly articleTitle: string;

  constructor(stage: UploadStage, articleTitle: string, cause: unknown) {
    super('UPLOAD_FAILED', `Upload of "${articleTitle}" failed at stage ${stage}: ${describeError(cause)}`, { cause });
    this.stage = stage;
    this.articleTitle = articleTitle;
  }
}

/** An operation was attempted on a graph that is not in the stage it needs */
export class StageError extends SyncError {
  constructor(message: string) {
    super('INVALID_STAGE', message);
  }
}

export class PersistenceError extends SyncError {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super('PERSISTENCE_FAILED', `${message} (${path})${cause === undefined ? '' : `: ${describeError(cause)}`}`, { cause });
    this.path = path;
  }
}

/** HTTP or API-level failure reported by the remote store */
export class StoreRequestError extends SyncError {
  readonly code: string;

  constructor(code: string, message: string) {
    super('STORE_REQUEST_FAILED', message);
    this.code = code;
  }
}

/** Missing or malformed settings */
export class ConfigError extends SyncError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
