// ---------------------------------------------------------------------------
// Storage errors
// ---------------------------------------------------------------------------

/** A durable write failed (directory not writable, disk full, ...). */
export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class NotFoundError extends Error {
  constructor(
    readonly entity: 'project' | 'version',
    readonly id: string,
    message = `${entity === 'project' ? 'Project' : 'Version'} not found: ${id}`,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'NotFoundError';
  }
}

/**
 * The record exists on disk but cannot be read or does not match its schema.
 * Extends NotFoundError so callers that only care about "usable or not" can
 * catch one type; `instanceof CorruptRecordError` tells the two apart.
 */
export class CorruptRecordError extends NotFoundError {
  constructor(
    entity: 'project' | 'version',
    id: string,
    readonly recordPath: string,
    options?: { cause?: unknown },
  ) {
    super(entity, id, `Corrupt ${entity} record ${id} at ${recordPath}`, options);
    this.name = 'CorruptRecordError';
  }
}

export class ParentNotFoundError extends Error {
  constructor(
    readonly projectId: string,
    readonly parentId: string,
  ) {
    super(`Parent version ${parentId} does not exist in project ${projectId}`);
    this.name = 'ParentNotFoundError';
  }
}

// ---------------------------------------------------------------------------
// Render errors
// ---------------------------------------------------------------------------

export class ManagerClosedError extends Error {
  constructor() {
    super('Render job manager has been shut down');
    this.name = 'ManagerClosedError';
  }
}

export class WorkerStateError extends Error {
  constructor(state: string) {
    super(`Render worker cannot start from state "${state}"`);
    this.name = 'WorkerStateError';
  }
}

/** Best-effort message extraction for unknown thrown values. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
