import { describeError } from '../../core/utils/timestamp.util';

export class ReconciliationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The uploaded file could not be opened or introspected as a database
 */
export class MalformedDatabaseError extends ReconciliationError {
  constructor(cause: unknown) {
    super(`Uploaded file is not a readable database: ${describeError(cause)}`, {
      cause,
    });
  }
}

export class MergeFailedError extends ReconciliationError {
  constructor(
    readonly table: string | null,
    cause: unknown,
  ) {
    super(
      table
        ? `Merge failed on table "${table}": ${describeError(cause)}`
        : `Merge failed: ${describeError(cause)}`,
      { cause },
    );
  }
}

export class ReconciliationInProgressError extends ReconciliationError {
  constructor() {
    super('Another database import or recovery is already running');
  }
}
