import type { RecordName, Version } from './types';

export type InventoryErrorCode =
  | 'store_unavailable'
  | 'store_rejected'
  | 'record_not_found'
  | 'version_conflict'
  | 'invalid_record';

export abstract class InventoryError extends Error {
  abstract readonly code: InventoryErrorCode;
}

/** Transport or auth failure talking to the backing store. */
export class StoreUnavailableError extends InventoryError {
  readonly code = 'store_unavailable';

  constructor(detail: string, options?: { cause?: unknown }) {
    super(`The inventory store is unavailable: ${detail}`, options);
    this.name = 'StoreUnavailableError';
  }
}

/** The store refused a write, e.g. a row that does not fit the table schema. */
export class StoreRejectedError extends InventoryError {
  readonly code = 'store_rejected';

  constructor(detail: string, options?: { cause?: unknown }) {
    super(`The inventory store rejected the write: ${detail}`, options);
    this.name = 'StoreRejectedError';
  }
}

export class RecordNotFoundError extends InventoryError {
  readonly code = 'record_not_found';

  constructor(readonly recordName: RecordName) {
    super(`Item '${recordName}' was not found. Please refresh the page.`);
    this.name = 'RecordNotFoundError';
  }
}

export class VersionConflictError extends InventoryError {
  readonly code = 'version_conflict';

  constructor(
    readonly recordName: RecordName,
    readonly expectedVersion: Version,
    readonly currentVersion: Version,
  ) {
    super(
      `Data for '${recordName}' has been changed by another user. ` +
        'Please refresh the page to get the latest version.',
    );
    this.name = 'VersionConflictError';
  }
}

export class InvalidRecordError extends InventoryError {
  readonly code = 'invalid_record';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidRecordError';
  }
}

export function isInventoryError(err: unknown): err is InventoryError {
  return err instanceof InventoryError;
}
