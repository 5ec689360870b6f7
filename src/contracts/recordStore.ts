import type { StoreRow, StoreRowInput } from '../types';

/**
 * Whole-table access to the backing store. There is no row-level write and no
 * locking here; version checks happen in the engine above.
 *
 * Implementations throw `StoreUnavailableError` on transport failures and
 * `StoreRejectedError` when a write is refused.
 */
export interface RecordStore {
  readAll(): Promise<StoreRowInput[]>;
  /** Replaces the entire table contents with `rows`. */
  writeAll(rows: StoreRow[]): Promise<void>;
  ping(): Promise<void>;
}
