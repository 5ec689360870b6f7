import { StoreUnavailableError } from '../errors';
import type { RecordStore } from '../contracts/recordStore';
import type { StoreRow, StoreRowInput } from '../types';
import { assertWritableRows } from './rowSchema';

type StoreOperation = 'read' | 'write';

/**
 * In-process table. Rows are copied on the way in and out so callers can never
 * alias the stored state. Used for local runs and as the tests' backing store.
 */
export class MemoryRecordStore implements RecordStore {
  private rows: StoreRowInput[];
  private readonly pending = new Map<StoreOperation, Error>();
  reads = 0;
  writes = 0;

  constructor(rows: StoreRowInput[] = []) {
    this.rows = rows.map((row) => ({ ...row }));
  }

  async readAll(): Promise<StoreRowInput[]> {
    this.takeFailure('read');
    this.reads += 1;
    return this.rows.map((row) => ({ ...row }));
  }

  async writeAll(rows: StoreRow[]): Promise<void> {
    this.takeFailure('write');
    const valid = assertWritableRows(rows);
    this.writes += 1;
    this.rows = valid.map((row) => ({ ...row }));
  }

  async ping(): Promise<void> {
    this.takeFailure('read');
  }

  /** Makes the next `op` call throw `err` (a `StoreUnavailableError` by default). */
  failNext(op: StoreOperation, err: Error = new StoreUnavailableError(`simulated ${op} failure`)): void {
    this.pending.set(op, err);
  }

  /** Current stored rows, copied. */
  snapshot(): StoreRowInput[] {
    return this.rows.map((row) => ({ ...row }));
  }

  private takeFailure(op: StoreOperation): void {
    const err = this.pending.get(op);
    if (!err) return;
    this.pending.delete(op);
    throw err;
  }
}
