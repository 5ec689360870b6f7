import { config } from '../config';
import { StoreRejectedError, StoreUnavailableError } from '../errors';
import { getRedis } from '../redis/client';
import type { RecordStore } from '../contracts/recordStore';
import type { StoreRow, StoreRowInput } from '../types';
import { assertWritableRows, storeTableSchema, toRowInput } from './rowSchema';

/** The handful of Redis commands the table needs. `ioredis` satisfies it. */
export interface TableClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  ping(): Promise<unknown>;
}

export interface RedisRecordStoreOptions {
  tableKey?: string;
  client?: () => TableClient;
}

/**
 * Implements `RecordStore` by keeping the whole table as one JSON array under a
 * single key. Each write replaces the array, mirroring a spreadsheet's
 * read-sheet / write-sheet API.
 */
export class RedisRecordStore implements RecordStore {
  private readonly tableKey: string;
  private readonly client: () => TableClient;

  constructor(options: RedisRecordStoreOptions = {}) {
    this.tableKey = options.tableKey ?? config.store.tableKey;
    this.client = options.client ?? getRedis;
  }

  async readAll(): Promise<StoreRowInput[]> {
    let raw: string | null;
    try {
      raw = await this.client().get(this.tableKey);
    } catch (err) {
      throw new StoreUnavailableError(describe(err), { cause: err });
    }
    if (raw === null) return [];

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      throw new StoreUnavailableError(`table '${this.tableKey}' is not valid JSON`, { cause: err });
    }

    const parsed = storeTableSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new StoreUnavailableError(`table '${this.tableKey}' is not an array of rows`);
    }
    return parsed.data.map(toRowInput);
  }

  async writeAll(rows: StoreRow[]): Promise<void> {
    const payload = JSON.stringify(assertWritableRows(rows));
    try {
      await this.client().set(this.tableKey, payload);
    } catch (err) {
      if (isReplyError(err)) {
        throw new StoreRejectedError(err.message, { cause: err });
      }
      throw new StoreUnavailableError(describe(err), { cause: err });
    }
  }

  async ping(): Promise<void> {
    try {
      await this.client().ping();
    } catch (err) {
      throw new StoreUnavailableError(describe(err), { cause: err });
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ioredis reports server-side refusals (OOM, READONLY, WRONGTYPE) as ReplyError
function isReplyError(err: unknown): err is Error {
  return err instanceof Error && err.name === 'ReplyError';
}
