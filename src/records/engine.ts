import type { FastifyBaseLogger } from 'fastify';
import type { RecordStore } from '../contracts/recordStore';
import { InvalidRecordError, RecordNotFoundError, VersionConflictError } from '../errors';
import type { InventoryRecord, NewRecordArgs, RecordName, Version } from '../types';
import { clampQuantity, formatDate, readText, toStoreRow } from './codec';
import { SessionCache } from './sessionCache';
import { INITIAL_VERSION, loadCollection } from './versioning';

export interface InventoryEngineOptions {
  store: RecordStore;
  cache?: SessionCache<InventoryRecord[]>;
  now?: () => Date;
  /** Records at or below this quantity are reported as low stock. */
  lowStockThreshold?: number;
  logger?: FastifyBaseLogger;
}

export interface MutationResult {
  message: string;
  record: InventoryRecord;
}

export interface DeleteResult {
  message: string;
  name: RecordName;
  version: Version;
}

export interface InventoryView {
  threshold: number;
  normal: InventoryRecord[];
  lowStock: InventoryRecord[];
}

interface AppliedChange<T> {
  records: InventoryRecord[];
  result: T;
}

const DEFAULT_LOW_STOCK_THRESHOLD = 1;
const DEFAULT_NEW_QUANTITY = 1;

/**
 * Version-checked mutations over a whole-table store.
 *
 * Every mutation of an existing record re-reads the table straight from the
 * store, compares the caller's expected version with the stored one and only
 * then writes the full table back with the version bumped by one. The session
 * cache is used for display reads only and is dropped after each successful
 * write.
 *
 * Mutations in one engine run strictly one after another. Writers in other
 * processes are only kept apart if the store serialises writes, since the
 * read and the write are separate store calls.
 */
export class InventoryEngine {
  private readonly store: RecordStore;
  private readonly cache: SessionCache<InventoryRecord[]>;
  private readonly now: () => Date;
  private readonly lowStockThreshold: number;
  private readonly logger?: FastifyBaseLogger;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: InventoryEngineOptions) {
    this.store = options.store;
    this.cache = options.cache ?? new SessionCache<InventoryRecord[]>();
    this.now = options.now ?? (() => new Date());
    this.lowStockThreshold = options.lowStockThreshold ?? DEFAULT_LOW_STOCK_THRESHOLD;
    this.logger = options.logger;
  }

  async listRecords(): Promise<InventoryRecord[]> {
    const records = await this.cache.get(() => this.readAuthoritative());
    return records.map((record) => ({ ...record }));
  }

  async getRecord(name: RecordName): Promise<InventoryRecord> {
    const records = await this.listRecords();
    const record = records.find((candidate) => candidate.name === name);
    if (!record) throw new RecordNotFoundError(name);
    return record;
  }

  async inventoryView(): Promise<InventoryView> {
    const records = await this.listRecords();
    return {
      threshold: this.lowStockThreshold,
      normal: records.filter((record) => record.quantity > this.lowStockThreshold),
      lowStock: records.filter((record) => record.quantity <= this.lowStockThreshold),
    };
  }

  async updateQuantityAndDate(
    name: RecordName,
    newQuantity: number,
    expectedVersion: Version,
  ): Promise<MutationResult> {
    return this.setQuantity(name, expectedVersion, () => newQuantity);
  }

  /** Adds `delta` to the stored quantity; the result never drops below zero. */
  async adjustQuantity(name: RecordName, delta: number, expectedVersion: Version): Promise<MutationResult> {
    return this.setQuantity(name, expectedVersion, (current) => current.quantity + delta);
  }

  async updateNotes(name: RecordName, newNotes: string, expectedVersion: Version): Promise<MutationResult> {
    return this.mutate(name, expectedVersion, (records, index, current) => {
      const record: InventoryRecord = {
        ...current,
        notes: readText(newNotes),
        version: expectedVersion + 1,
      };
      return {
        records: replaceAt(records, index, record),
        result: { message: `Notes updated for '${name}'.`, record },
      };
    });
  }

  async deleteRecord(name: RecordName, expectedVersion: Version): Promise<DeleteResult> {
    return this.mutate(name, expectedVersion, (records, index, current) => ({
      records: records.filter((_, position) => position !== index),
      result: {
        message: `Deleted '${name}' from the inventory.`,
        name,
        version: current.version,
      },
    }));
  }

  /** Appends a new record at version 1. There is no prior version, so nothing is checked. */
  async addRecord(args: NewRecordArgs): Promise<MutationResult> {
    const name = args.name.trim();
    if (!name) {
      throw new InvalidRecordError('Please enter a name for the item.');
    }

    return this.exclusive(async () => {
      const records = await this.readAuthoritative();
      const record: InventoryRecord = {
        name,
        image: readText(args.image),
        quantity: clampQuantity(args.quantity ?? DEFAULT_NEW_QUANTITY),
        notes: readText(args.notes),
        lastModified: formatDate(this.now()),
        version: INITIAL_VERSION,
      };

      await this.store.writeAll([...records, record].map(toStoreRow));
      this.cache.invalidate();
      this.logger?.info({ name, version: record.version }, 'Inventory record added');
      return { message: `Added '${name}' to the inventory.`, record };
    });
  }

  private async setQuantity(
    name: RecordName,
    expectedVersion: Version,
    next: (current: InventoryRecord) => number,
  ): Promise<MutationResult> {
    return this.mutate(name, expectedVersion, (records, index, current) => {
      const record: InventoryRecord = {
        ...current,
        quantity: clampQuantity(next(current)),
        lastModified: formatDate(this.now()),
        version: expectedVersion + 1,
      };
      return {
        records: replaceAt(records, index, record),
        result: { message: `Quantity and date updated for '${name}'.`, record },
      };
    });
  }

  private async mutate<T>(
    name: RecordName,
    expectedVersion: Version,
    apply: (records: InventoryRecord[], index: number, current: InventoryRecord) => AppliedChange<T>,
  ): Promise<T> {
    return this.exclusive(async () => {
      // never served from the cache: the version check needs the stored value
      const records = await this.readAuthoritative();
      const index = records.findIndex((record) => record.name === name);
      const current = records[index];
      if (index === -1 || !current) {
        this.logger?.warn({ name, expectedVersion }, 'Inventory record not found');
        throw new RecordNotFoundError(name);
      }

      if (current.version !== expectedVersion) {
        this.logger?.warn(
          { name, expectedVersion, currentVersion: current.version },
          'Rejected stale inventory write',
        );
        throw new VersionConflictError(name, expectedVersion, current.version);
      }

      const change = apply(records, index, current);
      await this.store.writeAll(change.records.map(toStoreRow));
      this.cache.invalidate();
      this.logger?.info({ name, version: expectedVersion + 1 }, 'Inventory record written');
      return change.result;
    });
  }

  /**
   * Runs `task` after every mutation queued before it has settled. Each task
   * covers the verifying read through the write and the cache invalidation, so
   * two requests in this process never interleave between check and write.
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async readAuthoritative(): Promise<InventoryRecord[]> {
    const rows = await this.store.readAll();
    const { records, repairs } = loadCollection(rows);
    if (repairs.length > 0) {
      this.logger?.warn({ repairs }, 'Repaired malformed inventory cells on load');
    }
    return records;
  }
}

function replaceAt<T>(items: T[], index: number, value: T): T[] {
  return items.map((item, position) => (position === index ? value : item));
}
