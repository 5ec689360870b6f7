import { config } from '../config';
import type { RecordStore } from '../contracts/recordStore';
import { MemoryRecordStore } from './memoryRecordStore';
import { RedisRecordStore } from './redisRecordStore';

export function createRecordStore(): RecordStore {
  switch (config.store.driver) {
    case 'redis':
      return new RedisRecordStore({ tableKey: config.store.tableKey });
    case 'memory':
      return new MemoryRecordStore();
    default:
      throw new Error(`Unsupported store driver: ${String(config.store.driver)}`);
  }
}
