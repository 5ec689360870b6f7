import 'dotenv/config';

export type StoreDriver = 'redis' | 'memory';

const DEFAULT_CACHE_TTL_SECONDS = 600;
const DEFAULT_LOW_STOCK_THRESHOLD = 1;

export function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseDriver(value: string | undefined): StoreDriver {
  if (!value || value === 'redis') return 'redis';
  if (value === 'memory') return 'memory';
  throw new Error(`Unsupported STORE_DRIVER: ${value}`);
}

export const config = {
  port: intFromEnv(process.env.PORT, 8080),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
  store: {
    driver: parseDriver(process.env.STORE_DRIVER),
    tableKey: process.env.INVENTORY_TABLE_KEY || 'inventory:table',
  },
  cache: {
    ttlSeconds: intFromEnv(process.env.CACHE_TTL_SECONDS, DEFAULT_CACHE_TTL_SECONDS),
  },
  // items at or below this quantity are listed as low stock
  lowStockThreshold: intFromEnv(process.env.LOW_STOCK_THRESHOLD, DEFAULT_LOW_STOCK_THRESHOLD),
};
