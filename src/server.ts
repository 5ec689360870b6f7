import Fastify from 'fastify';
import { config } from './config';
import type { RecordStore } from './contracts/recordStore';
import { InventoryEngine } from './records/engine';
import { SessionCache } from './records/sessionCache';
import { registerInventoryRoutes } from './routes/inventory';
import { createRecordStore } from './storage';
import type { InventoryRecord } from './types';

export interface BuildAppOptions {
  store?: RecordStore;
  cacheTtlMs?: number;
  lowStockThreshold?: number;
  now?: () => Date;
  logger?: boolean | { level: string };
}

export async function buildApp(options: BuildAppOptions = {}) {
  const app = Fastify({ logger: options.logger ?? false });
  const store = options.store ?? createRecordStore();

  const engine = new InventoryEngine({
    store,
    cache: new SessionCache<InventoryRecord[]>({
      ttlMs: options.cacheTtlMs ?? config.cache.ttlSeconds * 1000,
    }),
    now: options.now,
    lowStockThreshold: options.lowStockThreshold ?? config.lowStockThreshold,
    logger: app.log,
  });

  app.get('/health', async () => {
    try {
      await store.ping();
      return { status: 'ok', store: 'ok' };
    } catch (err) {
      app.log.error({ err }, 'Store health check failed');
      return { status: 'degraded', store: 'error' };
    }
  });

  await registerInventoryRoutes(app, engine);
  return app;
}
