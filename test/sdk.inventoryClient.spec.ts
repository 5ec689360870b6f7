import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InventoryClient } from '../src/sdk/inventoryClient';
import { buildApp } from '../src/server';
import { MemoryRecordStore } from '../src/storage/memoryRecordStore';

type AppInstance = Awaited<ReturnType<typeof buildApp>>;

const BASE_URL = 'http://inventory.test';

let app: AppInstance;

/** Routes fetch calls into the Fastify app in process. */
function injectFetch(target: AppInstance): typeof fetch {
  return async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    const parsed = new URL(url);
    const res = await target.inject({
      method: toMethod(init?.method),
      url: `${parsed.pathname}${parsed.search}`,
      headers: init?.body ? { 'content-type': 'application/json' } : undefined,
      payload: typeof init?.body === 'string' ? init.body : undefined,
    });
    return new Response(res.body, { status: res.statusCode });
  };
}

function toMethod(value: string | undefined): 'GET' | 'POST' | 'DELETE' {
  if (value === 'POST' || value === 'DELETE') return value;
  return 'GET';
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

beforeEach(async () => {
  const store = new MemoryRecordStore([
    { Image: '', Name: 'Rice', Quantity: 5, Notes: '', Date: '3/1/2026', Version: 2 },
  ]);
  app = await buildApp({ store, now: () => new Date(2026, 2, 14) });
});

afterEach(async () => {
  await app.close();
});

describe('InventoryClient', () => {
  it('reads, updates and then reports the stale version as a conflict', async () => {
    const client = new InventoryClient({ baseUrl: BASE_URL, fetch: injectFetch(app) });

    const read = await client.get('Rice');
    if (!read.ok) throw new Error(`unexpected failure: ${read.message}`);
    const seen = read.record.version;
    expect(seen).toBe(2);

    const updated = await client.setQuantity('Rice', 4, seen);
    expect(updated).toMatchObject({ ok: true, record: { quantity: 4, version: 3 } });

    const stale = await client.setQuantity('Rice', 3, seen);
    expect(stale).toEqual({
      ok: false,
      error: 'version_conflict',
      message:
        "Data for 'Rice' has been changed by another user. Please refresh the page to get the latest version.",
      expected_version: 2,
      current_version: 3,
    });
  });

  it('covers add, adjust, notes, view and remove', async () => {
    const client = new InventoryClient({ baseUrl: BASE_URL, fetch: injectFetch(app) });

    const added = await client.add({ name: 'Salt', quantity: 1 });
    expect(added).toMatchObject({ ok: true, record: { name: 'Salt', version: 1, last_modified: '3/14/2026' } });

    expect(await client.adjust('Salt', 2, 1)).toMatchObject({ ok: true, record: { quantity: 3, version: 2 } });
    expect(await client.updateNotes('Salt', 'sea salt', 2)).toMatchObject({
      ok: true,
      record: { notes: 'sea salt', version: 3 },
    });

    const view = await client.view();
    if (!view.ok) throw new Error(`unexpected failure: ${view.message}`);
    expect(view.normal.map((record) => record.name)).toEqual(['Rice', 'Salt']);
    expect(view.low_stock).toEqual([]);

    expect(await client.remove('Salt', 3)).toEqual({ ok: true, message: "Deleted 'Salt' from the inventory." });

    const list = await client.list();
    if (!list.ok) throw new Error(`unexpected failure: ${list.message}`);
    expect(list.records.map((record) => record.name)).toEqual(['Rice']);
  });

  it('returns not-found as an outcome rather than throwing', async () => {
    const client = new InventoryClient({ baseUrl: BASE_URL, fetch: injectFetch(app) });
    expect(await client.remove('Flour', 1)).toEqual({
      ok: false,
      error: 'record_not_found',
      message: "Item 'Flour' was not found. Please refresh the page.",
    });
  });

  it('sends JSON bodies to the configured base url', async () => {
    const calls: Array<{ url: string; init?: RequestInit }> = [];
    const fakeFetch: typeof fetch = async (input, init) => {
      calls.push({ url: String(input), init });
      return jsonResponse({ ok: true, message: "Deleted 'Rice' from the inventory." });
    };

    const client = new InventoryClient({ baseUrl: BASE_URL, fetch: fakeFetch });
    await client.remove('Rice', 2);

    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('http://inventory.test/inventory.delete');
    expect(calls[0]?.init?.method).toBe('DELETE');
    expect(calls[0]?.init?.body).toBe(JSON.stringify({ name: 'Rice', expected_version: 2 }));
  });

  it('throws on a body that is not JSON', async () => {
    const fakeFetch: typeof fetch = async () => new Response('upstream down', { status: 502, statusText: 'Bad Gateway' });
    const client = new InventoryClient({ baseUrl: BASE_URL, fetch: fakeFetch });
    await expect(client.list()).rejects.toThrow('GET /inventory.list failed: 502 Bad Gateway - upstream down');
  });

  it('throws on a JSON body of the wrong shape', async () => {
    const fakeFetch: typeof fetch = async () => jsonResponse({ rows: [] });
    const client = new InventoryClient({ baseUrl: BASE_URL, fetch: fakeFetch });
    await expect(client.list()).rejects.toThrow('GET /inventory.list returned an unexpected body (status 200)');
  });
});
