import { z } from 'zod';

type FetchLike = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

const DEFAULT_BASE_URL = 'http://localhost:8080';

export interface InventoryClientOptions {
  /**
   * Location of the inventory service.
   */
  baseUrl?: string;
  /**
   * Allows dependency injection for testing.
   */
  fetch?: FetchLike;
}

const wireRecordSchema = z.object({
  name: z.string(),
  image: z.string().nullable(),
  quantity: z.number(),
  notes: z.string().nullable(),
  last_modified: z.string(),
  version: z.number(),
});

const failureSchema = z.object({
  ok: z.literal(false),
  error: z.string(),
  message: z.string(),
  expected_version: z.number().optional(),
  current_version: z.number().optional(),
});

const listSchema = z.object({ ok: z.literal(true), records: z.array(wireRecordSchema) });
const viewSchema = z.object({
  ok: z.literal(true),
  threshold: z.number(),
  normal: z.array(wireRecordSchema),
  low_stock: z.array(wireRecordSchema),
});
const recordSchema = z.object({ ok: z.literal(true), record: wireRecordSchema });
const mutationSchema = z.object({ ok: z.literal(true), message: z.string(), record: wireRecordSchema });
const deleteSchema = z.object({ ok: z.literal(true), message: z.string() });

export type WireRecord = z.infer<typeof wireRecordSchema>;
export type Failure = z.infer<typeof failureSchema>;
export type Outcome<T> = T | Failure;

export type ListOutcome = Outcome<z.infer<typeof listSchema>>;
export type ViewOutcome = Outcome<z.infer<typeof viewSchema>>;
export type RecordOutcome = Outcome<z.infer<typeof recordSchema>>;
export type MutationOutcome = Outcome<z.infer<typeof mutationSchema>>;
export type DeleteOutcome = Outcome<z.infer<typeof deleteSchema>>;

export interface AddItemInput {
  name: string;
  quantity?: number;
  image?: string;
  notes?: string;
}

/**
 * Thin HTTP client for the inventory service. Expected failures (not found,
 * version conflict, store errors) come back as `{ ok: false }` outcomes; only
 * transport errors and unreadable responses throw.
 *
 * Mutations never retry. After a `version_conflict` the caller should re-read
 * the record and decide again with the fresh version.
 */
export class InventoryClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: InventoryClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;

    const fetchImpl = options.fetch ?? globalThis.fetch;
    if (!fetchImpl) {
      throw new Error('A fetch implementation is required (provide options.fetch).');
    }
    this.fetchImpl = fetchImpl.bind ? fetchImpl.bind(globalThis) : fetchImpl;
  }

  list(): Promise<ListOutcome> {
    return this.request('GET', '/inventory.list', undefined, listSchema);
  }

  view(): Promise<ViewOutcome> {
    return this.request('GET', '/inventory.view', undefined, viewSchema);
  }

  get(name: string): Promise<RecordOutcome> {
    const qs = new URLSearchParams({ name });
    return this.request('GET', `/inventory.get?${qs.toString()}`, undefined, recordSchema);
  }

  add(input: AddItemInput): Promise<MutationOutcome> {
    return this.request('POST', '/inventory.add', input, mutationSchema);
  }

  setQuantity(name: string, quantity: number, expectedVersion: number): Promise<MutationOutcome> {
    return this.request(
      'POST',
      '/inventory.quantity',
      { name, quantity, expected_version: expectedVersion },
      mutationSchema,
    );
  }

  adjust(name: string, delta: number, expectedVersion: number): Promise<MutationOutcome> {
    return this.request('POST', '/inventory.adjust', { name, delta, expected_version: expectedVersion }, mutationSchema);
  }

  updateNotes(name: string, notes: string, expectedVersion: number): Promise<MutationOutcome> {
    return this.request('POST', '/inventory.notes', { name, notes, expected_version: expectedVersion }, mutationSchema);
  }

  remove(name: string, expectedVersion: number): Promise<DeleteOutcome> {
    return this.request('DELETE', '/inventory.delete', { name, expected_version: expectedVersion }, deleteSchema);
  }

  private async request<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST' | 'DELETE',
    path: string,
    body: unknown,
    schema: S,
  ): Promise<z.infer<S> | Failure> {
    const init: RequestInit = { method };
    if (body !== undefined) {
      init.headers = { 'content-type': 'application/json' };
      init.body = JSON.stringify(body);
    }

    const res = await this.fetchImpl(`${this.baseUrl}${path}`, init);

    const text = await res.text();
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      const detail = text ? ` - ${text}` : '';
      throw new Error(`${method} ${path} failed: ${res.status} ${res.statusText}${detail}`);
    }

    const failure = failureSchema.safeParse(payload);
    if (failure.success) return failure.data;

    const success = schema.safeParse(payload);
    if (success.success) return success.data;

    throw new Error(`${method} ${path} returned an unexpected body (status ${res.status})`);
  }
}
