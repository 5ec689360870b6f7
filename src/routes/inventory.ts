import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { isInventoryError, VersionConflictError, type InventoryErrorCode } from '../errors';
import type { InventoryEngine } from '../records/engine';
import type { InventoryRecord } from '../types';

// ---------- Schemas ----------
const nameSchema = z.string().min(1, 'name required');
const expectedVersionSchema = z.number().int().positive().safe();

const getSchema = z.object({
  name: nameSchema,
});

const addSchema = z.object({
  name: z.string(),
  image: z.string().optional(),
  quantity: z.number().int().nonnegative().optional(),
  notes: z.string().optional(),
});

const quantitySchema = z.object({
  name: nameSchema,
  quantity: z.number().int(),
  expected_version: expectedVersionSchema,
});

const adjustSchema = z.object({
  name: nameSchema,
  delta: z.number().int(),
  expected_version: expectedVersionSchema,
});

const notesSchema = z.object({
  name: nameSchema,
  notes: z.string(),
  expected_version: expectedVersionSchema,
});

const deleteSchema = z.object({
  name: nameSchema,
  expected_version: expectedVersionSchema,
});

const STATUS_BY_CODE: Record<InventoryErrorCode, number> = {
  invalid_record: 400,
  record_not_found: 404,
  version_conflict: 409,
  store_rejected: 502,
  store_unavailable: 503,
};

// ---------- Helpers ----------
export function serializeRecord(record: InventoryRecord) {
  return {
    name: record.name,
    image: record.image ?? null,
    quantity: record.quantity,
    notes: record.notes ?? null,
    last_modified: record.lastModified,
    version: record.version,
  };
}

function badRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({
    ok: false,
    error: 'invalid_request',
    message: 'Invalid request',
    issues: error.flatten(),
  });
}

function sendFailure(req: FastifyRequest, reply: FastifyReply, err: unknown) {
  if (!isInventoryError(err)) {
    req.log.error({ err }, 'Inventory operation failed');
    return reply.code(500).send({ ok: false, error: 'internal_error', message: 'Unexpected error' });
  }

  if (err.code === 'store_unavailable' || err.code === 'store_rejected') {
    req.log.error({ err }, 'Inventory store call failed');
  }

  const body: Record<string, unknown> = { ok: false, error: err.code, message: err.message };
  if (err instanceof VersionConflictError) {
    body.expected_version = err.expectedVersion;
    body.current_version = err.currentVersion;
  }
  return reply.code(STATUS_BY_CODE[err.code]).send(body);
}

// ---------- Routes ----------
export async function registerInventoryRoutes(app: FastifyInstance, engine: InventoryEngine) {
  app.get('/inventory.list', async (req, reply) => {
    try {
      const records = await engine.listRecords();
      return reply.send({ ok: true, records: records.map(serializeRecord) });
    } catch (err) {
      return sendFailure(req, reply, err);
    }
  });

  // Normal / low stock split
  app.get('/inventory.view', async (req, reply) => {
    try {
      const view = await engine.inventoryView();
      return reply.send({
        ok: true,
        threshold: view.threshold,
        normal: view.normal.map(serializeRecord),
        low_stock: view.lowStock.map(serializeRecord),
      });
    } catch (err) {
      return sendFailure(req, reply, err);
    }
  });

  app.get('/inventory.get', async (req, reply) => {
    const parsed = getSchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    try {
      const record = await engine.getRecord(parsed.data.name);
      return reply.send({ ok: true, record: serializeRecord(record) });
    } catch (err) {
      return sendFailure(req, reply, err);
    }
  });

  app.post('/inventory.add', async (req, reply) => {
    const parsed = addSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    try {
      const result = await engine.addRecord(parsed.data);
      return reply.send({ ok: true, message: result.message, record: serializeRecord(result.record) });
    } catch (err) {
      return sendFailure(req, reply, err);
    }
  });

  app.post('/inventory.quantity', async (req, reply) => {
    const parsed = quantitySchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { name, quantity, expected_version } = parsed.data;
    try {
      const result = await engine.updateQuantityAndDate(name, quantity, expected_version);
      return reply.send({ ok: true, message: result.message, record: serializeRecord(result.record) });
    } catch (err) {
      return sendFailure(req, reply, err);
    }
  });

  // Increase / decrease by delta
  app.post('/inventory.adjust', async (req, reply) => {
    const parsed = adjustSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { name, delta, expected_version } = parsed.data;
    try {
      const result = await engine.adjustQuantity(name, delta, expected_version);
      return reply.send({ ok: true, message: result.message, record: serializeRecord(result.record) });
    } catch (err) {
      return sendFailure(req, reply, err);
    }
  });

  app.post('/inventory.notes', async (req, reply) => {
    const parsed = notesSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { name, notes, expected_version } = parsed.data;
    try {
      const result = await engine.updateNotes(name, notes, expected_version);
      return reply.send({ ok: true, message: result.message, record: serializeRecord(result.record) });
    } catch (err) {
      return sendFailure(req, reply, err);
    }
  });

  app.delete('/inventory.delete', async (req, reply) => {
    const parsed = deleteSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { name, expected_version } = parsed.data;
    try {
      const result = await engine.deleteRecord(name, expected_version);
      return reply.send({ ok: true, message: result.message });
    } catch (err) {
      return sendFailure(req, reply, err);
    }
  });
}
