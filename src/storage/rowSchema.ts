import { z } from 'zod';
import { StoreRejectedError } from '../errors';
import type { StoreRow, StoreRowInput } from '../types';

export const storeRowSchema = z
  .object({
    Image: z.string(),
    Name: z.string(),
    Quantity: z.number().int().nonnegative(),
    Notes: z.string(),
    Date: z.string(),
    Version: z.number().int().positive(),
  })
  .strict();

// cells are kept as-is on read; the loader decides what a bad cell means
export const storeTableSchema = z.array(z.record(z.unknown()));

export function assertWritableRows(rows: StoreRow[]): StoreRow[] {
  return rows.map((row, idx) => {
    const parsed = storeRowSchema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join('.') || 'row';
      throw new StoreRejectedError(`row ${idx} (${field}): ${issue?.message ?? 'invalid row'}`);
    }
    return parsed.data;
  });
}

export function toRowInput(cells: Record<string, unknown>): StoreRowInput {
  return {
    Image: cells.Image,
    Name: cells.Name,
    Quantity: cells.Quantity,
    Notes: cells.Notes,
    Date: cells.Date,
    Version: cells.Version,
  };
}
