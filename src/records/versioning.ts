import type { InventoryRecord, StoreRowInput, Version } from '../types';
import { coerceQuantity, isBlank, readText } from './codec';

export type RepairField = 'version' | 'quantity';

/** A cell that was rewritten while loading. Repairs are warnings, never conflicts. */
export interface Repair {
  name: string;
  field: RepairField;
  raw: unknown;
}

export interface LoadedCollection {
  records: InventoryRecord[];
  repairs: Repair[];
}

export const INITIAL_VERSION: Version = 1;

/**
 * Numeric versions are truncated; anything blank, non-numeric, below 1 or past
 * the safe integer range is reset to 1.
 */
export function normalizeVersion(value: unknown): { version: Version; repaired: boolean } {
  let candidate = Number.NaN;
  if (typeof value === 'number') {
    candidate = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    candidate = Number(value.trim());
  }

  const truncated = Math.trunc(candidate);
  if (Number.isSafeInteger(truncated) && truncated >= INITIAL_VERSION) {
    return { version: truncated, repaired: truncated !== candidate };
  }
  return { version: INITIAL_VERSION, repaired: true };
}

/**
 * Turns raw table rows into records. Rows with no image, name or quantity are
 * dropped; versions and quantities that cannot be read are reset and reported.
 */
export function loadCollection(rows: StoreRowInput[]): LoadedCollection {
  const records: InventoryRecord[] = [];
  const repairs: Repair[] = [];

  for (const row of rows) {
    if (isBlank(row.Image) && isBlank(row.Name) && isBlank(row.Quantity)) continue;

    const name = readText(row.Name) ?? '';
    const { version, repaired } = normalizeVersion(row.Version);
    if (repaired) repairs.push({ name, field: 'version', raw: row.Version });

    const { quantity, malformed } = coerceQuantity(row.Quantity);
    if (malformed) repairs.push({ name, field: 'quantity', raw: row.Quantity });

    records.push({
      name,
      image: readText(row.Image),
      quantity,
      notes: readText(row.Notes),
      lastModified: readText(row.Date) ?? '',
      version,
    });
  }

  return { records, repairs };
}
