import type { InventoryRecord, StoreRow } from '../types';

export interface CoercedQuantity {
  quantity: number;
  malformed: boolean;
}

/**
 * Reads a quantity cell. Numbers are truncated, integral strings parsed; any
 * other value counts as 0 and is flagged. Negative values clamp to 0 without
 * being flagged.
 */
export function coerceQuantity(value: unknown): CoercedQuantity {
  let parsed: number | null = null;
  if (typeof value === 'number' && Number.isFinite(value)) {
    parsed = Math.trunc(value);
  } else if (typeof value === 'string' && /^[+-]?\d+$/.test(value.trim())) {
    parsed = parseInt(value.trim(), 10);
  }

  if (parsed === null) return { quantity: 0, malformed: true };
  return { quantity: Math.max(0, parsed), malformed: false };
}

export function clampQuantity(value: unknown): number {
  return coerceQuantity(value).quantity;
}

export function isBlank(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  return typeof value === 'string' && value.trim() === '';
}

/** Text cell to optional string; blank cells become `undefined`. */
export function readText(value: unknown): string | undefined {
  if (isBlank(value)) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

/** Month/day/year without zero padding, local time. */
export function formatDate(date: Date): string {
  return `${date.getMonth() + 1}/${date.getDate()}/${date.getFullYear()}`;
}

export function toStoreRow(record: InventoryRecord): StoreRow {
  return {
    Image: record.image ?? '',
    Name: record.name,
    Quantity: record.quantity,
    Notes: record.notes ?? '',
    Date: record.lastModified,
    Version: record.version,
  };
}
