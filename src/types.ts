export type RecordName = string;
export type Version = number;

export interface InventoryRecord {
  name: RecordName;
  image?: string;
  quantity: number;
  notes?: string;
  lastModified: string; // M/D/YYYY, as the sheet shows it
  version: Version;
}

/** Column layout of the backing table. Column order carries no meaning. */
export interface StoreRow {
  Image: string;
  Name: string;
  Quantity: number;
  Notes: string;
  Date: string;
  Version: number;
}

/** A row as it comes back from the store: any cell may be blank or of the wrong type. */
export type StoreRowInput = Partial<Record<keyof StoreRow, unknown>>;

export interface NewRecordArgs {
  name: RecordName;
  image?: string;
  quantity?: number;
  notes?: string;
}
