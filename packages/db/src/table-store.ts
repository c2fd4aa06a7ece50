/**
 * Table Store
 * Minimal record-level contract shared by the datasheet and Supabase stores
 */

export type RecordFields = Record<string, unknown>;

export interface TableRecord {
  /** Store-assigned identifier, when the store exposes one */
  id?: string;
  fields: RecordFields;
}

export interface TableStore {
  readonly kind: string;

  /** Every record, oldest first */
  listRecords(): Promise<TableRecord[]>;

  /** Returns how many records were written */
  createRecords(records: readonly RecordFields[]): Promise<number>;
}
