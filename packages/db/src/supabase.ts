/**
 * Supabase Client
 * Table store over a Supabase table
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { UpstreamTransportError, logger, type ChildLogger } from "@channel-pulse/core";
import type { RecordFields, TableRecord, TableStore } from "./table-store.js";

const SERVICE = "supabase";
const PAGE_SIZE = 1000;

/**
 * Create a client without session persistence
 */
export function createSupabaseClient(
  url: string,
  key: string,
  fetchImpl?: typeof fetch
): SupabaseClient {
  return createClient(url, key, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    global: fetchImpl ? { fetch: fetchImpl } : undefined,
  });
}

export interface SupabaseTableStoreOptions {
  client: SupabaseClient;
  table: string;
  /** Column giving insertion order */
  orderBy?: string;
}

export class SupabaseTableStore implements TableStore {
  readonly kind = "supabase";

  private readonly client: SupabaseClient;
  private readonly table: string;
  private readonly orderBy: string;
  private readonly log: ChildLogger;

  constructor(options: SupabaseTableStoreOptions) {
    this.client = options.client;
    this.table = options.table;
    this.orderBy = options.orderBy ?? "id";
    this.log = logger.child({ component: SERVICE, table: options.table });
  }

  async listRecords(): Promise<TableRecord[]> {
    const records: TableRecord[] = [];

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error, status } = await this.client
        .from(this.table)
        .select("*")
        .order(this.orderBy, { ascending: true })
        .range(from, from + PAGE_SIZE - 1);

      if (error) {
        throw new UpstreamTransportError(`Supabase select failed: ${error.message}`, SERVICE, {
          statusCode: status || undefined,
          endpoint: `select ${this.table}`,
        });
      }

      const rows: RecordFields[] = data ?? [];
      for (const row of rows) {
        const id = row[this.orderBy];
        records.push({
          id: typeof id === "string" || typeof id === "number" ? String(id) : undefined,
          fields: row,
        });
      }

      if (rows.length < PAGE_SIZE) break;
    }

    this.log.debug("Listed records", { count: records.length });
    return records;
  }

  async createRecords(records: readonly RecordFields[]): Promise<number> {
    if (records.length === 0) return 0;

    const { error, status } = await this.client.from(this.table).insert([...records]);

    if (error) {
      throw new UpstreamTransportError(`Supabase insert failed: ${error.message}`, SERVICE, {
        statusCode: status || undefined,
        endpoint: `insert ${this.table}`,
      });
    }

    this.log.debug("Created records", { count: records.length });
    return records.length;
  }
}
