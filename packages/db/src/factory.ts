import type { TableStoreConfig } from "@channel-pulse/core";
import { FusionTableStore } from "./fusion.js";
import { createSupabaseClient, SupabaseTableStore } from "./supabase.js";
import type { TableStore } from "./table-store.js";

/**
 * Build the configured store
 */
export function createTableStore(config: TableStoreConfig): TableStore {
  switch (config.kind) {
    case "fusion":
      return new FusionTableStore({
        baseUrl: config.baseUrl,
        token: config.token,
        tableId: config.tableId,
        timeoutMs: config.timeoutMs,
      });
    case "supabase":
      return new SupabaseTableStore({
        client: createSupabaseClient(config.url, config.key),
        table: config.tableId,
      });
  }
}
