/**
 * @channel-pulse/db
 * Table stores and the content repository
 */

// Store contract
export type { TableStore, TableRecord, RecordFields } from "./table-store.js";

// Datasheet store
export {
  FusionTableStore,
  CREATE_BATCH_SIZE,
  DEFAULT_PAGE_SIZE,
  DEFAULT_TABLE_TIMEOUT_MS,
  type FusionTableStoreOptions,
} from "./fusion.js";

// Supabase
export {
  createSupabaseClient,
  SupabaseTableStore,
  type SupabaseTableStoreOptions,
} from "./supabase.js";

// Repositories
export {
  createContentRepository,
  toRecordFields,
  fromRecordFields,
  type ContentRepository,
} from "./repositories/index.js";

// Wiring
export { createTableStore } from "./factory.js";
