/**
 * Content Repository
 * Reads and deduplicating writes of content items over a table store
 */

import {
  ValidationError,
  logger,
  type LogContext,
} from "@channel-pulse/core";
import {
  createContentItem,
  normalizeItem,
  type ContentItem,
} from "@channel-pulse/analytics";
import type { RecordFields, TableStore } from "../table-store.js";

const log = logger.child({ component: "content-repo" });

/**
 * Wire shape written to the store. engagement_rate is kept for people
 * browsing the table; it is recomputed from the counts on every read.
 */
export function toRecordFields(item: ContentItem): RecordFields {
  const normalized = normalizeItem(item);
  return {
    platform: normalized.platform,
    external_id: normalized.externalId,
    url: normalized.url,
    title: normalized.title,
    views: normalized.views,
    likes: normalized.likes,
    comments_count: normalized.commentsCount,
    engagement_rate: normalized.engagementRate,
  };
}

export function fromRecordFields(fields: RecordFields): ContentItem {
  return createContentItem({
    platform: fields.platform,
    externalId: fields.external_id,
    url: fields.url,
    title: fields.title,
    views: fields.views,
    likes: fields.likes,
    commentsCount: fields.comments_count,
  });
}

function externalIdOf(fields: RecordFields): string | null {
  const value = fields.external_id;
  if (typeof value === "string" && value.trim()) return value.trim();
  if (typeof value === "number") return String(value);
  return null;
}

export interface ContentRepository {
  /** Last `limit` stored items (all when omitted), oldest first */
  listContentItems(limit?: number): Promise<ContentItem[]>;

  /** Writes items whose external ID is not stored yet; returns how many were written */
  upsertContentItems(items: readonly ContentItem[]): Promise<number>;
}

export function createContentRepository(store: TableStore): ContentRepository {
  const context: LogContext = { store: store.kind };

  async function listContentItems(limit?: number): Promise<ContentItem[]> {
    let records = await store.listRecords();

    if (limit !== undefined && records.length > limit) {
      records = limit > 0 ? records.slice(-limit) : [];
    }

    const items: ContentItem[] = [];
    for (const record of records) {
      try {
        items.push(fromRecordFields(record.fields));
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        log.debug("Skipping malformed record", { ...context, recordId: record.id, reason: error.message });
      }
    }

    return items;
  }

  async function upsertContentItems(items: readonly ContentItem[]): Promise<number> {
    const known = new Set<string>();
    for (const record of await store.listRecords()) {
      const externalId = externalIdOf(record.fields);
      if (externalId) known.add(externalId);
    }

    const fresh: ContentItem[] = [];
    for (const item of items) {
      if (known.has(item.externalId)) continue;
      known.add(item.externalId);
      fresh.push(item);
    }

    if (fresh.length === 0) {
      log.debug("No new items to store", { ...context, offered: items.length });
      return 0;
    }

    const written = await store.createRecords(fresh.map(toRecordFields));
    log.info("Stored new content items", { ...context, offered: items.length, written });
    return written;
  }

  return {
    listContentItems,
    upsertContentItems,
  };
}
