/**
 * Content Items
 * The single construction path for items coming from the video platform or
 * the table store, plus the derived engagement metric
 */

import { z } from "zod";
import { ValidationError } from "@channel-pulse/core";

export const DEFAULT_PLATFORM = "YouTube";

/**
 * Absent, negative or unparseable counts become 0; fractions are truncated
 */
export function toCount(value: unknown): number {
  let parsed = Number.NaN;
  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "string" && value.trim() !== "") {
    parsed = Number(value.trim());
  }
  return Number.isFinite(parsed) && parsed > 0 ? Math.trunc(parsed) : 0;
}

const count = z.unknown().transform(toCount);

const text = (fallback: string) =>
  z.unknown().transform((value) =>
    typeof value === "string" ? value : typeof value === "number" ? String(value) : fallback
  );

export const ContentItemSchema = z.object({
  platform: text(DEFAULT_PLATFORM).transform((value) => value.trim() || DEFAULT_PLATFORM),
  externalId: z.string().trim().min(1, "externalId is required"),
  url: text(""),
  title: text(""),
  views: count,
  likes: count,
  commentsCount: count,
});

export type ContentItem = z.infer<typeof ContentItemSchema>;

export interface NormalizedItem extends ContentItem {
  /** (likes + commentsCount) / views, 0 when there are no views */
  engagementRate: number;
}

/**
 * Build a ContentItem from loosely-typed input.
 * Throws ValidationError when no external ID is present.
 */
export function createContentItem(raw: unknown): ContentItem {
  const result = ContentItemSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(`Invalid content item: ${issue?.message ?? "unknown issue"}`, {
      field: issue?.path.join("."),
    });
  }
  return result.data;
}

export function engagementRate(item: Pick<ContentItem, "views" | "likes" | "commentsCount">): number {
  return item.views > 0 ? (item.likes + item.commentsCount) / item.views : 0;
}

export function normalizeItem(item: ContentItem): NormalizedItem {
  return { ...item, engagementRate: engagementRate(item) };
}

export function normalizeItems(items: readonly ContentItem[]): NormalizedItem[] {
  return items.map(normalizeItem);
}
