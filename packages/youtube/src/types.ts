/**
 * YouTube Data API Types
 * Zod schemas for validating API responses
 */

import { z } from "zod";
import { toCount } from "@channel-pulse/analytics";

// Statistics arrive as decimal strings; hidden counters are simply absent
const count = z.union([z.string(), z.number()]).optional().nullable().transform(toCount);

// ============ search ============

export const SearchResultSchema = z
  .object({
    id: z
      .object({
        kind: z.string().optional(),
        videoId: z.string().optional(),
        channelId: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type SearchResult = z.infer<typeof SearchResultSchema>;

export const SearchResponseSchema = z
  .object({
    items: z.array(SearchResultSchema).default([]),
    nextPageToken: z.string().optional(),
  })
  .passthrough();

export type SearchResponse = z.infer<typeof SearchResponseSchema>;

// ============ videos ============

export const VideoSnippetSchema = z
  .object({
    title: z.string().optional(),
    channelId: z.string().optional(),
    publishedAt: z.string().optional(),
  })
  .passthrough();

export const VideoStatisticsSchema = z
  .object({
    viewCount: count,
    likeCount: count,
    commentCount: count,
  })
  .passthrough();

export const VideoResourceSchema = z
  .object({
    id: z.string(),
    snippet: VideoSnippetSchema.optional(),
    statistics: VideoStatisticsSchema.optional(),
  })
  .passthrough();

export type VideoResource = z.infer<typeof VideoResourceSchema>;

export const VideoListResponseSchema = z
  .object({
    items: z.array(VideoResourceSchema).default([]),
  })
  .passthrough();

export type VideoListResponse = z.infer<typeof VideoListResponseSchema>;

// ============ channels ============

export const ChannelListResponseSchema = z
  .object({
    items: z.array(z.object({ id: z.string() }).passthrough()).default([]),
  })
  .passthrough();

export type ChannelListResponse = z.infer<typeof ChannelListResponseSchema>;

// ============ errors ============

export const ApiErrorResponseSchema = z.object({
  error: z
    .object({
      code: z.number().optional(),
      message: z.string().optional(),
    })
    .passthrough(),
});
