/**
 * YouTube Data API Client
 * Channel lookup and recent-video statistics over the Data API v3
 */

import { z } from "zod";
import {
  ConfigurationError,
  UpstreamTransportError,
  logger,
  type ChildLogger,
} from "@channel-pulse/core";
import type { ChannelId, VideoId, VideoPlatform, VideoStats } from "@channel-pulse/analytics";
import {
  ApiErrorResponseSchema,
  ChannelListResponseSchema,
  SearchResponseSchema,
  VideoListResponseSchema,
  type VideoResource,
} from "./types.js";

export const YOUTUBE_API_BASE_URL = "https://www.googleapis.com/youtube/v3";
export const DEFAULT_YOUTUBE_TIMEOUT_MS = 30_000;

/** Upper bound the API accepts for maxResults and for ids per videos call */
const MAX_PAGE_SIZE = 50;
const CHANNEL_SEARCH_LIMIT = 5;
const SERVICE = "youtube";

export interface YouTubeClientOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

type Params = Record<string, string | number>;

function chunk<T>(values: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < values.length; i += size) {
    chunks.push(values.slice(i, i + size));
  }
  return chunks;
}

/**
 * Body as JSON, or undefined when it is not JSON
 */
function parseJson(text: string): unknown {
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function toStats(video: VideoResource): VideoStats {
  return {
    title: video.snippet?.title ?? `Video ${video.id}`,
    views: video.statistics?.viewCount ?? 0,
    likes: video.statistics?.likeCount ?? 0,
    comments: video.statistics?.commentCount ?? 0,
  };
}

/**
 * YouTube API Client
 */
export class YouTubeClient implements VideoPlatform {
  readonly platform = "YouTube";

  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private log: ChildLogger;

  constructor(options: YouTubeClientOptions = {}) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? YOUTUBE_API_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_YOUTUBE_TIMEOUT_MS;
    this.log = logger.child({ component: SERVICE });
  }

  get configured(): boolean {
    return Boolean(this.apiKey);
  }

  /**
   * GET an endpoint and validate the body. Every failure mode surfaces as
   * UpstreamTransportError carrying the endpoint.
   */
  async request<T>(
    endpoint: string,
    params: Params,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    if (!this.apiKey) {
      throw new ConfigurationError("YOUTUBE_API_KEY is not set", { endpoint });
    }

    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      query.set(key, String(value));
    }
    query.set("key", this.apiKey);

    const url = `${this.baseUrl}${endpoint}?${query.toString()}`;
    this.log.debug("YouTube request", { endpoint, params });

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      const timedOut = controller.signal.aborted;
      throw new UpstreamTransportError(
        timedOut
          ? `YouTube API request timed out after ${this.timeoutMs}ms`
          : `Failed to reach YouTube API: ${error instanceof Error ? error.message : String(error)}`,
        SERVICE,
        { endpoint, cause: error instanceof Error ? error : undefined }
      );
    } finally {
      clearTimeout(timer);
    }

    const body = parseJson(text);

    if (!response.ok) {
      const apiError = ApiErrorResponseSchema.safeParse(body);
      const detail = apiError.success ? apiError.data.error.message : undefined;
      throw new UpstreamTransportError(
        `YouTube API error ${response.status}${detail ? `: ${detail}` : ""}`,
        SERVICE,
        { statusCode: response.status, endpoint }
      );
    }

    if (body === undefined) {
      throw new UpstreamTransportError("YouTube API returned invalid JSON", SERVICE, {
        statusCode: response.status,
        endpoint,
      });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamTransportError(
        `Malformed YouTube API response: ${parsed.error.issues[0]?.message ?? "invalid payload"}`,
        SERVICE,
        { statusCode: response.status, endpoint }
      );
    }

    return parsed.data;
  }

  // ============ VideoSource ============

  /**
   * Newest-first video ids of a channel
   */
  async searchVideos(channelId: ChannelId, maxResults: number): Promise<VideoId[]> {
    const data = await this.request(
      "/search",
      {
        part: "id",
        channelId,
        maxResults: Math.min(Math.max(maxResults, 1), MAX_PAGE_SIZE),
        order: "date",
        type: "video",
      },
      SearchResponseSchema
    );

    return data.items.flatMap((item) => (item.id.videoId ? [item.id.videoId] : []));
  }

  /**
   * Title and counters per video. Ids the API does not return are absent
   * from the map.
   */
  async getStats(ids: readonly VideoId[]): Promise<Map<VideoId, VideoStats>> {
    const stats = new Map<VideoId, VideoStats>();

    for (const batch of chunk(ids, MAX_PAGE_SIZE)) {
      const data = await this.request(
        "/videos",
        { part: "snippet,statistics", id: batch.join(",") },
        VideoListResponseSchema
      );
      for (const video of data.items) {
        stats.set(video.id, toStats(video));
      }
    }

    this.log.debug("Fetched video statistics", { requested: ids.length, found: stats.size });
    return stats;
  }

  videoUrl(id: VideoId): string {
    return `https://www.youtube.com/watch?v=${id}`;
  }

  // ============ ChannelLookup ============

  async searchChannels(query: string): Promise<ChannelId[]> {
    const data = await this.request(
      "/search",
      { part: "id", type: "channel", q: query, maxResults: CHANNEL_SEARCH_LIMIT },
      SearchResponseSchema
    );

    return data.items.flatMap((item) => (item.id.channelId ? [item.id.channelId] : []));
  }

  async getVideoOwner(videoId: VideoId): Promise<ChannelId | null> {
    const data = await this.request("/videos", { part: "snippet", id: videoId }, VideoListResponseSchema);
    return data.items[0]?.snippet?.channelId ?? null;
  }

  async getChannelByHandle(handle: string): Promise<ChannelId | null> {
    const data = await this.request(
      "/channels",
      { part: "id", forHandle: `@${handle}` },
      ChannelListResponseSchema
    );
    return data.items[0]?.id ?? null;
  }
}
