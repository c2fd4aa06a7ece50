/**
 * Recent Items Fetcher
 * Cache-aware wrapper around the platform's search + statistics calls
 */

import { logger, type ChildLogger } from "@channel-pulse/core";
import type { ResultCache } from "./cache.js";
import { createContentItem, type ContentItem } from "./items.js";
import type { ChannelId, VideoSource } from "./types.js";

export class RecentItemsFetcher {
  private readonly inFlight = new Map<string, Promise<readonly ContentItem[]>>();
  private readonly log: ChildLogger;

  constructor(
    private readonly source: VideoSource,
    private readonly cache: ResultCache
  ) {
    this.log = logger.child({ component: "fetcher", platform: source.platform });
  }

  /**
   * Most recent `count` items of a channel, newest first.
   * Concurrent calls for the same channel and count share one request;
   * failures propagate and are never cached.
   */
  async fetchRecentItems(channelId: ChannelId, count: number): Promise<readonly ContentItem[]> {
    const cached = this.cache.get(channelId, count);
    if (cached) {
      this.log.debug("Cache hit", { channelId, count });
      return cached;
    }

    const key = `${channelId}\u0000${count}`;
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const request = this.load(channelId, count).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);
    return request;
  }

  private async load(channelId: ChannelId, count: number): Promise<readonly ContentItem[]> {
    const startTime = Date.now();
    const videoIds = await this.source.searchVideos(channelId, count);

    let items: ContentItem[] = [];
    if (videoIds.length > 0) {
      const stats = await this.source.getStats(videoIds);
      items = videoIds.flatMap((videoId) => {
        const entry = stats.get(videoId);
        if (!entry) return [];
        return [
          createContentItem({
            platform: this.source.platform,
            externalId: videoId,
            url: this.source.videoUrl(videoId),
            title: entry.title,
            views: entry.views,
            likes: entry.likes,
            commentsCount: entry.comments,
          }),
        ];
      });
    }

    this.cache.put(channelId, count, items);
    this.log.info("Fetched recent items", {
      channelId,
      count,
      found: items.length,
      durationMs: Date.now() - startTime,
    });
    return items;
  }
}
