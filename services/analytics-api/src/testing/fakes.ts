/**
 * In-process stand-ins for the platform, store and answering service
 */

import { vi, type Mock } from "vitest";
import {
  ChannelResolver,
  RecentItemsFetcher,
  ResultCache,
  createContentItem,
  type ChannelLookup,
  type ContentItem,
  type VideoSource,
  type VideoStats,
} from "@channel-pulse/analytics";
import type { ContentRepository } from "@channel-pulse/db";
import { AnalyticsService } from "../analytics-service.js";
import type { AnswerService } from "../shared/answerer/types.js";

export const DEFAULT_CHANNEL = "UCDEFAULT00000000000";

export type FakeLookup = {
  [K in keyof ChannelLookup]: Mock<ChannelLookup[K]>;
};

export function fakeLookup(): FakeLookup {
  return {
    searchChannels: vi.fn<ChannelLookup["searchChannels"]>(async () => []),
    getVideoOwner: vi.fn<ChannelLookup["getVideoOwner"]>(async () => null),
    getChannelByHandle: vi.fn<ChannelLookup["getChannelByHandle"]>(async () => null),
  };
}

export type FakeSource = VideoSource & {
  searchVideos: Mock<VideoSource["searchVideos"]>;
  getStats: Mock<VideoSource["getStats"]>;
};

/**
 * Platform whose channels all hold the given videos, newest first
 */
export function fakeSource(videos: Record<string, VideoStats>): FakeSource {
  return {
    platform: "YouTube",
    searchVideos: vi.fn<VideoSource["searchVideos"]>(async (_channelId, maxResults) =>
      Object.keys(videos).slice(0, maxResults)
    ),
    getStats: vi.fn<VideoSource["getStats"]>(async (ids) => {
      const stats = new Map<string, VideoStats>();
      for (const id of ids) {
        const entry = videos[id];
        if (entry) stats.set(id, entry);
      }
      return stats;
    }),
    videoUrl: (id) => `https://www.youtube.com/watch?v=${id}`,
  };
}

export type FakeRepository = {
  [K in keyof ContentRepository]: Mock<ContentRepository[K]>;
};

export function fakeRepository(stored: ContentItem[] = []): FakeRepository {
  return {
    listContentItems: vi.fn<ContentRepository["listContentItems"]>(async (limit) =>
      limit === undefined ? stored : stored.slice(-limit)
    ),
    upsertContentItems: vi.fn<ContentRepository["upsertContentItems"]>(async (items) => items.length),
  };
}

export function storedItem(externalId: string, views: number): ContentItem {
  return createContentItem({
    externalId,
    title: `Stored ${externalId}`,
    url: `https://www.youtube.com/watch?v=${externalId}`,
    views,
    likes: 1,
    commentsCount: 0,
  });
}

export interface ServiceFixture {
  lookup?: FakeLookup;
  source?: FakeSource;
  repository?: FakeRepository;
  answerer?: AnswerService;
  defaultChannelId?: string;
}

export function buildService(fixture: ServiceFixture = {}): AnalyticsService {
  return new AnalyticsService({
    resolver: new ChannelResolver({
      lookup: fixture.lookup ?? fakeLookup(),
      defaultChannelId: fixture.defaultChannelId,
    }),
    fetcher: fixture.source ? new RecentItemsFetcher(fixture.source, new ResultCache()) : undefined,
    repository: fixture.repository,
    answerer: fixture.answerer,
  });
}
