/**
 * Analytics Service
 * Sync and chat flows with their fallback tiers:
 *   sync items: platform -> demo dataset
 *   chat items: table store -> platform -> demo dataset
 */

import {
  DEFAULT_RECENCY,
  extractRequestedRecency,
  type ChannelId,
  type ChannelResolver,
  type ContentItem,
  type RecentItemsFetcher,
} from "@channel-pulse/analytics";
import { describeError, isChannelPulseError, logger, type ChildLogger } from "@channel-pulse/core";
import type { ContentRepository } from "@channel-pulse/db";
import { answerQuestion, type AnswerSource } from "./chat.js";
import { DEMO_ITEMS } from "./demo.js";
import type { AnswerService } from "./shared/answerer/types.js";

export type ItemsSource = "store" | "platform" | "demo";

export interface AnalyticsServiceDeps {
  resolver: ChannelResolver;
  /** Absent when the video platform is not configured */
  fetcher?: RecentItemsFetcher;
  repository?: ContentRepository;
  answerer?: AnswerService;
}

export interface SyncRequest {
  channel?: string;
  count?: number;
}

export interface SyncResult {
  channelId: ChannelId | null;
  source: Exclude<ItemsSource, "store">;
  /** Items returned by this sync */
  synced: number;
  /** New records written, null when the store was unavailable */
  stored: number | null;
  items: readonly ContentItem[];
}

export interface ChatRequest {
  question: string;
  channel?: string;
}

export interface ChatResult {
  answer: string;
  source: AnswerSource;
  itemsSource: ItemsSource;
  itemCount: number;
}

interface LoadedItems {
  channelId: ChannelId | null;
  items: readonly ContentItem[];
  source: Exclude<ItemsSource, "store">;
}

export class AnalyticsService {
  private readonly log: ChildLogger;

  constructor(private readonly deps: AnalyticsServiceDeps) {
    this.log = logger.child({ component: "analytics" });
  }

  async resolveChannel(reference?: string): Promise<ChannelId> {
    return this.deps.resolver.resolve(reference);
  }

  /**
   * Pull recent items and store the new ones. A store failure is logged and
   * never fails the sync.
   */
  async sync(request: SyncRequest = {}): Promise<SyncResult> {
    const count = request.count ?? DEFAULT_RECENCY;
    const loaded = await this.loadFromPlatform(request.channel, count);

    let stored: number | null = null;
    if (this.deps.repository) {
      try {
        stored = await this.deps.repository.upsertContentItems(loaded.items);
      } catch (error) {
        if (!isChannelPulseError(error)) throw error;
        this.log.warn("Table store sync failed, returning items without storing", {
          error: describeError(error),
        });
      }
    } else {
      this.log.warn("No table store configured, items not stored");
    }

    this.log.metric("items_synced", loaded.items.length, { source: loaded.source });

    return {
      channelId: loaded.channelId,
      source: loaded.source,
      synced: loaded.items.length,
      stored,
      items: loaded.items,
    };
  }

  async chat(request: ChatRequest): Promise<ChatResult> {
    const recency = extractRequestedRecency(request.question);
    const { items, source } = await this.loadChatItems(request.channel, recency);

    const answer = await answerQuestion(request.question, items, this.deps.answerer);

    this.log.info("Answered question", {
      answerSource: answer.source,
      itemsSource: source,
      items: items.length,
      metric: answer.intent.metric,
    });

    return {
      answer: answer.answer,
      source: answer.source,
      itemsSource: source,
      itemCount: items.length,
    };
  }

  /**
   * An explicit channel skips the store, which is not partitioned by channel
   */
  private async loadChatItems(
    channel: string | undefined,
    recency: number
  ): Promise<{ items: readonly ContentItem[]; source: ItemsSource }> {
    if (!channel?.trim() && this.deps.repository) {
      try {
        const stored = await this.deps.repository.listContentItems(recency);
        if (stored.length > 0) {
          return { items: stored, source: "store" };
        }
        this.log.debug("Table store is empty, trying the platform");
      } catch (error) {
        if (!isChannelPulseError(error)) throw error;
        this.log.warn("Table store read failed, trying the platform", { error: describeError(error) });
      }
    }

    return this.loadFromPlatform(channel, recency);
  }

  /**
   * Resolution errors propagate; fetch errors fall back to the demo dataset
   */
  private async loadFromPlatform(channel: string | undefined, count: number): Promise<LoadedItems> {
    const { fetcher, resolver } = this.deps;

    if (!fetcher) {
      this.log.warn("Video platform not configured, using demo data");
      return { channelId: null, items: DEMO_ITEMS, source: "demo" };
    }

    const channelId = await resolver.resolve(channel);

    try {
      const items = await fetcher.fetchRecentItems(channelId, count);
      return { channelId, items, source: "platform" };
    } catch (error) {
      if (!isChannelPulseError(error)) throw error;
      this.log.warn("Video platform fetch failed, using demo data", {
        channelId,
        error: describeError(error),
      });
      return { channelId, items: DEMO_ITEMS, source: "demo" };
    }
  }
}
