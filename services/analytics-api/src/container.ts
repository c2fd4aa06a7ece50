/**
 * Builds the service graph from configuration
 */

import { ChannelResolver, RecentItemsFetcher, ResultCache } from "@channel-pulse/analytics";
import { logger, type AppConfig, type AnswerProviderConfig } from "@channel-pulse/core";
import { createContentRepository, createTableStore } from "@channel-pulse/db";
import { YouTubeClient } from "@channel-pulse/youtube";
import { AnalyticsService } from "./analytics-service.js";
import { ClaudeAnswerService } from "./shared/answerer/claude.js";
import { OpenRouterAnswerService } from "./shared/answerer/openrouter.js";
import type { AnswerService } from "./shared/answerer/types.js";

export function createAnswerService(config: AnswerProviderConfig): AnswerService {
  switch (config.provider) {
    case "openrouter":
      return new OpenRouterAnswerService({
        apiKey: config.apiKey,
        baseUrl: config.baseUrl,
        model: config.model,
        timeoutMs: config.timeoutMs,
      });
    case "claude":
      return new ClaudeAnswerService({ model: config.model, timeoutMs: config.timeoutMs });
  }
}

export function createAnalyticsService(config: AppConfig): AnalyticsService {
  const youtube = new YouTubeClient({
    apiKey: config.youtube.apiKey,
    timeoutMs: config.youtube.timeoutMs,
  });

  const cache = new ResultCache({
    ttlMs: config.cache.ttlMs,
    maxEntries: config.cache.maxEntries,
  });

  const service = new AnalyticsService({
    resolver: new ChannelResolver({
      lookup: youtube,
      defaultChannelId: config.youtube.defaultChannelId,
    }),
    fetcher: youtube.configured ? new RecentItemsFetcher(youtube, cache) : undefined,
    repository: config.tableStore ? createContentRepository(createTableStore(config.tableStore)) : undefined,
    answerer: config.answer ? createAnswerService(config.answer) : undefined,
  });

  logger.info("Analytics service ready", {
    platform: youtube.configured ? "youtube" : "demo",
    tableStore: config.tableStore?.kind ?? "none",
    answerProvider: config.answer?.provider ?? "local",
  });

  return service;
}
