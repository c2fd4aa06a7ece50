/**
 * @channel-pulse/analytics
 * Channel resolution, recent-items caching, question classification and
 * deterministic answers
 */

// Items
export {
  DEFAULT_PLATFORM,
  ContentItemSchema,
  createContentItem,
  engagementRate,
  normalizeItem,
  normalizeItems,
  toCount,
  type ContentItem,
  type NormalizedItem,
} from "./items.js";

// Collaborators
export type {
  ChannelId,
  VideoId,
  VideoStats,
  ChannelLookup,
  VideoSource,
  VideoPlatform,
} from "./types.js";

// Channel references
export {
  CHANNEL_ID_PREFIX,
  CHANNEL_ID_MIN_LENGTH,
  isCanonicalChannelId,
  parseChannelReference,
  type ChannelReference,
  type ChannelReferenceKind,
} from "./reference.js";
export { ChannelResolver, type ChannelResolverOptions } from "./resolver.js";

// Cache + fetch
export {
  ResultCache,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_CACHE_MAX_ENTRIES,
  type ResultCacheOptions,
} from "./cache.js";
export { RecentItemsFetcher } from "./fetcher.js";

// Questions
export {
  classifyQuestion,
  extractRequestedRecency,
  findRequestedNumber,
  ANSWER_COUNT_RANGE,
  DEFAULT_ANSWER_COUNT,
  RECENCY_RANGE,
  DEFAULT_RECENCY,
  type QuestionIntent,
  type Metric,
  type Direction,
  type CountRange,
  type ClassifierOptions,
} from "./classifier.js";
export { KEYWORDS, loadKeywordTables, foldText, matchesKeyword, type KeywordTables } from "./keywords.js";

// Answers
export {
  generateAnswer,
  buildAnalysisHint,
  rankItems,
  summarizeSample,
  NO_DATA_MESSAGE,
  type SampleSummary,
} from "./generator.js";
