/**
 * @channel-pulse/youtube
 * YouTube Data API client implementing the channel lookup and video source
 */

// Types
export {
  SearchResultSchema,
  type SearchResult,
  SearchResponseSchema,
  type SearchResponse,
  VideoSnippetSchema,
  VideoStatisticsSchema,
  VideoResourceSchema,
  type VideoResource,
  VideoListResponseSchema,
  type VideoListResponse,
  ChannelListResponseSchema,
  type ChannelListResponse,
  ApiErrorResponseSchema,
} from "./types.js";

// Client
export {
  YouTubeClient,
  YOUTUBE_API_BASE_URL,
  DEFAULT_YOUTUBE_TIMEOUT_MS,
  type YouTubeClientOptions,
} from "./client.js";
