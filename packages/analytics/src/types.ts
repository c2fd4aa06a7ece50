/**
 * Collaborator Interfaces
 * What the resolver and fetcher need from the video platform
 */

export type ChannelId = string;
export type VideoId = string;

export interface VideoStats {
  title: string;
  views: number;
  likes: number;
  comments: number;
}

/**
 * Channel lookups used by the resolver. `null` means "no such channel/video";
 * transport failures are thrown.
 */
export interface ChannelLookup {
  /** Ranked, best match first */
  searchChannels(query: string): Promise<ChannelId[]>;
  getVideoOwner(videoId: VideoId): Promise<ChannelId | null>;
  /** Exact handle match, without the leading "@" */
  getChannelByHandle(handle: string): Promise<ChannelId | null>;
}

/**
 * Recent uploads and their statistics
 */
export interface VideoSource {
  readonly platform: string;
  /** Newest first */
  searchVideos(channelId: ChannelId, maxResults: number): Promise<VideoId[]>;
  getStats(videoIds: VideoId[]): Promise<Map<VideoId, VideoStats>>;
  videoUrl(videoId: VideoId): string;
}

export type VideoPlatform = ChannelLookup & VideoSource;
