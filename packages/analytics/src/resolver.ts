/**
 * Channel Resolver
 * Turns a channel reference of unknown shape into a canonical channel ID.
 * Cheap, certain shapes are settled locally; the rest go to the lookup.
 */

import {
  ConfigurationError,
  ResolutionError,
  logger,
  type ChildLogger,
} from "@channel-pulse/core";
import { parseChannelReference } from "./reference.js";
import type { ChannelId, ChannelLookup } from "./types.js";

export interface ChannelResolverOptions {
  lookup: ChannelLookup;
  /** Used when neither the reference nor the call supplies a channel */
  defaultChannelId?: string;
}

export class ChannelResolver {
  private readonly lookup: ChannelLookup;
  private readonly defaultChannelId?: string;
  private readonly log: ChildLogger;

  constructor(options: ChannelResolverOptions) {
    this.lookup = options.lookup;
    this.defaultChannelId = options.defaultChannelId;
    this.log = logger.child({ component: "resolver" });
  }

  async resolve(reference?: string | null, defaultChannelId?: string | null): Promise<ChannelId> {
    const parsed = parseChannelReference(reference);
    const raw = reference?.trim() ?? "";

    this.log.debug("Resolving channel reference", { reference: raw, kind: parsed.kind });

    switch (parsed.kind) {
      case "empty": {
        const fallback = defaultChannelId?.trim() || this.defaultChannelId?.trim();
        if (!fallback) {
          throw new ConfigurationError(
            "No channel reference given and no default channel configured"
          );
        }
        return fallback;
      }

      case "channel-id":
      case "channel-url":
        return parsed.channelId;

      case "handle":
      case "handle-url":
        return this.resolveHandle(parsed.handle, raw);

      case "video-url":
        return this.resolveVideoOwner(parsed.videoId, raw);

      case "search":
        return this.resolveSearch(parsed.query, raw);
    }
  }

  private async resolveHandle(handle: string, raw: string): Promise<ChannelId> {
    const channelId = await this.lookup.getChannelByHandle(handle);
    if (!channelId) {
      throw new ResolutionError(`channel not found: @${handle}`, raw, { handle });
    }

    this.log.debug("Resolved handle", { handle, channelId });
    return channelId;
  }

  private async resolveVideoOwner(videoId: string, raw: string): Promise<ChannelId> {
    const channelId = await this.lookup.getVideoOwner(videoId);
    if (!channelId) {
      throw new ResolutionError(`channel not found: video ${videoId} does not exist`, raw, {
        videoId,
      });
    }

    this.log.debug("Resolved video owner", { videoId, channelId });
    return channelId;
  }

  private async resolveSearch(query: string, raw: string): Promise<ChannelId> {
    const [top] = await this.lookup.searchChannels(query);
    if (!top) {
      throw new ResolutionError(`channel not found: no channel found for query "${query}"`, raw);
    }

    this.log.debug("Resolved search query", { query, channelId: top });
    return top;
  }
}
