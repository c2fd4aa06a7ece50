/**
 * Channel Reference Parsing
 *
 * Classifies free-text channel references into a tagged variant. Pure, no
 * network. Order matters: the first matching shape wins.
 *
 *   ""                                   -> empty
 *   UCxxxxxxxxxxxxxxxxxxxx               -> channel-id
 *   @handle                              -> handle
 *   https://youtu.be/<video>             -> video-url
 *   https://www.youtube.com/watch?v=<v>  -> video-url
 *   https://.../channel/<id>             -> channel-url
 *   https://.../@<handle>                -> handle-url
 *   anything else                        -> search
 */

export const CHANNEL_ID_PREFIX = "UC";
export const CHANNEL_ID_MIN_LENGTH = 20;

const SHORT_VIDEO_HOSTS = ["youtu.be"];
const VIDEO_HOSTS = ["youtube.com", "youtube-nocookie.com"];
const VIDEO_PATH_PREFIXES = ["shorts", "live", "embed", "v"];

export type ChannelReference =
  | { kind: "empty" }
  | { kind: "channel-id"; channelId: string }
  | { kind: "handle"; handle: string }
  | { kind: "video-url"; videoId: string; url: string }
  | { kind: "channel-url"; channelId: string; url: string }
  | { kind: "handle-url"; handle: string; url: string }
  | { kind: "search"; query: string };

export type ChannelReferenceKind = ChannelReference["kind"];

export function isCanonicalChannelId(value: string): boolean {
  return value.startsWith(CHANNEL_ID_PREFIX) && value.length >= CHANNEL_ID_MIN_LENGTH;
}

function matchesHost(host: string, candidates: string[]): boolean {
  return candidates.some((candidate) => host === candidate || host.endsWith(`.${candidate}`));
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Path segment up to the next "/", "?" or "&"
 */
function pathSegments(url: URL): string[] {
  return url.pathname
    .split("/")
    .map((segment) => decodeSegment(segment).split(/[?&]/)[0]?.trim() ?? "")
    .filter(Boolean);
}

function extractVideoId(url: URL, segments: string[]): string | null {
  const host = url.hostname.toLowerCase();
  const [first, second] = segments;
  // path prefixes are case-insensitive, the ids after them are not
  const prefix = first?.toLowerCase();

  if (matchesHost(host, SHORT_VIDEO_HOSTS)) {
    return first ?? null;
  }

  if (!matchesHost(host, VIDEO_HOSTS)) {
    return null;
  }

  if (prefix === "watch") {
    const videoId = url.searchParams.get("v")?.trim();
    return videoId || null;
  }

  if (prefix && second && VIDEO_PATH_PREFIXES.includes(prefix)) {
    return second;
  }

  return null;
}

function parseUrlReference(raw: string): ChannelReference {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return { kind: "search", query: raw };
  }

  const segments = pathSegments(url);

  const videoId = extractVideoId(url, segments);
  if (videoId) {
    return { kind: "video-url", videoId, url: raw };
  }

  const [first, second] = segments;

  if (first?.toLowerCase() === "channel" && second) {
    return { kind: "channel-url", channelId: second, url: raw };
  }

  if (first && first.startsWith("@") && first.length > 1) {
    return { kind: "handle-url", handle: first.slice(1), url: raw };
  }

  return { kind: "search", query: raw };
}

export function parseChannelReference(input: string | null | undefined): ChannelReference {
  const trimmed = (input ?? "").trim();

  if (!trimmed) {
    return { kind: "empty" };
  }

  if (isCanonicalChannelId(trimmed)) {
    return { kind: "channel-id", channelId: trimmed };
  }

  if (trimmed.startsWith("@")) {
    return { kind: "handle", handle: trimmed.slice(1) };
  }

  if (/^https?:\/\//i.test(trimmed)) {
    return parseUrlReference(trimmed);
  }

  return { kind: "search", query: trimmed };
}
