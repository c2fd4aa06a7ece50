import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { ConfigurationError, UpstreamTransportError } from "@channel-pulse/core";
import { YouTubeClient } from "./client.js";

const fetchMock = vi.fn<typeof fetch>();

function respond(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function requestedUrl(call = 0): URL {
  return new URL(String(fetchMock.mock.calls[call]?.[0]));
}

function client(): YouTubeClient {
  return new YouTubeClient({ apiKey: "test-key", timeoutMs: 1000 });
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("YouTubeClient", () => {
  describe("searchVideos", () => {
    it("lists the newest video ids of a channel", async () => {
      fetchMock.mockResolvedValueOnce(
        respond({
          items: [
            { id: { kind: "youtube#video", videoId: "v1" } },
            { id: { kind: "youtube#playlist" } },
            { id: { kind: "youtube#video", videoId: "v2" } },
          ],
        })
      );

      await expect(client().searchVideos("UCabcdefghijklmnopqrstuv", 5)).resolves.toEqual(["v1", "v2"]);

      const url = requestedUrl();
      expect(url.origin + url.pathname).toBe("https://www.googleapis.com/youtube/v3/search");
      expect(url.searchParams.get("channelId")).toBe("UCabcdefghijklmnopqrstuv");
      expect(url.searchParams.get("maxResults")).toBe("5");
      expect(url.searchParams.get("order")).toBe("date");
      expect(url.searchParams.get("type")).toBe("video");
      expect(url.searchParams.get("key")).toBe("test-key");
    });

    it("caps maxResults at the API limit", async () => {
      fetchMock.mockResolvedValueOnce(respond({ items: [] }));
      await client().searchVideos("UCabcdefghijklmnopqrstuv", 80);
      expect(requestedUrl().searchParams.get("maxResults")).toBe("50");
    });
  });

  describe("getStats", () => {
    it("parses counters and fills gaps", async () => {
      fetchMock.mockResolvedValueOnce(
        respond({
          items: [
            {
              id: "v1",
              snippet: { title: "First", channelId: "UC1" },
              statistics: { viewCount: "1200", likeCount: "30", commentCount: "4" },
            },
            { id: "v2", statistics: { viewCount: "15" } },
          ],
        })
      );

      const stats = await client().getStats(["v1", "v2", "v3"]);

      expect(requestedUrl().searchParams.get("id")).toBe("v1,v2,v3");
      expect(requestedUrl().searchParams.get("part")).toBe("snippet,statistics");
      expect(stats.get("v1")).toEqual({ title: "First", views: 1200, likes: 30, comments: 4 });
      expect(stats.get("v2")).toEqual({ title: "Video v2", views: 15, likes: 0, comments: 0 });
      expect(stats.has("v3")).toBe(false);
    });

    it("splits large id lists into batches of 50", async () => {
      fetchMock.mockImplementation(async () => respond({ items: [] }));
      const ids = Array.from({ length: 51 }, (_, i) => `v${i}`);

      await client().getStats(ids);

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(requestedUrl(1).searchParams.get("id")).toBe("v50");
    });
  });

  describe("lookups", () => {
    it("finds the owner of a video", async () => {
      fetchMock.mockResolvedValueOnce(respond({ items: [{ id: "abc123", snippet: { channelId: "UCowner" } }] }));
      await expect(client().getVideoOwner("abc123")).resolves.toBe("UCowner");
      expect(requestedUrl().searchParams.get("part")).toBe("snippet");
    });

    it("returns null for a missing video", async () => {
      fetchMock.mockResolvedValueOnce(respond({ items: [] }));
      await expect(client().getVideoOwner("gone")).resolves.toBeNull();
    });

    it("looks up a handle", async () => {
      fetchMock.mockResolvedValueOnce(respond({ items: [{ id: "UChandle" }] }));
      await expect(client().getChannelByHandle("SomeChannel")).resolves.toBe("UChandle");
      expect(requestedUrl().searchParams.get("forHandle")).toBe("@SomeChannel");
    });

    it("returns null when the handle is unknown", async () => {
      fetchMock.mockResolvedValueOnce(respond({ kind: "youtube#channelListResponse" }));
      await expect(client().getChannelByHandle("nobody")).resolves.toBeNull();
    });

    it("searches channels by name", async () => {
      fetchMock.mockResolvedValueOnce(
        respond({ items: [{ id: { channelId: "UCfirst" } }, { id: { channelId: "UCsecond" } }] })
      );
      await expect(client().searchChannels("cooking show")).resolves.toEqual(["UCfirst", "UCsecond"]);
      expect(requestedUrl().searchParams.get("q")).toBe("cooking show");
      expect(requestedUrl().searchParams.get("type")).toBe("channel");
    });
  });

  describe("failures", () => {
    it("requires an API key before any request", async () => {
      await expect(new YouTubeClient().searchChannels("x")).rejects.toBeInstanceOf(ConfigurationError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("reports non-2xx responses with status and endpoint", async () => {
      fetchMock.mockResolvedValueOnce(respond({ error: { code: 403, message: "quotaExceeded" } }, 403));

      const error = await client().searchVideos("UC1", 5).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamTransportError);
      expect(error).toMatchObject({
        message: "YouTube API error 403: quotaExceeded",
        statusCode: 403,
        endpoint: "/search",
      });
    });

    it("keeps the status when an error body is not JSON", async () => {
      fetchMock.mockResolvedValueOnce(
        new Response("<html><body>503 Service Unavailable</body></html>", {
          status: 503,
          headers: { "Content-Type": "text/html" },
        })
      );

      const error = await client().searchVideos("UC1", 5).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamTransportError);
      expect(error).toMatchObject({
        message: "YouTube API error 503",
        statusCode: 503,
        endpoint: "/search",
      });
    });

    it("rejects a successful response that is not JSON", async () => {
      fetchMock.mockResolvedValueOnce(new Response("not json", { status: 200 }));

      const error = await client().getVideoOwner("v1").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamTransportError);
      expect(error).toMatchObject({ message: "YouTube API returned invalid JSON", statusCode: 200 });
    });

    it("rejects malformed payloads", async () => {
      fetchMock.mockResolvedValueOnce(respond({ items: [{ snippet: {} }] }));
      await expect(client().getStats(["v1"])).rejects.toBeInstanceOf(UpstreamTransportError);
    });

    it("wraps network failures without a status", async () => {
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

      const error = await client().getVideoOwner("v1").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamTransportError);
      expect(error).toMatchObject({ message: "Failed to reach YouTube API: fetch failed", statusCode: undefined });
    });

    it("aborts slow requests", async () => {
      fetchMock.mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          })
      );
      const slow = new YouTubeClient({ apiKey: "test-key", timeoutMs: 5 });

      await expect(slow.getChannelByHandle("x")).rejects.toThrow("YouTube API request timed out after 5ms");
    });
  });

  it("builds watch URLs", () => {
    expect(client().videoUrl("abc")).toBe("https://www.youtube.com/watch?v=abc");
  });
});
