import type { Server } from "http";
import { afterAll, afterEach, beforeAll, describe, it, expect } from "vitest";
import { logger, type LogEntry } from "@channel-pulse/core";
import type { AnalyticsService } from "./analytics-service.js";
import { createApp } from "./app.js";
import { DEFAULT_CHANNEL, buildService, fakeSource } from "./testing/fakes.js";

let server: Server | undefined;

async function start(service: AnalyticsService): Promise<string> {
  const app = createApp(service);
  return new Promise((resolve) => {
    const listening = app.listen(0, () => {
      const address = listening.address();
      resolve(`http://127.0.0.1:${typeof address === "object" && address ? address.port : 0}`);
    });
    server = listening;
  });
}

async function post(baseUrl: string, path: string, body: string): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

beforeAll(() => {
  logger.setHandlers();
});

afterAll(() => {
  logger.resetHandlers();
});

afterEach(async () => {
  const running = server;
  server = undefined;
  if (!running) return;
  running.closeAllConnections();
  await new Promise<void>((resolve, reject) => {
    running.close((error) => (error ? reject(error) : resolve()));
  });
});

describe("HTTP API", () => {
  it("answers ping", async () => {
    const baseUrl = await start(buildService());

    const response = await fetch(`${baseUrl}/ping`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok", message: "pong" });
  });

  it("serves the chat page", async () => {
    const baseUrl = await start(buildService());

    const response = await fetch(`${baseUrl}/`);

    expect(response.headers.get("content-type")).toContain("text/html");
    expect(await response.text()).toContain("<title>Channel Pulse</title>");
  });

  it("answers chat questions", async () => {
    const baseUrl = await start(buildService());

    const response = await post(baseUrl, "/chat", JSON.stringify({ question: "какое самое популярное видео?" }));
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ source: "local", itemsSource: "demo", itemCount: 2 });
    expect(body).toHaveProperty("answer", expect.stringMatching(/^Топ-2 материалов по просмотрам \(из последних 2 видео\):\n/));
  });

  it("tags request logs with the correlation id", async () => {
    const baseUrl = await start(buildService());
    const entries: LogEntry[] = [];
    logger.setHandlers((entry) => entries.push(entry));

    try {
      const response = await fetch(`${baseUrl}/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json", "x-correlation-id": "req-42" },
        body: JSON.stringify({ question: "лучшее видео" }),
      });

      expect(response.headers.get("x-correlation-id")).toBe("req-42");
    } finally {
      logger.setHandlers();
    }

    const answered = entries.find((entry) => entry.message === "Answered question");
    expect(answered?.context).toMatchObject({ correlationId: "req-42", component: "analytics" });
  });

  it("rejects a chat request without a question", async () => {
    const baseUrl = await start(buildService());

    const response = await post(baseUrl, "/chat", JSON.stringify({ question: "   " }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "question: question is required", code: "VALIDATION_ERROR" });
  });

  it("rejects malformed JSON", async () => {
    const baseUrl = await start(buildService());

    const response = await post(baseUrl, "/chat", "{not json");

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Malformed JSON body", code: "VALIDATION_ERROR" });
  });

  it("syncs recent items", async () => {
    const source = fakeSource({ v1: { title: "One", views: 10, likes: 1, comments: 1 } });
    const baseUrl = await start(buildService({ source, defaultChannelId: DEFAULT_CHANNEL }));

    const response = await post(baseUrl, "/sync", JSON.stringify({ count: 3 }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      channelId: DEFAULT_CHANNEL,
      source: "platform",
      synced: 1,
      stored: null,
      items: [
        {
          platform: "YouTube",
          externalId: "v1",
          url: "https://www.youtube.com/watch?v=v1",
          title: "One",
          views: 10,
          likes: 1,
          commentsCount: 1,
        },
      ],
    });
    expect(source.searchVideos).toHaveBeenCalledWith(DEFAULT_CHANNEL, 3);
  });

  it("rejects an out-of-range count", async () => {
    const baseUrl = await start(buildService());

    const response = await post(baseUrl, "/sync", JSON.stringify({ count: 0 }));

    expect(response.status).toBe(400);
  });

  it("maps unknown channels to 404", async () => {
    const baseUrl = await start(buildService({ source: fakeSource({}) }));

    const response = await post(baseUrl, "/sync", JSON.stringify({ channel: "@nobody" }));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: "channel not found: @nobody", code: "RESOLUTION_ERROR" });
  });

  it("maps a missing default channel to 500", async () => {
    const baseUrl = await start(buildService({ source: fakeSource({}) }));

    const response = await post(baseUrl, "/sync", "{}");

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: "No channel reference given and no default channel configured",
      code: "CONFIGURATION_ERROR",
    });
  });
});
