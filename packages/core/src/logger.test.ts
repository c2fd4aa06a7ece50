import { afterEach, describe, it, expect } from "vitest";
import { logger, type LogEntry } from "./logger.js";

function collect(): LogEntry[] {
  const entries: LogEntry[] = [];
  logger.setHandlers((entry) => entries.push(entry));
  return entries;
}

afterEach(() => {
  logger.resetHandlers();
  logger.setLevel("info");
});

describe("logger", () => {
  it("drops entries below the current level", () => {
    const entries = collect();
    logger.debug("hidden");
    logger.info("shown");

    expect(entries.map((entry) => entry.message)).toEqual(["shown"]);
  });

  it("merges child context", () => {
    const entries = collect();
    logger.child({ component: "resolver" }).child({ channelId: "UC1" }).warn("slow", { endpoint: "/search" });

    expect(entries[0]?.level).toBe("warn");
    expect(entries[0]?.context).toEqual({ component: "resolver", channelId: "UC1", endpoint: "/search" });
  });

  it("attaches error details", () => {
    const entries = collect();
    logger.error("failed", new Error("boom"));

    expect(entries[0]?.error?.message).toBe("boom");
    expect(entries[0]?.context).toBeUndefined();
  });

  it("emits metrics as info entries", () => {
    const entries = collect();
    logger.metric("items_synced", 4, { component: "sync" });

    expect(entries[0]?.message).toBe("METRIC: items_synced=4");
    expect(entries[0]?.context).toEqual({ component: "sync", metric: "items_synced", value: 4 });
  });

  it("adds scoped context to entries written inside the scope", async () => {
    const entries = collect();
    const log = logger.child({ component: "http" });

    await logger.runWithContext({ correlationId: "req-1" }, async () => {
      await Promise.resolve();
      log.info("inside", { path: "/chat" });
      logger.runWithContext({ channelId: "UC1" }, () => logger.warn("nested"));
    });
    logger.info("outside");

    expect(entries.map((entry) => entry.context)).toEqual([
      { correlationId: "req-1", component: "http", path: "/chat" },
      { correlationId: "req-1", channelId: "UC1" },
      undefined,
    ]);
  });

  it("keeps going when a handler throws", () => {
    const entries: LogEntry[] = [];
    logger.setHandlers(
      () => {
        throw new Error("broken handler");
      },
      (entry) => entries.push(entry)
    );
    const original = console.error;
    console.error = () => undefined;
    try {
      logger.info("still delivered");
    } finally {
      console.error = original;
    }

    expect(entries).toHaveLength(1);
  });
});
