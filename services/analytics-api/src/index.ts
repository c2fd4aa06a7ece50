#!/usr/bin/env node
/**
 * Channel Pulse CLI - Entry Point
 *
 *   serve    -> express app on the configured port
 *   sync     -> platform (or demo) items into the table store
 *   ask      -> classify, gather items, answer
 *   resolve  -> channel reference to canonical ID
 */

import { describeError, getConfig, jsonHandler, logger, type AppConfig } from "@channel-pulse/core";
import type { AnalyticsService, SyncResult } from "./analytics-service.js";
import { createApp } from "./app.js";
import { HELP_TEXT, parseArgs } from "./cli.js";
import { createAnalyticsService } from "./container.js";

function printSync(result: SyncResult): void {
  console.log(`\nChannel: ${result.channelId ?? "(demo data)"}`);
  console.log(`Source:  ${result.source}`);
  console.log(`Synced:  ${result.synced}`);
  console.log(`Stored:  ${result.stored ?? "store unavailable"}`);
  for (const item of result.items) {
    console.log(`\n  ${item.title}`);
    console.log(`    Views: ${item.views}, likes: ${item.likes}, comments: ${item.commentsCount}`);
    console.log(`    ${item.url}`);
  }
}

function serve(service: AnalyticsService, port: number): void {
  const app = createApp(service);
  app.listen(port, () => {
    logger.info("HTTP API listening", { port });
  });
}

async function main(): Promise<void> {
  const { command, positional, options } = parseArgs(process.argv.slice(2));

  if (command === "help") {
    console.log(HELP_TEXT);
    return;
  }

  let config: AppConfig;
  try {
    config = getConfig();
  } catch (error) {
    console.error("Configuration error:", describeError(error));
    console.error("\nSee .env.example for the supported variables.");
    process.exitCode = 1;
    return;
  }

  logger.setLevel(options.verbose ? "debug" : config.env.logLevel);
  if (config.env.nodeEnv === "production") {
    logger.setHandlers(jsonHandler);
  }

  const service = createAnalyticsService(config);

  switch (command) {
    case "serve":
      serve(service, options.port ?? config.server.port);
      return;

    case "sync": {
      const result = await service.sync({
        channel: positional || options.channel,
        count: options.count,
      });
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        printSync(result);
      }
      return;
    }

    case "ask": {
      if (!positional) {
        console.error("Usage: ask <question>");
        process.exitCode = 1;
        return;
      }
      const result = await service.chat({ question: positional, channel: options.channel });
      console.log(options.json ? JSON.stringify(result, null, 2) : `\n${result.answer}\n`);
      return;
    }

    case "resolve": {
      const channelId = await service.resolveChannel(positional || options.channel);
      console.log(channelId);
      return;
    }
  }
}

main().catch((error: unknown) => {
  logger.error("Command failed", error);
  console.error(describeError(error));
  process.exitCode = 1;
});
