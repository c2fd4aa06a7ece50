/**
 * HTTP API
 *   GET  /ping   liveness
 *   POST /sync   pull recent items and store new ones
 *   POST /chat   answer an analytics question
 *   GET  /       chat page
 */

import { randomUUID } from "crypto";
import { readFileSync } from "fs";
import express, { type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import {
  ResolutionError,
  UpstreamTransportError,
  ValidationError,
  isChannelPulseError,
  logger,
} from "@channel-pulse/core";
import type { AnalyticsService } from "./analytics-service.js";

const log = logger.child({ component: "http" });

const CHAT_PAGE = readFileSync(new URL("./public/index.html", import.meta.url), "utf-8");

export const SyncBodySchema = z.object({
  channel: z.string().trim().optional(),
  count: z.number().int().min(1).max(50).optional(),
});

export const ChatBodySchema = z.object({
  question: z.string().trim().min(1, "question is required"),
  channel: z.string().trim().optional(),
});

type Handler = (req: Request, res: Response) => Promise<void>;

function asyncHandler(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".");
    throw new ValidationError(field ? `${field}: ${issue?.message}` : issue?.message ?? "Invalid request body", {
      field,
    });
  }
  return result.data;
}

function statusFor(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof ResolutionError) return 404;
  if (error instanceof UpstreamTransportError) return 502;
  return 500;
}

export function createApp(service: AnalyticsService): express.Express {
  const app = express();

  app.use(express.json());

  app.use((req, res, next) => {
    const correlationId = req.header("x-correlation-id") ?? randomUUID();
    const startTime = Date.now();
    res.setHeader("x-correlation-id", correlationId);
    logger.runWithContext({ correlationId }, () => {
      res.on("finish", () => {
        log.debug("Request handled", {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Date.now() - startTime,
        });
      });
      next();
    });
  });

  app.get("/ping", (_req, res) => {
    res.json({ status: "ok", message: "pong" });
  });

  app.post(
    "/sync",
    asyncHandler(async (req, res) => {
      const body = parseBody(SyncBodySchema, req.body);
      const result = await service.sync({ channel: body.channel || undefined, count: body.count });
      res.json(result);
    })
  );

  app.post(
    "/chat",
    asyncHandler(async (req, res) => {
      const body = parseBody(ChatBodySchema, req.body);
      const result = await service.chat({ question: body.question, channel: body.channel || undefined });
      res.json(result);
    })
  );

  app.get("/", (_req, res) => {
    res.type("html").send(CHAT_PAGE);
  });

  // express.json() reports malformed bodies as SyntaxError
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body", code: "VALIDATION_ERROR" });
      return;
    }

    const status = statusFor(error);
    if (status >= 500) {
      log.error("Request failed", error);
    }

    if (isChannelPulseError(error)) {
      res.status(status).json({ error: error.message, code: error.code });
    } else {
      res.status(500).json({ error: "Internal Server Error" });
    }
  });

  return app;
}
