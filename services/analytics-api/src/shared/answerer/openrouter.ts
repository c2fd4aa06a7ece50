/**
 * OpenRouter Answerer
 * OpenAI-compatible chat completions over fetch
 */

import { z } from "zod";
import { UpstreamTransportError, logger, type ChildLogger } from "@channel-pulse/core";
import type { AnswerRequest, AnswerService } from "./types.js";

export const DEFAULT_ANSWER_TIMEOUT_MS = 60_000;

const SERVICE = "openrouter";

export interface OpenRouterOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
}

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
        }),
      })
    )
    .min(1),
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

export class OpenRouterAnswerService implements AnswerService {
  readonly name = SERVICE;

  private readonly options: Required<OpenRouterOptions>;
  private readonly url: string;
  private readonly log: ChildLogger;

  constructor(options: OpenRouterOptions) {
    this.options = {
      apiKey: options.apiKey,
      baseUrl: options.baseUrl,
      model: options.model,
      timeoutMs: options.timeoutMs ?? DEFAULT_ANSWER_TIMEOUT_MS,
      temperature: options.temperature ?? 0.3,
      maxTokens: options.maxTokens ?? 900,
    };
    const base = options.baseUrl.trim().replace(/\/+$/g, "");
    this.url = `${base}/chat/completions`;
    this.log = logger.child({ component: SERVICE, model: options.model });
  }

  isReady(): boolean {
    return Boolean(this.options.apiKey);
  }

  async complete(request: AnswerRequest): Promise<string> {
    const endpoint = "/chat/completions";
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const startTime = Date.now();

    let response: Response;
    let data: unknown;
    try {
      response = await fetch(this.url, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify({
          model: this.options.model,
          messages: [
            { role: "system", content: request.systemPrompt },
            { role: "user", content: request.userPrompt },
          ],
          temperature: this.options.temperature,
          max_tokens: this.options.maxTokens,
        }),
        signal: controller.signal,
      });
      data = await response.json().catch(() => ({}));
    } catch (error) {
      throw new UpstreamTransportError(
        controller.signal.aborted
          ? `Answering service timed out after ${this.options.timeoutMs}ms`
          : `Failed to reach answering service: ${error instanceof Error ? error.message : String(error)}`,
        SERVICE,
        { endpoint, cause: error instanceof Error ? error : undefined }
      );
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      const body = ErrorBodySchema.safeParse(data);
      throw new UpstreamTransportError(
        body.success ? body.data.error.message : `LLM HTTP ${response.status}`,
        SERVICE,
        { statusCode: response.status, endpoint }
      );
    }

    const parsed = CompletionSchema.safeParse(data);
    const content = parsed.success ? parsed.data.choices[0]?.message.content : undefined;
    if (!content) {
      throw new UpstreamTransportError("LLM response missing content", SERVICE, {
        statusCode: response.status,
        endpoint,
      });
    }

    this.log.metric("answer_latency_ms", Date.now() - startTime);
    return content;
  }
}
