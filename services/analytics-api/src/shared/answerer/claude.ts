/**
 * Claude Answerer
 * Single-turn, tool-free completion through the Claude Agent SDK
 */

import { query, type Options, type SDKMessage } from "@anthropic-ai/claude-agent-sdk";
import { UpstreamTransportError, logger, type ChildLogger } from "@channel-pulse/core";
import type { AnswerRequest, AnswerService } from "./types.js";
import { DEFAULT_ANSWER_TIMEOUT_MS } from "./openrouter.js";

const SERVICE = "claude";

/** Shape of the SDK's query function, narrowed to what is used here */
export type ClaudeQuery = (params: { prompt: string; options?: Options }) => AsyncIterable<SDKMessage>;

export interface ClaudeAnswerOptions {
  model?: string;
  timeoutMs?: number;
  /** Replaces the SDK call, e.g. in tests */
  queryFn?: ClaudeQuery;
}

export class ClaudeAnswerService implements AnswerService {
  readonly name = SERVICE;

  private readonly model?: string;
  private readonly timeoutMs: number;
  private readonly queryFn: ClaudeQuery;
  private readonly log: ChildLogger;

  constructor(options: ClaudeAnswerOptions = {}) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ANSWER_TIMEOUT_MS;
    this.queryFn = options.queryFn ?? query;
    this.log = logger.child({ component: SERVICE });
  }

  /**
   * Check if executor is ready
   */
  isReady(): boolean {
    return !!process.env.ANTHROPIC_API_KEY;
  }

  async complete(request: AnswerRequest): Promise<string> {
    const abortController = new AbortController();
    const timer = setTimeout(() => abortController.abort(), this.timeoutMs);

    const options: Options = {
      systemPrompt: request.systemPrompt,
      model: this.model,
      maxTurns: 1,
      allowedTools: [],
      abortController,
    };

    let streamed = "";
    try {
      for await (const message of this.queryFn({ prompt: request.userPrompt, options })) {
        if (message.type === "assistant") {
          for (const block of message.message.content) {
            if (block.type === "text") {
              streamed += block.text;
            }
          }
        } else if (message.type === "result") {
          if (message.subtype !== "success") {
            throw new UpstreamTransportError(`Claude query ended with ${message.subtype}`, SERVICE);
          }
          this.log.metric("answer_cost_usd", message.total_cost_usd);
          return message.result || streamed;
        }
      }
    } catch (error) {
      if (error instanceof UpstreamTransportError) throw error;
      throw new UpstreamTransportError(
        abortController.signal.aborted
          ? `Claude query timed out after ${this.timeoutMs}ms`
          : `Claude query failed: ${error instanceof Error ? error.message : String(error)}`,
        SERVICE,
        { cause: error instanceof Error ? error : undefined }
      );
    } finally {
      clearTimeout(timer);
    }

    throw new UpstreamTransportError("Claude query ended without a result", SERVICE);
  }
}
