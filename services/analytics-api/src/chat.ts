/**
 * Chat Answering
 * Asks the answering service when it is usable and falls back to the
 * local analysis on any failure or blank reply
 */

import {
  NO_DATA_MESSAGE,
  classifyQuestion,
  generateAnswer,
  normalizeItems,
  type ContentItem,
  type QuestionIntent,
} from "@channel-pulse/analytics";
import { describeError, logger } from "@channel-pulse/core";
import type { AnswerService } from "./shared/answerer/types.js";
import { SYSTEM_PROMPT, buildUserPrompt } from "./prompt.js";

const log = logger.child({ component: "chat" });

export type AnswerSource = "service" | "local";

export interface Answer {
  answer: string;
  source: AnswerSource;
  intent: QuestionIntent;
}

export async function answerQuestion(
  question: string,
  items: readonly ContentItem[],
  service?: AnswerService
): Promise<Answer> {
  const intent = classifyQuestion(question);
  const normalized = normalizeItems(items);

  if (normalized.length === 0) {
    return { answer: NO_DATA_MESSAGE, source: "local", intent };
  }

  const local = (): Answer => ({ answer: generateAnswer(intent, normalized), source: "local", intent });

  if (!service?.isReady()) {
    return local();
  }

  try {
    const reply = await service.complete({
      systemPrompt: SYSTEM_PROMPT,
      userPrompt: buildUserPrompt(question, intent, normalized),
    });

    if (!reply.trim()) {
      log.warn("Answering service returned a blank reply, answering locally", { service: service.name });
      return local();
    }

    return { answer: reply, source: "service", intent };
  } catch (error) {
    log.warn("Answering service failed, answering locally", {
      service: service.name,
      error: describeError(error),
    });
    return local();
  }
}
