/**
 * Question Classifier
 *
 * Bag-of-keywords classification of analytics questions. The resulting intent
 * is also embedded verbatim into the prompt sent to the answering service.
 */

import { foldText, KEYWORDS, matchesKeyword, type KeywordTables } from "./keywords.js";

export type Metric = "views" | "engagement";
export type Direction = "best" | "worst";

export interface QuestionIntent {
  metric: Metric;
  direction: Direction;
  requestedCount: number;
  wantsRecommendations: boolean;
}

export interface CountRange {
  min: number;
  max: number;
}

/** How many items to show in the answer */
export const ANSWER_COUNT_RANGE: CountRange = { min: 1, max: 10 };
export const DEFAULT_ANSWER_COUNT = 3;

/** How many recent items to consider */
export const RECENCY_RANGE: CountRange = { min: 3, max: 20 };
export const DEFAULT_RECENCY = 5;

export interface ClassifierOptions {
  countRange?: CountRange;
  defaultCount?: number;
  keywords?: KeywordTables;
}

function containsAny(text: string, keywords: string[]): boolean {
  return keywords.some((keyword) => matchesKeyword(text, keyword));
}

function clamp(value: number, range: CountRange): number {
  return Math.min(range.max, Math.max(range.min, value));
}

/**
 * Last integer literal in the text, else the last number word, else null
 */
export function findRequestedNumber(
  question: string,
  numberWords: Record<string, number> = KEYWORDS.numberWords
): number | null {
  const text = foldText(question);

  const literals = text.match(/\d+/g);
  if (literals && literals.length > 0) {
    return parseInt(literals[literals.length - 1], 10);
  }

  // Whole words only: "три" must not match inside "метрика"
  const words = text.match(/\p{L}+/gu) ?? [];
  let found: number | null = null;
  for (const word of words) {
    const value = numberWords[word];
    if (value !== undefined) {
      found = value;
    }
  }
  return found;
}

export function classifyQuestion(question: string, options: ClassifierOptions = {}): QuestionIntent {
  const keywords = options.keywords ?? KEYWORDS;
  const range = options.countRange ?? ANSWER_COUNT_RANGE;
  const text = foldText(question);

  let metric: Metric = "views";
  if (containsAny(text, keywords.engagement)) {
    metric = "engagement";
  } else if (containsAny(text, keywords.popularity)) {
    metric = "views";
  }

  const direction: Direction = containsAny(text, keywords.worst) ? "worst" : "best";

  const requested = findRequestedNumber(question, keywords.numberWords);
  const requestedCount = clamp(requested ?? options.defaultCount ?? DEFAULT_ANSWER_COUNT, range);

  return {
    metric,
    direction,
    requestedCount,
    wantsRecommendations: containsAny(text, keywords.recommendations),
  };
}

/**
 * How many recent items the question wants considered ("из последних десяти").
 * Kept apart from requestedCount: different range, different default.
 */
export function extractRequestedRecency(
  question: string,
  defaultRecency: number = DEFAULT_RECENCY,
  range: CountRange = RECENCY_RANGE
): number {
  const requested = findRequestedNumber(question);
  return clamp(requested ?? defaultRecency, range);
}
