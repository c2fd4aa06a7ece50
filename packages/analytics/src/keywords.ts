/**
 * Keyword tables for the question classifier, loaded from keywords.json
 */

import { readFileSync } from "fs";
import { z } from "zod";

const KeywordTablesSchema = z.object({
  engagement: z.array(z.string().min(1)),
  popularity: z.array(z.string().min(1)),
  worst: z.array(z.string().min(1)),
  recommendations: z.array(z.string().min(1)),
  numberWords: z.record(z.number().int().positive()),
});

export type KeywordTables = z.infer<typeof KeywordTablesSchema>;

/**
 * Lowercase and fold "ё" into "е" so either spelling matches
 */
export function foldText(text: string): string {
  return text.toLowerCase().replace(/ё/g, "е");
}

/**
 * A keyword matches from the start of a word. Cyrillic entries are stems
 * ("низк" matches "низкие"); Latin entries must match the whole word, so
 * "low" does not match "followers".
 */
export function matchesKeyword(text: string, keyword: string): boolean {
  const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const wholeWord = /^[\x20-\x7e]+$/.test(keyword);
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escaped}${wholeWord ? "(?![\\p{L}\\p{N}])" : ""}`, "u");
  return pattern.test(text);
}

function foldTables(tables: KeywordTables): KeywordTables {
  return {
    engagement: tables.engagement.map(foldText),
    popularity: tables.popularity.map(foldText),
    worst: tables.worst.map(foldText),
    recommendations: tables.recommendations.map(foldText),
    numberWords: Object.fromEntries(
      Object.entries(tables.numberWords).map(([word, value]) => [foldText(word), value])
    ),
  };
}

export function loadKeywordTables(
  file: URL = new URL("./keywords.json", import.meta.url)
): KeywordTables {
  const content = readFileSync(file, "utf-8");
  return foldTables(KeywordTablesSchema.parse(JSON.parse(content)));
}

export const KEYWORDS: KeywordTables = loadKeywordTables();
