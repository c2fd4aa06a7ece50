/**
 * Analytics Answer Generator
 * Deterministic, ranked report over normalized items. Serves as the final
 * answer when no answering service is usable, and as the analysis hint
 * embedded in the prompt when one is.
 */

import type { Direction, Metric, QuestionIntent } from "./classifier.js";
import type { NormalizedItem } from "./items.js";

export const NO_DATA_MESSAGE = "Нет данных о контенте, чтобы ответить на вопрос.";

const METRIC_LABELS: Record<Metric, string> = {
  views: "просмотрам",
  engagement: "вовлечённости",
};

const DIRECTION_LABELS: Record<Direction, string> = {
  best: "Топ",
  worst: "Антитоп",
};

export interface SampleSummary {
  size: number;
  meanViews: number;
  meanEngagement: number;
  topByEngagement: NormalizedItem;
  topByViews: NormalizedItem;
}

function metricValue(item: NormalizedItem, metric: Metric): number {
  return metric === "engagement" ? item.engagementRate : item.views;
}

/**
 * First item with the strictly highest value wins ties
 */
function maxBy(items: readonly NormalizedItem[], value: (item: NormalizedItem) => number): NormalizedItem {
  return items.reduce((best, item) => (value(item) > value(best) ? item : best));
}

/**
 * Stable: equal values keep their input order
 */
export function rankItems(
  items: readonly NormalizedItem[],
  metric: Metric,
  direction: Direction
): NormalizedItem[] {
  const sign = direction === "best" ? -1 : 1;
  return [...items].sort((a, b) => sign * (metricValue(a, metric) - metricValue(b, metric)));
}

export function summarizeSample(items: readonly NormalizedItem[]): SampleSummary | null {
  if (items.length === 0) return null;

  const totalViews = items.reduce((sum, item) => sum + item.views, 0);
  const totalEngagement = items.reduce((sum, item) => sum + item.engagementRate, 0);

  return {
    size: items.length,
    meanViews: Math.floor(totalViews / items.length),
    meanEngagement: totalEngagement / items.length,
    topByEngagement: maxBy(items, (item) => item.engagementRate),
    topByViews: maxBy(items, (item) => item.views),
  };
}

function formatRate(rate: number): string {
  return rate.toFixed(3);
}

function renderEntry(item: NormalizedItem, position: number): string[] {
  return [
    `${position}. ${item.title}`,
    `   Просмотры: ${item.views}, лайки: ${item.likes}, комментарии: ${item.commentsCount}, ` +
      `вовлечённость: ${formatRate(item.engagementRate)}`,
    `   Ссылка: ${item.url}`,
  ];
}

function renderRecommendations(summary: SampleSummary): string[] {
  const { topByEngagement, topByViews } = summary;
  return [
    "Рекомендации:",
    `- Разберите «${topByEngagement.title}»: у него самая высокая вовлечённость ` +
      `(${formatRate(topByEngagement.engagementRate)}), повторите его тему и подачу.`,
    `- Развивайте формат «${topByViews.title}»: он собрал больше всего просмотров (${topByViews.views}).`,
    `- Просите зрителей ставить лайки и оставлять комментарии, чтобы поднять вовлечённость ` +
      `выше средней (${formatRate(summary.meanEngagement)}).`,
  ];
}

export function generateAnswer(intent: QuestionIntent, items: readonly NormalizedItem[]): string {
  const summary = summarizeSample(items);
  if (!summary) {
    return NO_DATA_MESSAGE;
  }

  const top = rankItems(items, intent.metric, intent.direction).slice(0, intent.requestedCount);

  const lines = [
    `${DIRECTION_LABELS[intent.direction]}-${top.length} материалов по ${METRIC_LABELS[intent.metric]} ` +
      `(из последних ${summary.size} видео):`,
    "",
  ];

  top.forEach((item, index) => {
    lines.push(...renderEntry(item, index + 1));
  });

  lines.push(
    "",
    `Средние значения по выборке: просмотры ${summary.meanViews}, ` +
      `вовлечённость ${formatRate(summary.meanEngagement)}.`,
    "",
    ...renderRecommendations(summary)
  );

  return lines.join("\n");
}

/**
 * Structured hint for the answering-service prompt, so its prose stays
 * consistent with the local analysis
 */
export function buildAnalysisHint(intent: QuestionIntent, items: readonly NormalizedItem[]): string {
  const summary = summarizeSample(items);
  const lines = [
    "Предварительный анализ:",
    `- metric: ${intent.metric}`,
    `- direction: ${intent.direction}`,
    `- count: ${intent.requestedCount}`,
    `- recommendations: ${intent.wantsRecommendations ? "yes" : "no"}`,
  ];

  if (summary) {
    lines.push(
      `- sample_size: ${summary.size}`,
      `- mean_views: ${summary.meanViews}`,
      `- mean_engagement_rate: ${formatRate(summary.meanEngagement)}`
    );
  }

  return lines.join("\n");
}
