/**
 * Prompts for the answering service
 */

import { buildAnalysisHint, type NormalizedItem, type QuestionIntent } from "@channel-pulse/analytics";

export const SYSTEM_PROMPT =
  "Ты аналитик контента. " +
  "У тебя есть список видео с просмотрами, лайками, комментариями и метрикой вовлечённости " +
  "(engagement_rate = (likes + comments) / views). " +
  "Отвечай структурировано, коротко, на русском, без воды.";

const ANSWER_RULES = [
  "Как отвечать:",
  "1) Если вопрос про самое популярное видео, выведи топ по просмотрам (views) с указанием views, likes, engagement_rate и коротким комментарием.",
  "2) Если вопрос про вовлечённость, ориентируйся на engagement_rate.",
  "3) Если вопрос общий, сам выбери разумный критерий (views + engagement_rate) и объясни выбор.",
  "4) В конце добавь короткий вывод (1–2 предложения), что можно улучшить в контенте.",
  "Отвечай в виде короткого текста с маркированным списком.",
].join("\n");

export function formatItemLine(item: NormalizedItem, position: number): string {
  return (
    `${position}. [${item.platform}] ${item.title} | ` +
    `views=${item.views}, likes=${item.likes}, comments=${item.commentsCount}, ` +
    `engagement_rate=${item.engagementRate.toFixed(3)}, url=${item.url}`
  );
}

export function buildUserPrompt(
  question: string,
  intent: QuestionIntent,
  items: readonly NormalizedItem[]
): string {
  const lines = items.map((item, index) => formatItemLine(item, index + 1));

  return [
    "Вот данные о материалах (по одному на строку):",
    ...lines,
    "",
    `Вопрос пользователя: ${question}`,
    "",
    buildAnalysisHint(intent, items),
    "",
    ANSWER_RULES,
  ].join("\n");
}
