import { createContentItem, type ContentItem } from "@channel-pulse/analytics";

/**
 * Shown when neither the table store nor the video platform can supply items
 */
export const DEMO_ITEMS: readonly ContentItem[] = [
  createContentItem({
    platform: "YouTube",
    externalId: "video_1",
    url: "https://youtube.com/watch?v=video_1",
    title: "Тестовое видео №1",
    views: 1234,
    likes: 150,
    commentsCount: 12,
  }),
  createContentItem({
    platform: "YouTube",
    externalId: "video_2",
    url: "https://youtube.com/watch?v=video_2",
    title: "Тестовое видео №2",
    views: 5678,
    likes: 430,
    commentsCount: 45,
  }),
];
