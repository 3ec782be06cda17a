/**
 * Keyword-tier sentiment for a single comment
 */

import { countHits } from './keywords.js';
import type { Sentiment } from './schema.js';

const STRONG_WEIGHT = 2;
const ORDINARY_WEIGHT = 1;

export const SENTIMENT_KEYWORDS = {
  positive: {
    strong: ['amazing', 'beautiful', 'incredible', 'love', 'perfect', 'masterpiece'],
    ordinary: ['great', 'awesome', 'good', 'nice', 'sweet', 'crying', 'tears', 'emotional', 'inspiring', 'wholesome'],
  },
  negative: {
    strong: ['hate', 'terrible', 'awful', 'disgusting', 'fake', 'staged'],
    ordinary: ['bad', 'boring', 'cringe', 'scripted', 'annoying', 'clickbait'],
  },
} as const;

export interface SentimentTotals {
  positive: number;
  negative: number;
}

export function sentimentTotals(commentText: string): SentimentTotals {
  const text = commentText.toLowerCase();
  const { positive, negative } = SENTIMENT_KEYWORDS;
  return {
    positive: STRONG_WEIGHT * countHits(text, positive.strong) + ORDINARY_WEIGHT * countHits(text, positive.ordinary),
    negative: STRONG_WEIGHT * countHits(text, negative.strong) + ORDINARY_WEIGHT * countHits(text, negative.ordinary),
  };
}

/** Ties, including no hits at all, are neutral. */
export function classifySentiment(commentText: string): Sentiment {
  const totals = sentimentTotals(commentText);
  if (totals.positive > totals.negative) return 'positive';
  if (totals.negative > totals.positive) return 'negative';
  return 'neutral';
}
