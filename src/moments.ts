/**
 * Timestamped moment extraction from viewer comments
 */

import { classifySentiment } from './sentiment.js';
import { containsAny, countHits, matchedKeywords } from './keywords.js';
import { extractTimestamps } from './timestamps.js';
import type { AuthenticitySignal, CategoryProfile, Moment } from './schema.js';
import { MAX_EMOTION_WORDS, RELEVANCE_WEIGHTS } from './types.js';

const EMOTION_TIERS = ['strong', 'moderate', 'mild'] as const;

export interface CommentRelevance {
  score: number;
  matchedContentTypes: string[];
  matchedEmotionWords: string[];
}

/**
 * Weighted keyword relevance of one comment for a category.
 */
export function scoreCommentRelevance(comment: string, profile: CategoryProfile): CommentRelevance {
  const text = comment.toLowerCase();
  let score = 0;

  const matchedContentTypes: string[] = [];
  for (const [typeName, keywords] of Object.entries(profile.contentTypes)) {
    const hits = countHits(text, keywords);
    if (hits > 0) {
      matchedContentTypes.push(typeName);
      score += RELEVANCE_WEIGHTS.contentType * hits;
    }
  }

  const emotionWords: string[] = [];
  for (const tier of EMOTION_TIERS) {
    const matched = matchedKeywords(text, profile.viewerEmotionTiers[tier]);
    score += RELEVANCE_WEIGHTS.tiers[tier] * matched.length;
    emotionWords.push(...matched);
  }

  score += RELEVANCE_WEIGHTS.contextPhrase * countHits(text, profile.contextPhrases);

  return {
    score,
    matchedContentTypes,
    matchedEmotionWords: emotionWords.slice(0, MAX_EMOTION_WORDS),
  };
}

/** Genuine phrases win over staged ones when both appear. */
export function authenticitySignalOf(comment: string, profile: CategoryProfile): AuthenticitySignal {
  const text = comment.toLowerCase();
  if (containsAny(text, profile.authenticitySignals.genuine)) return 'genuine';
  if (containsAny(text, profile.authenticitySignals.staged)) return 'questionable';
  return 'unknown';
}

/**
 * Moments for every timestamp in every relevant comment, most relevant first.
 * Equal relevance keeps comment order (Array.prototype.sort is stable).
 */
export function extractMoments(comments: readonly string[], profile: CategoryProfile): Moment[] {
  const moments: Moment[] = [];

  for (const comment of comments) {
    const timestamps = extractTimestamps(comment);
    if (timestamps.length === 0) continue;

    const relevance = scoreCommentRelevance(comment, profile);
    if (relevance.score <= 0) continue;

    const sentiment = classifySentiment(comment);
    const authenticitySignal = authenticitySignalOf(comment, profile);

    for (const ts of timestamps) {
      moments.push({
        timestampText: ts.text,
        offsetSeconds: ts.seconds,
        sourceComment: comment,
        relevanceScore: relevance.score,
        sentiment,
        categoryIndicators: {
          matchedContentTypes: [...relevance.matchedContentTypes],
          matchedEmotionWords: [...relevance.matchedEmotionWords],
          authenticitySignal,
        },
      });
    }
  }

  return moments.sort((a, b) => b.relevanceScore - a.relevanceScore);
}

export function countStrongMoments(moments: readonly Moment[], threshold: number): number {
  return moments.filter(m => m.relevanceScore >= threshold).length;
}
