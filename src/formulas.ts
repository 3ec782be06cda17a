/**
 * Deterministic component assessors
 * All functions return values in range [0, 1]
 */

import { countHits, flattenKeywordSets, matchedKeywords } from './keywords.js';
import { joinFields } from './corpus.js';
import { countStrongMoments } from './moments.js';
import type { AssessmentContext, AssessorDefinition } from './types.js';
import { STRONG_MOMENT_THRESHOLD } from './types.js';

// ============================================================================
// Utility Functions
// ============================================================================

export function clamp01(val: number): number {
  if (Number.isNaN(val)) return 0;
  return Math.max(0, Math.min(1, val));
}

/**
 * Additive bonus for the first threshold `count` exceeds.
 * Buckets are [threshold, bonus] pairs, highest threshold first.
 */
function bucket(count: number, buckets: ReadonlyArray<readonly [number, number]>): number {
  for (const [threshold, bonus] of buckets) {
    if (count > threshold) return bonus;
  }
  return 0;
}

function emotionKeywords(ctx: AssessmentContext): string[] {
  const tiers = ctx.profile.viewerEmotionTiers;
  return [...tiers.strong, ...tiers.moderate, ...tiers.mild];
}

// ============================================================================
// 1. Authenticity (0-1)
// ============================================================================

export function scoreAuthenticity(ctx: AssessmentContext): number {
  const { corpus, profile } = ctx;
  const genuine = countHits(corpus.comments, profile.authenticitySignals.genuine);
  const staged = countHits(joinFields(corpus, ['title', 'comments']), profile.authenticitySignals.staged);

  let score = 0.5;
  score += Math.min(0.15 * genuine, 0.4);
  score -= Math.min(0.2 * staged, profile.stagedPenaltyCap);

  return clamp01(score);
}

// ============================================================================
// 2. Achievement Authenticity (0-1)
// ============================================================================

export function scoreAchievementAuthenticity(ctx: AssessmentContext): number {
  const { corpus, profile } = ctx;
  const evidence = joinFields(corpus, ['comments', 'description', 'transcript']);
  const claims = joinFields(corpus, ['title', 'description', 'comments']);

  const genuine = countHits(evidence, profile.authenticitySignals.genuine);
  const staged = countHits(claims, profile.authenticitySignals.staged);

  let score = 0.5;
  score += Math.min(0.15 * genuine, 0.4);
  score -= Math.min(0.2 * staged, profile.stagedPenaltyCap);

  // A stated timeline ("3 years", "day one") backs the effort story
  const timeline = profile.narrativeSignals?.timeline ?? [];
  if (countHits(joinFields(corpus, ['title', 'description', 'transcript']), timeline) > 0) {
    score += 0.1;
  }

  return clamp01(score);
}

// ============================================================================
// 3. Content Match (0-1)
// ============================================================================

export function scoreContentMatch(ctx: AssessmentContext): number {
  const text = joinFields(ctx.corpus, ['title', 'description', 'tags', 'comments']);
  const hits = countHits(text, flattenKeywordSets(ctx.profile.contentTypes));

  return clamp01(0.2 + bucket(hits, [[5, 0.6], [2, 0.4], [0, 0.2]]));
}

// ============================================================================
// 4. Emotional Impact (0-1)
// ============================================================================

export function scoreEmotionalImpact(ctx: AssessmentContext): number {
  const { sentiments, corpus } = ctx;

  // No comments: the ratio term contributes nothing
  const positive = sentiments.filter(s => s === 'positive').length;
  const positiveRatio = sentiments.length > 0 ? positive / sentiments.length : 0;

  const emotionHits = countHits(corpus.comments, emotionKeywords(ctx));

  let score = 0.3;
  score += positiveRatio * 0.4;
  score += bucket(emotionHits, [[5, 0.3], [2, 0.2]]);

  return clamp01(score);
}

// ============================================================================
// 5. Viewer Response (0-1)
// ============================================================================

export function scoreViewerResponse(ctx: AssessmentContext): number {
  const strong = countStrongMoments(ctx.moments, STRONG_MOMENT_THRESHOLD);
  const commentCount = ctx.video.commentCount;

  let score = 0.3;
  if (strong >= 3) {
    score += 0.5;
  } else if (strong >= 1) {
    score += 0.3;
  }

  if (commentCount >= 1000) {
    score += 0.1;
  } else if (commentCount >= 100) {
    score += 0.05;
  }

  return clamp01(score);
}

// ============================================================================
// 6. Engagement (0-1)
// ============================================================================

export const ENGAGEMENT_FALLBACK = 0.3;

export function scoreEngagement(ctx: AssessmentContext): number {
  const { viewCount, likeCount, commentCount } = ctx.video;

  if (viewCount <= 0) {
    return ENGAGEMENT_FALLBACK;
  }

  const likeRatio = likeCount / viewCount;
  const commentRatio = commentCount / viewCount;

  if (likeRatio > 0.03 || commentRatio > 0.005) {
    return 0.8;
  }
  if (likeRatio > 0.015 || commentRatio > 0.002) {
    return 0.6;
  }
  return 0.4;
}

// ============================================================================
// 7. Visual Warmth (0-1) - thumbnail tone
// ============================================================================

export const VISUAL_WARMTH_FALLBACK = 0.5;

export function scoreVisualWarmth(ctx: AssessmentContext): number {
  const thumb = ctx.video.thumbnail;
  if (thumb === undefined || thumb.available === false) {
    return VISUAL_WARMTH_FALLBACK;
  }

  const { warmTones, coldTones } = thumb.colorProfile;
  let score = 0.3;

  if (warmTones > coldTones) {
    score += 0.2;
  }
  if (warmTones >= 0.5) {
    score += 0.1;
  }
  if (thumb.brightness >= 0.4 && thumb.brightness <= 0.85) {
    score += 0.2;
  }
  if (thumb.contrast > 0.8) {
    score -= 0.1; // harsh, thumbnail-bait look
  }

  return clamp01(score);
}

// ============================================================================
// 8. Speech Patterns (0-1) - transcript phrases
// ============================================================================

export const SPEECH_PATTERNS_FALLBACK = 0.4;

export function scoreSpeechPatterns(ctx: AssessmentContext): number {
  const transcript = ctx.corpus.transcript;
  if (transcript.length === 0) {
    return SPEECH_PATTERNS_FALLBACK;
  }

  const hits = countHits(transcript, flattenKeywordSets(ctx.profile.speechPatterns));
  return clamp01(0.3 + bucket(hits, [[4, 0.5], [2, 0.35], [0, 0.2]]));
}

// ============================================================================
// 9. Narrative Arc (0-1) - struggle followed by achievement
// ============================================================================

function firstSegmentIndex(segments: ReadonlyArray<{ text: string }>, keywords: readonly string[]): number {
  return segments.findIndex(seg => matchedKeywords(seg.text.toLowerCase(), keywords).length > 0);
}

export function scoreNarrativeArc(ctx: AssessmentContext): number {
  const signals = ctx.profile.narrativeSignals;
  if (!signals) return 0;

  const text = joinFields(ctx.corpus, ['title', 'description', 'transcript', 'comments']);
  const hasStruggle = countHits(text, signals.struggle) > 0;
  const hasAchievement = countHits(text, signals.achievement) > 0;

  let score = 0.3;
  if (hasStruggle) score += 0.2;
  if (hasAchievement) score += 0.2;
  if (hasStruggle && hasAchievement) score += 0.15;

  const transcript = ctx.video.transcript;
  if (transcript?.available && transcript.segments.length > 0) {
    const struggleAt = firstSegmentIndex(transcript.segments, signals.struggle);
    const achievementAt = firstSegmentIndex(transcript.segments, signals.achievement);
    if (struggleAt >= 0 && achievementAt > struggleAt) {
      score += 0.1;
    }
  }

  return clamp01(score);
}

// ============================================================================
// 10. Responsible Handling (0-1)
// ============================================================================

/**
 * Only the description's responsible framing can lift the score past the
 * traumatic gate; supportive mentions anywhere add at most 0.05.
 */
export function scoreResponsibleHandling(ctx: AssessmentContext): number {
  const signals = ctx.profile.handlingSignals;
  if (!signals) return 0;

  const { corpus } = ctx;
  const responsible = countHits(corpus.description, signals.responsible);
  const supportive = countHits(joinFields(corpus, ['description', 'transcript']), signals.supportive);
  const exploitative = countHits(joinFields(corpus, ['title', 'description']), signals.exploitative);

  let score = 0.4;
  score += Math.min(0.2 * responsible, 0.5);
  score += Math.min(0.025 * supportive, 0.05);
  score -= Math.min(0.2 * exploitative, 0.4);

  return clamp01(score);
}

// ============================================================================
// 11. Source Credibility (0-1) - channel standing
// ============================================================================

export const SOURCE_CREDIBILITY_FALLBACK = 0.4;

export function scoreSourceCredibility(ctx: AssessmentContext): number {
  const channel = ctx.video.channelInfo;
  if (!channel) {
    return SOURCE_CREDIBILITY_FALLBACK;
  }

  let score = 0.3;
  if (channel.subscriberCount >= 1_000_000) {
    score += 0.4;
  } else if (channel.subscriberCount >= 100_000) {
    score += 0.3;
  } else if (channel.subscriberCount >= 10_000) {
    score += 0.15;
  }

  if (channel.videoCount >= 100) {
    score += 0.1;
  }

  if (countHits(ctx.corpus.channelDesc, ctx.profile.authenticitySignals.genuine) > 0) {
    score += 0.15;
  }

  return clamp01(score);
}

// ============================================================================
// Assessor Table
// ============================================================================

export const ASSESSORS: Readonly<Record<string, AssessorDefinition>> = Object.freeze({
  authenticity: { assess: scoreAuthenticity, requires: [] },
  achievementAuthenticity: { assess: scoreAchievementAuthenticity, requires: ['narrativeSignals'] },
  contentMatch: { assess: scoreContentMatch, requires: [] },
  emotionalImpact: { assess: scoreEmotionalImpact, requires: [] },
  viewerResponse: { assess: scoreViewerResponse, requires: [] },
  engagement: { assess: scoreEngagement, requires: [] },
  visualWarmth: { assess: scoreVisualWarmth, requires: [] },
  speechPatterns: { assess: scoreSpeechPatterns, requires: [] },
  narrativeArc: { assess: scoreNarrativeArc, requires: ['narrativeSignals'] },
  responsibleHandling: { assess: scoreResponsibleHandling, requires: ['handlingSignals'] },
  sourceCredibility: { assess: scoreSourceCredibility, requires: [] },
});

export function lookupAssessor(name: string): AssessorDefinition | undefined {
  return Object.hasOwn(ASSESSORS, name) ? ASSESSORS[name] : undefined;
}

/**
 * Run every weighted component of the profile.
 */
export function assessComponents(ctx: AssessmentContext): Record<string, number> {
  const scores: Record<string, number> = {};
  for (const name of Object.keys(ctx.profile.componentWeights)) {
    const assessor = lookupAssessor(name);
    // Registry load guarantees every weighted name resolves
    scores[name] = assessor ? clamp01(assessor.assess(ctx)) : 0;
  }
  return scores;
}
