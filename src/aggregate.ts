/**
 * Score aggregation, confidence and authenticity labelling.
 *
 * One data-driven path for every category: weighted sum, gating penalty,
 * moment bonus, clamp. Nothing here branches on the category id.
 */

import { clamp01 } from './formulas.js';
import { countStrongMoments } from './moments.js';
import type { CategoryProfile, Moment, VideoRecord, Verdict } from './schema.js';
import type { ScoreBreakdown } from './types.js';
import { STRONG_MOMENT_THRESHOLD, VERDICT_THRESHOLDS } from './types.js';

function clamp(val: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, val));
}

// ============================================================================
// Score Aggregator
// ============================================================================

export function weightedSum(components: Readonly<Record<string, number>>, profile: CategoryProfile): number {
  let sum = 0;
  for (const [name, weight] of Object.entries(profile.componentWeights)) {
    sum += weight * clamp01(components[name] ?? 0);
  }
  return sum;
}

export function aggregateScore(
  components: Readonly<Record<string, number>>,
  profile: CategoryProfile,
  moments: readonly Moment[]
): ScoreBreakdown {
  const weighted = profile.baseScore + profile.scaleFactor * weightedSum(components, profile);

  const { gating, momentBonus } = profile;
  const gatingValue = clamp01(components[gating.component] ?? 0);
  const penaltyApplied = gatingValue < gating.threshold;
  const penalized = penaltyApplied ? weighted * gating.penalty : weighted;

  const bonusApplied = countStrongMoments(moments, STRONG_MOMENT_THRESHOLD) >= momentBonus.minMoments;
  const boosted = bonusApplied ? penalized + momentBonus.bonus : penalized;

  return {
    weighted,
    penaltyApplied,
    penalized,
    bonusApplied,
    final: clamp(boosted, 0, 10),
  };
}

// ============================================================================
// Confidence Estimator
// ============================================================================

/**
 * How much evidence backed the score; independent of the score itself.
 * Each increment only ever adds, so more evidence never lowers confidence.
 */
export function estimateConfidence(
  video: VideoRecord,
  profile: CategoryProfile,
  components: Readonly<Record<string, number>>
): number {
  const c = profile.confidence;
  let confidence = c.floor;

  if (video.comments.length > c.commentThreshold) {
    confidence += c.increments.comments;
  }
  if (video.transcript?.available) {
    confidence += c.increments.transcript;
  }
  if (video.viewCount > c.minViews) {
    confidence += c.increments.views;
  }
  if ((components[profile.gating.component] ?? 0) > c.minGatingValue) {
    confidence += c.increments.gating;
  }
  if (video.channelInfo && video.channelInfo.subscriberCount > c.subscriberThreshold) {
    confidence += c.increments.channel;
  }

  return clamp01(confidence);
}

// ============================================================================
// Authenticity Classifier
// ============================================================================

export function classifyAuthenticity(gatingValue: number, profile: CategoryProfile): string {
  const labels = profile.authenticityLabels;
  if (gatingValue > 0.7) return labels.high;
  if (gatingValue > 0.4) return labels.mid;
  return labels.low;
}

// ============================================================================
// Verdict
// ============================================================================

export function verdictFor(finalScore: number): Verdict {
  if (finalScore >= VERDICT_THRESHOLDS.excellent) return 'excellent';
  if (finalScore >= VERDICT_THRESHOLDS.good) return 'good';
  if (finalScore >= VERDICT_THRESHOLDS.moderate) return 'moderate';
  return 'poor';
}
