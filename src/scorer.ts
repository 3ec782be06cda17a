/**
 * Main scoring orchestrator
 * Coordinates corpus, moments and components and produces the final result
 */

import { ScoreResultSchema, VideoRecordSchema } from './schema.js';
import type { CategoryProfile, Moment, ScoreResult, VideoRecord, VideoRecordInput } from './schema.js';
import { buildCorpus, joinFields } from './corpus.js';
import { classifySentiment } from './sentiment.js';
import { countStrongMoments, extractMoments } from './moments.js';
import { assessComponents } from './formulas.js';
import { aggregateScore, classifyAuthenticity, estimateConfidence, verdictFor } from './aggregate.js';
import { matchedKeywords } from './keywords.js';
import { registry as defaultRegistry } from './profiles.js';
import type { CategoryRegistry } from './profiles.js';
import { ValidationError } from './errors.js';
import { logger } from './logger.js';
import type { ScoreBreakdown, TextCorpus } from './types.js';
import { MAX_KEY_INDICATORS, SCORER_VERSION, STRONG_MOMENT_THRESHOLD } from './types.js';

const log = logger.child('engine');

// ============================================================================
// Key Indicators
// ============================================================================

interface IndicatorInput {
  video: VideoRecord;
  corpus: TextCorpus;
  profile: CategoryProfile;
  moments: readonly Moment[];
  breakdown: ScoreBreakdown;
  gatingValue: number;
}

function buildKeyIndicators({ video, corpus, profile, moments, breakdown, gatingValue }: IndicatorInput): string[] {
  const indicators: string[] = [];
  const searchable = joinFields(corpus, ['title', 'description', 'tags', 'comments']);

  const contentTypes = Object.entries(profile.contentTypes)
    .filter(([, keywords]) => matchedKeywords(searchable, keywords).length > 0)
    .map(([name]) => name);
  if (contentTypes.length > 0) {
    indicators.push(`Content types: ${contentTypes.join(', ')}`);
  }

  const genuine = matchedKeywords(corpus.comments, profile.authenticitySignals.genuine);
  if (genuine.length > 0) {
    indicators.push(`Genuine signals: ${genuine.slice(0, 3).join(', ')}`);
  }

  const staged = matchedKeywords(joinFields(corpus, ['title', 'comments']), profile.authenticitySignals.staged);
  if (staged.length > 0) {
    indicators.push(`Staged signals: ${staged.slice(0, 3).join(', ')}`);
  }

  const strong = countStrongMoments(moments, STRONG_MOMENT_THRESHOLD);
  if (strong > 0) {
    indicators.push(`${strong} high-relevance moment${strong === 1 ? '' : 's'}`);
  }

  if (breakdown.penaltyApplied) {
    indicators.push(
      `${profile.gating.component} ${gatingValue.toFixed(2)} below ${profile.gating.threshold}: score x${profile.gating.penalty}`
    );
  }

  if (breakdown.bonusApplied) {
    indicators.push(`Moment bonus +${profile.momentBonus.bonus}`);
  }

  const evidence: string[] = [];
  if (video.transcript?.available) evidence.push('transcript');
  if (video.thumbnail?.available) evidence.push('thumbnail');
  if (video.channelInfo) evidence.push('channel');
  if (evidence.length > 0) {
    indicators.push(`Evidence used: ${evidence.join(', ')}`);
  }

  return indicators.slice(0, MAX_KEY_INDICATORS);
}

// ============================================================================
// Main Scorer Function
// ============================================================================

export function scoreVideo(
  input: VideoRecordInput,
  categoryId: string,
  registry: CategoryRegistry = defaultRegistry
): ScoreResult {
  // Unknown categories fail before any work is done
  const profile = registry.profile(categoryId);

  const parsed = VideoRecordSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Video record failed validation', parsed.error.flatten().fieldErrors);
  }
  const video = parsed.data;

  const corpus = buildCorpus(video);
  const sentiments = video.comments.map(classifySentiment);
  const moments = extractMoments(video.comments, profile);

  const componentScores = assessComponents({ video, corpus, profile, moments, sentiments });
  const breakdown = aggregateScore(componentScores, profile, moments);
  const gatingValue = componentScores[profile.gating.component] ?? 0;

  log.debug('Scored video', {
    videoId: video.videoId,
    category: profile.id,
    weighted: breakdown.weighted,
    penaltyApplied: breakdown.penaltyApplied,
    bonusApplied: breakdown.bonusApplied,
    moments: moments.length,
  });

  const result: ScoreResult = {
    version: SCORER_VERSION,
    category: profile.id,
    finalScore: breakdown.final,
    verdict: verdictFor(breakdown.final),
    componentScores,
    confidence: estimateConfidence(video, profile, componentScores),
    authenticityLabel: classifyAuthenticity(gatingValue, profile),
    moments,
    keyIndicators: buildKeyIndicators({ video, corpus, profile, moments, breakdown, gatingValue }),
  };

  return ScoreResultSchema.parse(result);
}
