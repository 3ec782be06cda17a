/**
 * TypeScript type definitions for the scoring engine
 */

// Re-export Zod-inferred types
export type {
  VideoRecord,
  VideoRecordInput,
  TranscriptSegment,
  CategoryId,
  CategoryProfile,
  Sentiment,
  AuthenticitySignal,
  Moment,
  Verdict,
  ScoreResult,
} from './schema.js';

import type { CategoryProfile, Moment, Sentiment, VideoRecord } from './schema.js';

// ============================================================================
// Corpus Types
// ============================================================================

export interface TextCorpus {
  title: string;
  description: string;
  tags: string;
  comments: string;
  transcript: string;
  channelDesc: string;
}

// ============================================================================
// Assessor Types
// ============================================================================

export interface AssessmentContext {
  video: VideoRecord;
  corpus: TextCorpus;
  profile: CategoryProfile;
  moments: readonly Moment[];
  sentiments: readonly Sentiment[];
}

export type ComponentAssessor = (ctx: AssessmentContext) => number;

/** Optional profile sections an assessor cannot work without. */
export type ProfileRequirement = 'handlingSignals' | 'narrativeSignals';

export interface AssessorDefinition {
  assess: ComponentAssessor;
  requires: readonly ProfileRequirement[];
}

// ============================================================================
// Aggregation Types
// ============================================================================

export interface ScoreBreakdown {
  weighted: number;        // baseScore + scaleFactor * weighted sum
  penaltyApplied: boolean;
  penalized: number;
  bonusApplied: boolean;
  final: number;           // clamped to [0, 10]
}

// ============================================================================
// Constants
// ============================================================================

export const RELEVANCE_WEIGHTS = {
  contentType: 2.0,
  contextPhrase: 1.5,
  tiers: {
    strong: 3.0,
    moderate: 2.0,
    mild: 1.0,
  },
} as const;

/** Moments at or above this relevance count as strong evidence. */
export const STRONG_MOMENT_THRESHOLD = 5.0;

export const MAX_KEY_INDICATORS = 6;

export const MAX_EMOTION_WORDS = 3;

export const VERDICT_THRESHOLDS = {
  excellent: 8.5,
  good: 7.0,
  moderate: 5.5,
} as const;

export const SCORER_VERSION = '2.0.0';
