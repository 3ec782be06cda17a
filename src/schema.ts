/**
 * Zod schemas for video scoring input/output validation
 */

import { z } from 'zod';

// ============================================================================
// Input Schemas (from the video data provider)
// ============================================================================

export const TranscriptSegmentSchema = z.object({
  startSeconds: z.number().min(0),
  durationSeconds: z.number().min(0),
  text: z.string(),
});

export const TranscriptSchema = z.object({
  available: z.boolean(),
  text: z.string().default(''),
  segments: z.array(TranscriptSegmentSchema).default([]),
});

export const ColorProfileSchema = z.object({
  warmTones: z.number().min(0).max(1),
  coldTones: z.number().min(0).max(1),
  redDominant: z.boolean(),
});

/** Measurements are only present when the thumbnail could be analysed. */
export const ThumbnailSchema = z.discriminatedUnion('available', [
  z.object({ available: z.literal(false) }),
  z.object({
    available: z.literal(true),
    brightness: z.number().min(0).max(1),
    contrast: z.number().min(0).max(1),
    colorProfile: ColorProfileSchema,
  }),
]);

export const ChannelInfoSchema = z.object({
  subscriberCount: z.number().int().min(0),
  videoCount: z.number().int().min(0),
  description: z.string().default(''),
});

export const VideoRecordSchema = z.object({
  videoId: z.string().optional(),
  title: z.string(),
  description: z.string().default(''),
  tags: z.array(z.string()).default([]),
  viewCount: z.number().int().min(0),
  likeCount: z.number().int().min(0),
  commentCount: z.number().int().min(0),
  durationSeconds: z.number().min(0),
  publishedAt: z.string(),
  channelTitle: z.string(),
  comments: z.array(z.string()).default([]),
  transcript: TranscriptSchema.optional(),
  thumbnail: ThumbnailSchema.optional(),
  channelInfo: ChannelInfoSchema.optional(),
});

// ============================================================================
// Category Profile Schema (data/profiles.json)
// ============================================================================

// Keywords are matched by lowercase substring containment against corpora
// joined with '\n', so a keyword may never contain a newline or uppercase.
const KeywordSchema = z
  .string()
  .min(1)
  .refine((kw) => kw === kw.toLowerCase(), { message: 'keyword must be lowercase' })
  .refine((kw) => !kw.includes('\n'), { message: 'keyword must not contain a newline' });

const KeywordSetSchema = z.array(KeywordSchema).min(1);

export const CategoryIdSchema = z.enum(['heartwarming', 'motivational', 'traumatic']);

export const CategoryProfileSchema = z.object({
  id: CategoryIdSchema,
  name: z.string(),
  contentTypes: z.record(z.string(), KeywordSetSchema),
  viewerEmotionTiers: z.object({
    strong: KeywordSetSchema,
    moderate: KeywordSetSchema,
    mild: KeywordSetSchema,
  }),
  authenticitySignals: z.object({
    genuine: KeywordSetSchema,
    staged: KeywordSetSchema,
  }),
  speechPatterns: z.record(z.string(), KeywordSetSchema),
  contextPhrases: z.array(KeywordSchema),
  stagedPenaltyCap: z.number().min(0).max(1),
  handlingSignals: z
    .object({
      responsible: KeywordSetSchema,
      supportive: KeywordSetSchema,
      exploitative: KeywordSetSchema,
    })
    .optional(),
  narrativeSignals: z
    .object({
      struggle: KeywordSetSchema,
      achievement: KeywordSetSchema,
      timeline: KeywordSetSchema,
    })
    .optional(),
  componentWeights: z.record(z.string(), z.number().min(0).max(1)),
  baseScore: z.number().min(0).max(10),
  scaleFactor: z.number().min(0),
  gating: z.object({
    component: z.string(),
    threshold: z.number().min(0).max(1),
    penalty: z.number().min(0).max(1),
  }),
  momentBonus: z.object({
    minMoments: z.number().int().min(1),
    bonus: z.number().min(0),
  }),
  confidence: z.object({
    floor: z.number().min(0).max(1),
    commentThreshold: z.number().int().min(0),
    minViews: z.number().int().min(0),
    minGatingValue: z.number().min(0).max(1),
    subscriberThreshold: z.number().int().min(0),
    increments: z.object({
      comments: z.number().min(0),
      transcript: z.number().min(0),
      views: z.number().min(0),
      gating: z.number().min(0),
      channel: z.number().min(0),
    }),
  }),
  authenticityLabels: z.object({
    high: z.string(),
    mid: z.string(),
    low: z.string(),
  }),
});

// ============================================================================
// Output Schemas
// ============================================================================

export const SentimentSchema = z.enum(['positive', 'negative', 'neutral']);

export const AuthenticitySignalSchema = z.enum(['genuine', 'questionable', 'unknown']);

export const MomentSchema = z.object({
  timestampText: z.string(),
  offsetSeconds: z.number().min(0),
  sourceComment: z.string(),
  relevanceScore: z.number().min(0),
  sentiment: SentimentSchema,
  categoryIndicators: z.object({
    matchedContentTypes: z.array(z.string()),
    matchedEmotionWords: z.array(z.string()).max(3),
    authenticitySignal: AuthenticitySignalSchema,
  }),
});

export const VerdictSchema = z.enum(['excellent', 'good', 'moderate', 'poor']);

export const ScoreResultSchema = z.object({
  version: z.string(),
  category: CategoryIdSchema,
  finalScore: z.number().min(0).max(10),
  verdict: VerdictSchema,
  componentScores: z.record(z.string(), z.number().min(0).max(1)),
  confidence: z.number().min(0).max(1),
  authenticityLabel: z.string(),
  moments: z.array(MomentSchema),
  keyIndicators: z.array(z.string()).max(6),
});

// ============================================================================
// Type exports (inferred from schemas)
// ============================================================================

export type VideoRecordInput = z.input<typeof VideoRecordSchema>;
export type VideoRecord = z.infer<typeof VideoRecordSchema>;
export type TranscriptSegment = z.infer<typeof TranscriptSegmentSchema>;
export type CategoryId = z.infer<typeof CategoryIdSchema>;
export type CategoryProfile = z.infer<typeof CategoryProfileSchema>;
export type Sentiment = z.infer<typeof SentimentSchema>;
export type AuthenticitySignal = z.infer<typeof AuthenticitySignalSchema>;
export type Moment = z.infer<typeof MomentSchema>;
export type Verdict = z.infer<typeof VerdictSchema>;
export type ScoreResult = z.infer<typeof ScoreResultSchema>;
