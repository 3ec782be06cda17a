/**
 * Shared test fixtures
 */

import { buildCorpus } from '../src/corpus.js';
import { classifySentiment } from '../src/sentiment.js';
import { extractMoments } from '../src/moments.js';
import { profile } from '../src/profiles.js';
import type { VideoRecord } from '../src/schema.js';
import type { AssessmentContext } from '../src/types.js';

export function makeVideo(overrides: Partial<VideoRecord> = {}): VideoRecord {
  return {
    videoId: 'vid00000001',
    title: 'My video',
    description: '',
    tags: [],
    viewCount: 0,
    likeCount: 0,
    commentCount: 0,
    durationSeconds: 60,
    publishedAt: '2024-01-15T10:00:00Z',
    channelTitle: 'Test Channel',
    comments: [],
    ...overrides,
  };
}

/** Same pipeline the scorer runs ahead of the assessors. */
export function contextFor(video: VideoRecord, categoryId: string): AssessmentContext {
  const p = profile(categoryId);
  return {
    video,
    corpus: buildCorpus(video),
    profile: p,
    moments: extractMoments(video.comments, p),
    sentiments: video.comments.map(classifySentiment),
  };
}

/**
 * Heartwarming example used across scorer and report tests:
 * one strong moment (5.0), one weaker (3.5), final score 3 + 7 * 0.67667.
 */
export function createHeartwarmingVideo(): VideoRecord {
  return makeVideo({
    title: 'Soldier surprise reunion with family',
    description: 'Dad comes home after a year.',
    tags: ['reunion'],
    viewCount: 100000,
    likeCount: 5000,
    commentCount: 1200,
    durationSeconds: 125,
    channelTitle: 'Homecoming Stories',
    comments: [
      'The reunion at 0:45 had me sobbing, so genuine',
      'At 1:10 the look on her face, tears everywhere',
      'beautiful family',
    ],
  });
}
