import { describe, it, expect } from 'vitest';
import {
  aggregateScore,
  classifyAuthenticity,
  estimateConfidence,
  verdictFor,
  weightedSum,
} from '../src/aggregate.js';
import { profile } from '../src/profiles.js';
import type { Moment } from '../src/schema.js';
import { makeVideo } from './fixtures.js';

const heartwarming = profile('heartwarming');
const traumatic = profile('traumatic');
const motivational = profile('motivational');

function uniform(value: number, names: string[]): Record<string, number> {
  return Object.fromEntries(names.map(n => [n, value]));
}

function strongMoment(timestampText: string): Moment {
  return {
    timestampText,
    offsetSeconds: 0,
    sourceComment: `at ${timestampText}`,
    relevanceScore: 6,
    sentiment: 'positive',
    categoryIndicators: { matchedContentTypes: [], matchedEmotionWords: [], authenticitySignal: 'unknown' },
  };
}

const heartwarmingNames = Object.keys(heartwarming.componentWeights);

describe('aggregateScore', () => {
  it('maps perfect components to base + scale', () => {
    const breakdown = aggregateScore(uniform(1, heartwarmingNames), heartwarming, []);
    expect(breakdown.final).toBeCloseTo(10);
    expect(breakdown.penaltyApplied).toBe(false);
    expect(breakdown.bonusApplied).toBe(false);
  });

  it('applies the gating penalty below the threshold', () => {
    const breakdown = aggregateScore(uniform(0, heartwarmingNames), heartwarming, []);
    expect(breakdown.weighted).toBeCloseTo(3);
    expect(breakdown.penaltyApplied).toBe(true);
    expect(breakdown.final).toBeCloseTo(1.8);
  });

  it('adds the moment bonus for two strong moments', () => {
    const breakdown = aggregateScore(uniform(0.5, heartwarmingNames), heartwarming, [
      strongMoment('0:10'),
      strongMoment('0:20'),
    ]);
    expect(breakdown.weighted).toBeCloseTo(6.5);
    expect(breakdown.final).toBeCloseTo(7.5);
  });

  it('clamps to 10', () => {
    const breakdown = aggregateScore(uniform(1, heartwarmingNames), heartwarming, [
      strongMoment('0:10'),
      strongMoment('0:20'),
    ]);
    expect(breakdown.final).toBe(10);
  });

  it('clamps each component before weighting', () => {
    expect(weightedSum(uniform(3, heartwarmingNames), heartwarming)).toBeCloseTo(1);
  });

  it('multiplies traumatic scores by 0.4 when handling is irresponsible', () => {
    const components = {
      ...uniform(0.6, Object.keys(traumatic.componentWeights)),
      responsibleHandling: 0.2,
    };
    const breakdown = aggregateScore(components, traumatic, []);
    expect(breakdown.penaltyApplied).toBe(true);
    expect(breakdown.final).toBeCloseTo(breakdown.weighted * 0.4);
  });
});

describe('estimateConfidence', () => {
  const gate = { authenticity: 0.5 };

  it('starts from the category floor', () => {
    expect(estimateConfidence(makeVideo(), heartwarming, { authenticity: 0 })).toBeCloseTo(0.3);
    expect(estimateConfidence(makeVideo(), heartwarming, gate)).toBeCloseTo(0.4);
  });

  it('reaches 1 with every kind of evidence', () => {
    const video = makeVideo({
      comments: Array.from({ length: 11 }, (_, i) => `comment ${i}`),
      viewCount: 2000,
      transcript: { available: true, text: 'hello', segments: [] },
      channelInfo: { subscriberCount: 20000, videoCount: 10, description: '' },
    });
    expect(estimateConfidence(video, heartwarming, gate)).toBeCloseTo(1);
  });

  it('never decreases as evidence is added', () => {
    const steps = [
      makeVideo(),
      makeVideo({ transcript: { available: true, text: 'hello', segments: [] } }),
      makeVideo({
        transcript: { available: true, text: 'hello', segments: [] },
        comments: Array.from({ length: 40 }, () => 'ok'),
      }),
      makeVideo({
        transcript: { available: true, text: 'hello', segments: [] },
        comments: Array.from({ length: 40 }, () => 'ok'),
        viewCount: 1_000_000,
      }),
    ];
    for (const p of [heartwarming, motivational, traumatic]) {
      const values = steps.map(v => estimateConfidence(v, p, {}));
      for (let i = 1; i < values.length; i++) {
        expect(values[i]).toBeGreaterThanOrEqual(values[i - 1]);
      }
    }
  });
});

describe('classifyAuthenticity', () => {
  it('uses the category labels with shared thresholds', () => {
    expect(classifyAuthenticity(0.8, heartwarming)).toBe('authentic');
    expect(classifyAuthenticity(0.5, heartwarming)).toBe('questionable');
    expect(classifyAuthenticity(0.4, heartwarming)).toBe('likely_staged');
    expect(classifyAuthenticity(0.71, traumatic)).toBe('responsible');
    expect(classifyAuthenticity(0.2, traumatic)).toBe('exploitative');
    expect(classifyAuthenticity(0.1, motivational)).toBe('likely_fake');
  });

  it('treats 0.7 as questionable', () => {
    expect(classifyAuthenticity(0.7, heartwarming)).toBe('questionable');
  });
});

describe('verdictFor', () => {
  it('maps score bands', () => {
    expect(verdictFor(8.5)).toBe('excellent');
    expect(verdictFor(7)).toBe('good');
    expect(verdictFor(5.5)).toBe('moderate');
    expect(verdictFor(5.49)).toBe('poor');
  });
});
