import { describe, it, expect } from 'vitest';
import { authenticitySignalOf, extractMoments, scoreCommentRelevance } from '../src/moments.js';
import { profile } from '../src/profiles.js';

const heartwarming = profile('heartwarming');

describe('scoreCommentRelevance', () => {
  it('weights content types, emotion tiers and context phrases', () => {
    // reunion (2.0) + sobbing (3.0) + tears (2.0) + this part (1.5)
    const relevance = scoreCommentRelevance('This part of the reunion, sobbing and in tears', heartwarming);
    expect(relevance.score).toBe(8.5);
    expect(relevance.matchedContentTypes).toEqual(['reunions']);
    expect(relevance.matchedEmotionWords).toEqual(['sobbing', 'tears']);
  });

  it('keeps at most three emotion words, strongest tier first', () => {
    const relevance = scoreCommentRelevance('beautiful, sobbing, tears, cry', heartwarming);
    expect(relevance.matchedEmotionWords).toEqual(['sobbing', 'cry', 'tears']);
  });
});

describe('authenticitySignalOf', () => {
  it('checks genuine phrases before staged ones', () => {
    expect(authenticitySignalOf('so genuine, not fake', heartwarming)).toBe('genuine');
    expect(authenticitySignalOf('fake reunion', heartwarming)).toBe('questionable');
    expect(authenticitySignalOf('nice', heartwarming)).toBe('unknown');
  });
});

describe('extractMoments', () => {
  it('finds the reunion moment in a timestamped comment', () => {
    const [moment] = extractMoments(['the reunion at 2:15 made me cry, so touching'], heartwarming);

    expect(moment.timestampText).toBe('2:15');
    expect(moment.offsetSeconds).toBe(135);
    expect(moment.categoryIndicators.matchedContentTypes).toContain('reunions');
    expect(moment.relevanceScore).toBe(6);
    expect(moment.categoryIndicators.matchedEmotionWords).toEqual(['cry', 'touching']);
    expect(moment.categoryIndicators.authenticitySignal).toBe('unknown');
    expect(moment.sentiment).toBe('neutral');
  });

  it('emits one moment per timestamp with shared relevance, in comment order on ties', () => {
    const first = 'first watch: reunion at 2:15 and 2:45, touching';
    const second = 'second time: reunion at 2:15 and 2:45, touching';
    const moments = extractMoments([first, second], heartwarming);

    expect(moments.map(m => m.relevanceScore)).toEqual([4, 4, 4, 4]);
    expect(moments.map(m => m.sourceComment)).toEqual([first, first, second, second]);
    expect(moments.map(m => m.timestampText)).toEqual(['2:15', '2:45', '2:15', '2:45']);
  });

  it('sorts by relevance, descending', () => {
    const moments = extractMoments(
      ['at 0:10 nice', 'at 1:00 reunion', 'at 2:00 reunion sobbing'],
      heartwarming
    );
    expect(moments.map(m => m.timestampText)).toEqual(['2:00', '1:00']);
    expect(moments.map(m => m.relevanceScore)).toEqual([5, 2]);
  });

  it('ignores comments without a valid timestamp', () => {
    expect(extractMoments(['reunion so touching', '1:2 reunion'], heartwarming)).toEqual([]);
  });

  it('counts context phrases on their own', () => {
    const [moment] = extractMoments(['this part at 3:00'], heartwarming);
    expect(moment.relevanceScore).toBe(1.5);
    expect(moment.categoryIndicators.matchedContentTypes).toEqual([]);
  });

  it('returns nothing for no comments', () => {
    expect(extractMoments([], heartwarming)).toEqual([]);
  });
});
