import { describe, it, expect } from 'vitest';
import { buildCorpus, joinFields } from '../src/corpus.js';
import { makeVideo } from './fixtures.js';

describe('buildCorpus', () => {
  it('lowercases every field and joins lists with newlines', () => {
    const corpus = buildCorpus(
      makeVideo({ title: 'Big DAY', tags: ['One', 'Two'], comments: ['Hello', 'WORLD'] })
    );
    expect(corpus.title).toBe('big day');
    expect(corpus.tags).toBe('one\ntwo');
    expect(corpus.comments).toBe('hello\nworld');
  });

  it('maps missing optional inputs to empty strings', () => {
    const corpus = buildCorpus(makeVideo());
    expect(corpus.transcript).toBe('');
    expect(corpus.channelDesc).toBe('');
  });

  it('ignores an unavailable transcript', () => {
    const corpus = buildCorpus(
      makeVideo({ transcript: { available: false, text: 'Hidden', segments: [] } })
    );
    expect(corpus.transcript).toBe('');
  });

  it('falls back to segment text when the transcript text is empty', () => {
    const corpus = buildCorpus(
      makeVideo({
        transcript: {
          available: true,
          text: '',
          segments: [
            { startSeconds: 0, durationSeconds: 2, text: 'Hi' },
            { startSeconds: 2, durationSeconds: 2, text: 'There' },
          ],
        },
      })
    );
    expect(corpus.transcript).toBe('hi\nthere');
  });

  it('never lets a keyword straddle two comments', () => {
    const corpus = buildCorpus(makeVideo({ comments: ['so c', 'ry'] }));
    expect(corpus.comments.includes('cry')).toBe(false);
  });
});

describe('joinFields', () => {
  it('skips empty fields', () => {
    const corpus = buildCorpus(makeVideo({ title: 'Title', description: '', comments: ['c'] }));
    expect(joinFields(corpus, ['title', 'description', 'comments'])).toBe('title\nc');
  });
});
