import { beforeAll, describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { renderConsoleSummary, renderMarkdownReport, serializeResult } from '../src/report.js';
import { scoreVideo } from '../src/scorer.js';
import { createHeartwarmingVideo, makeVideo } from './fixtures.js';

const video = createHeartwarmingVideo();
const result = scoreVideo(video, 'heartwarming');

describe('renderMarkdownReport', () => {
  const lines = renderMarkdownReport(video, result).split('\n');

  it('writes the header and statistics', () => {
    expect(lines[0]).toBe('# Soldier surprise reunion with family');
    expect(lines).toContain('- Channel: Homecoming Stories');
    expect(lines).toContain('- Duration: 2:05');
    expect(lines).toContain('- Views: 100,000 | Likes: 5,000 | Comments: 1,200');
  });

  it('writes the score summary', () => {
    expect(lines).toContain('## Score: 7.7/10 (heartwarming)');
    expect(lines).toContain('- Verdict: Good - strong category match');
    expect(lines).toContain('- Confidence: 55%');
    expect(lines).toContain('- Authenticity: questionable');
  });

  it('tabulates components out of ten', () => {
    expect(lines).toContain('| engagement | 8.0 |');
    expect(lines).toContain('| visualWarmth | 5.0 |');
    expect(lines).toContain('| contentMatch | 6.0 |');
  });

  it('lists moments and indicators', () => {
    expect(lines).toContain('- **0:45** - The reunion at 0:45 had me sobbing, so genuine');
    expect(lines).toContain('- Content types: reunions, surprises, family');
  });

  it('ends with a newline', () => {
    expect(lines[lines.length - 1]).toBe('');
  });

  it('truncates long comments and escapes pipes', () => {
    const long = makeVideo({ comments: [`at 0:10 reunion sobbing | ${'x'.repeat(120)}`] });
    const report = renderMarkdownReport(long, scoreVideo(long, 'heartwarming'));
    expect(report.split('\n')).toContain(`- **0:10** - at 0:10 reunion sobbing \\| ${'x'.repeat(74)}...`);
  });

  it('omits empty sections', () => {
    const plain = makeVideo({ title: 'Nothing here' });
    const report = renderMarkdownReport(plain, scoreVideo(plain, 'heartwarming'));
    expect(report).not.toContain('## Key Moments');
    expect(report).not.toContain('## Indicators');
  });
});

describe('serializeResult', () => {
  it('round-trips through JSON', () => {
    expect(JSON.parse(serializeResult(result))).toEqual(result);
  });
});

describe('renderConsoleSummary', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('prints the score line without colour codes at level 0', () => {
    const lines = renderConsoleSummary(video, result).split('\n');
    expect(lines[0]).toBe('Soldier surprise reunion with family');
    expect(lines[1]).toBe('Homecoming Stories · 2:05');
    expect(lines[3]).toBe('Score:        7.7/10  Good - strong category match');
    expect(lines).toContain('  0:45 The reunion at 0:45 had me sobbing, so genuine');
  });
});
