/**
 * Report rendering for a scored video: JSON, markdown and a coloured console summary
 */

import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';
import { ScoreResultSchema } from './schema.js';
import type { ScoreResult, VideoRecord } from './schema.js';
import { formatDuration } from './video-url.js';

const TOP_MOMENTS = 3;
const COMMENT_PREVIEW_CHARS = 100;

const VERDICT_TEXT: Record<ScoreResult['verdict'], string> = {
  excellent: 'Excellent - outstanding example',
  good: 'Good - strong category match',
  moderate: 'Moderate - some elements present',
  poor: 'Poor - does not fit category',
};

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/** Markdown table cells cannot hold pipes or newlines. */
function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\s*\n\s*/g, ' ');
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

export function serializeResult(result: ScoreResult): string {
  return JSON.stringify(ScoreResultSchema.parse(result), null, 2);
}

export function renderMarkdownReport(video: VideoRecord, result: ScoreResult): string {
  const lines: string[] = [
    `# ${video.title}`,
    '',
    `- Channel: ${video.channelTitle}`,
    `- Duration: ${formatDuration(video.durationSeconds)}`,
    `- Views: ${video.viewCount.toLocaleString('en-US')} | Likes: ${video.likeCount.toLocaleString('en-US')} | Comments: ${video.commentCount.toLocaleString('en-US')}`,
    '',
    `## Score: ${result.finalScore.toFixed(1)}/10 (${result.category})`,
    '',
    `- Verdict: ${VERDICT_TEXT[result.verdict]}`,
    `- Confidence: ${percent(result.confidence)}`,
    `- Authenticity: ${result.authenticityLabel}`,
    '',
    '## Components',
    '',
    '| Component | Score /10 |',
    '| --- | --- |',
    ...Object.entries(result.componentScores).map(([name, value]) => `| ${name} | ${(value * 10).toFixed(1)} |`),
  ];

  if (result.moments.length > 0) {
    lines.push('', '## Key Moments', '');
    for (const moment of result.moments.slice(0, TOP_MOMENTS)) {
      lines.push(`- **${moment.timestampText}** - ${cell(truncate(moment.sourceComment, COMMENT_PREVIEW_CHARS))}`);
    }
  }

  if (result.keyIndicators.length > 0) {
    lines.push('', '## Indicators', '');
    lines.push(...result.keyIndicators.map(i => `- ${i}`));
  }

  return lines.join('\n') + '\n';
}

// ============================================================================
// Console Summary
// ============================================================================

export function scoreColor(score: number): ChalkInstance {
  if (score >= 8) return chalk.green;
  if (score >= 6) return chalk.yellow;
  if (score >= 4) return chalk.hex('#FFA500');
  return chalk.red;
}

export function renderConsoleSummary(video: VideoRecord, result: ScoreResult): string {
  const color = scoreColor(result.finalScore);
  const lines = [
    chalk.bold(video.title),
    chalk.gray(`${video.channelTitle} · ${formatDuration(video.durationSeconds)}`),
    '',
    `${chalk.white('Score:')}        ${color.bold(result.finalScore.toFixed(1))}${chalk.gray('/10')}  ${chalk.gray(VERDICT_TEXT[result.verdict])}`,
    `${chalk.white('Confidence:')}   ${percent(result.confidence)}`,
    `${chalk.white('Authenticity:')} ${result.authenticityLabel}`,
    '',
    ...Object.entries(result.componentScores).map(([name, value]) => {
      const outOfTen = value * 10;
      return `  ${name.padEnd(24)} ${scoreColor(outOfTen)(outOfTen.toFixed(1))}`;
    }),
  ];

  for (const moment of result.moments.slice(0, TOP_MOMENTS)) {
    lines.push(`  ${chalk.cyan(moment.timestampText)} ${truncate(moment.sourceComment, COMMENT_PREVIEW_CHARS)}`);
  }

  return lines.join('\n');
}
