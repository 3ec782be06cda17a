/**
 * CLI driver for the scorer
 * Reads a video record as JSON (or fetches one with --video) and writes the
 * result. Modules that read the environment or the profile data are loaded
 * inside the run, so a bad configuration is reported like any other error.
 */

import { parseArgs } from 'node:util';
import { extractVideoId } from './video-url.js';
import { renderConsoleSummary, renderMarkdownReport, serializeResult } from './report.js';
import { VideoRecordSchema } from './schema.js';
import type { VideoRecord } from './schema.js';
import { ValidationError, toScoringError } from './errors.js';

const FORMATS = ['json', 'markdown', 'pretty'] as const;
type OutputFormat = (typeof FORMATS)[number];

export interface CliIO {
  readInput(): Promise<string>;
  write(text: string): void;
  writeError(text: string): void;
}

function isFormat(value: string): value is OutputFormat {
  return FORMATS.some(format => format === value);
}

function parseInput(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError('Input is not valid JSON');
  }
}

async function loadVideo(videoArg: string | undefined, io: CliIO): Promise<VideoRecord> {
  if (videoArg) {
    const videoId = extractVideoId(videoArg);
    if (!videoId) {
      throw new ValidationError(`Not a YouTube video URL or id: ${videoArg}`);
    }
    const { YouTubeDataProvider } = await import('./youtube.js');
    return new YouTubeDataProvider().fetchVideo(videoId);
  }

  const parsed = VideoRecordSchema.safeParse(parseInput(await io.readInput()));
  if (!parsed.success) {
    throw new ValidationError('Video record failed validation', parsed.error.flatten().fieldErrors);
  }
  return parsed.data;
}

async function run(argv: string[], io: CliIO): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      category: { type: 'string', short: 'c', default: 'heartwarming' },
      format: { type: 'string', short: 'f', default: 'json' },
      video: { type: 'string', short: 'v' },
    },
  });

  const format = values.format ?? 'json';
  if (!isFormat(format)) {
    throw new ValidationError(`Unknown format '${format}'. Expected one of: ${FORMATS.join(', ')}`);
  }

  const { scoreVideo } = await import('./scorer.js');
  const video = await loadVideo(values.video, io);
  const result = scoreVideo(video, values.category ?? 'heartwarming');

  switch (format) {
    case 'json':
      io.write(serializeResult(result) + '\n');
      break;
    case 'markdown':
      io.write(renderMarkdownReport(video, result));
      break;
    case 'pretty':
      io.write(renderConsoleSummary(video, result) + '\n');
      break;
  }
}

/**
 * Returns the process exit code. Every failure is written to the error
 * stream as `{ error, code, type }`.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  try {
    await run(argv, io);
    return 0;
  } catch (error) {
    const scoringError = toScoringError(error);
    const errorOutput = {
      error: scoringError.message,
      code: scoringError.code,
      type: error instanceof Error ? error.constructor.name : 'UnknownError',
    };
    io.writeError(JSON.stringify(errorOutput, null, 2) + '\n');
    return 1;
  }
}
