/**
 * Batch analysis over a video data provider
 *
 * Every item is fetched and scored on its own; a failed fetch or score is
 * recorded against that item only.
 */

import { scoreVideo } from './scorer.js';
import type { CategoryRegistry } from './profiles.js';
import type { ScoreResult, VideoRecord } from './schema.js';
import type { VideoDataProvider } from './youtube.js';
import { toScoringError } from './errors.js';
import type { ScoringError } from './errors.js';
import { logger } from './logger.js';
import { CONFIG } from './config.js';

const log = logger.child('batch');

export interface BatchItem {
  videoId: string;
  category: string;
}

export type BatchOutcome =
  | { status: 'scored'; item: BatchItem; video: VideoRecord; result: ScoreResult }
  | { status: 'failed'; item: BatchItem; error: ScoringError };

export interface BatchOptions {
  concurrency?: number;
  registry?: CategoryRegistry;
}

function splitIntoBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

async function analyzeOne(
  item: BatchItem,
  provider: VideoDataProvider,
  registry: CategoryRegistry | undefined
): Promise<BatchOutcome> {
  try {
    const video = await provider.fetchVideo(item.videoId);
    const result = scoreVideo(video, item.category, registry);
    return { status: 'scored', item, video, result };
  } catch (error) {
    const scoringError = toScoringError(error);
    log.warn('Batch item failed', { videoId: item.videoId, category: item.category, code: scoringError.code });
    return { status: 'failed', item, error: scoringError };
  }
}

/**
 * Outcomes in input order. At most `concurrency` items are in flight at once.
 */
export async function analyzeBatch(
  items: readonly BatchItem[],
  provider: VideoDataProvider,
  options: BatchOptions = {}
): Promise<BatchOutcome[]> {
  const requested = options.concurrency ?? CONFIG.batch.concurrency;
  const concurrency = Number.isFinite(requested) ? Math.max(1, Math.floor(requested)) : CONFIG.batch.concurrency;
  const outcomes: BatchOutcome[] = [];

  for (const batch of splitIntoBatches(items, concurrency)) {
    const results = await Promise.all(batch.map(item => analyzeOne(item, provider, options.registry)));
    outcomes.push(...results);
  }

  const failed = outcomes.filter(o => o.status === 'failed').length;
  log.info('Batch complete', { total: outcomes.length, failed });

  return outcomes;
}
