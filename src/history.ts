/**
 * In-memory log of saved analyses, oldest first
 */

import type { CategoryId, ScoreResult, VideoRecord } from './schema.js';
import { CONFIG } from './config.js';

export interface HistoryEntry {
  savedAt: string;
  videoId: string | undefined;
  title: string;
  category: CategoryId;
  finalScore: number;
  authenticityLabel: string;
}

export interface HistoryOptions {
  limit?: number;
  now?: () => Date;
}

export class AnalysisHistory {
  private readonly entries: HistoryEntry[] = [];
  private readonly limit: number;
  private readonly now: () => Date;

  constructor(options: HistoryOptions = {}) {
    this.limit = options.limit ?? CONFIG.history.limit;
    this.now = options.now ?? (() => new Date());
  }

  /** Oldest entries drop off once the limit is reached. */
  append(video: VideoRecord, result: ScoreResult): HistoryEntry {
    const entry: HistoryEntry = Object.freeze({
      savedAt: this.now().toISOString(),
      videoId: video.videoId,
      title: video.title,
      category: result.category,
      finalScore: result.finalScore,
      authenticityLabel: result.authenticityLabel,
    });

    this.entries.push(entry);
    if (this.entries.length > this.limit) {
      this.entries.splice(0, this.entries.length - this.limit);
    }
    return entry;
  }

  /** Newest first. */
  recent(count = 5): HistoryEntry[] {
    if (count <= 0) return [];
    return this.entries.slice(-count).reverse();
  }

  all(): readonly HistoryEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }

  get size(): number {
    return this.entries.length;
  }
}
