export { scoreVideo } from './scorer.js';
export { registry, profile, createRegistry, loadRegistry } from './profiles.js';
export type { CategoryRegistry } from './profiles.js';
export { buildCorpus } from './corpus.js';
export { classifySentiment } from './sentiment.js';
export { extractMoments, scoreCommentRelevance } from './moments.js';
export { parseTimestamp, scanTimestamps, extractTimestamps } from './timestamps.js';
export type { ParsedTimestamp, MalformedTimestamp, TimestampCandidate } from './timestamps.js';
export { ASSESSORS, assessComponents } from './formulas.js';
export { aggregateScore, estimateConfidence, classifyAuthenticity, verdictFor } from './aggregate.js';
export { extractVideoId, parseIsoDuration, formatDuration } from './video-url.js';
export { YouTubeDataProvider } from './youtube.js';
export type { VideoDataProvider, FetchLike, YouTubeProviderOptions } from './youtube.js';
export { analyzeBatch } from './batch.js';
export type { BatchItem, BatchOutcome, BatchOptions } from './batch.js';
export { AnalysisHistory } from './history.js';
export type { HistoryEntry } from './history.js';
export { runCli } from './run-cli.js';
export type { CliIO } from './run-cli.js';
export { renderMarkdownReport, renderConsoleSummary, serializeResult } from './report.js';
export * from './errors.js';
export * from './schema.js';
export {
  RELEVANCE_WEIGHTS,
  STRONG_MOMENT_THRESHOLD,
  MAX_KEY_INDICATORS,
  VERDICT_THRESHOLDS,
  SCORER_VERSION,
} from './types.js';
export type { TextCorpus, AssessmentContext, AssessorDefinition, ScoreBreakdown } from './types.js';
