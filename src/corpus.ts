/**
 * Lowercase search corpora built from a video record
 */

import type { VideoRecord } from './schema.js';
import type { TextCorpus } from './types.js';

/** Keywords never contain a newline, so joined entries cannot match across a boundary. */
export const CORPUS_SEPARATOR = '\n';

function transcriptText(video: VideoRecord): string {
  const transcript = video.transcript;
  if (!transcript || !transcript.available) return '';
  if (transcript.text.trim().length > 0) return transcript.text;
  return transcript.segments.map(s => s.text).join(CORPUS_SEPARATOR);
}

export function buildCorpus(video: VideoRecord): TextCorpus {
  return {
    title: video.title.toLowerCase(),
    description: video.description.toLowerCase(),
    tags: video.tags.join(CORPUS_SEPARATOR).toLowerCase(),
    comments: video.comments.join(CORPUS_SEPARATOR).toLowerCase(),
    transcript: transcriptText(video).toLowerCase(),
    channelDesc: (video.channelInfo?.description ?? '').toLowerCase(),
  };
}

/** Join several corpus fields into one searchable text. */
export function joinFields(corpus: TextCorpus, fields: ReadonlyArray<keyof TextCorpus>): string {
  return fields
    .map(f => corpus[f])
    .filter(text => text.length > 0)
    .join(CORPUS_SEPARATOR);
}
