/**
 * YouTube URL and ISO 8601 duration helpers
 */

const VIDEO_ID_PATTERN =
  /(?:youtube\.com\/watch\?(?:[^#\s]*&)?v=|youtu\.be\/|youtube\.com\/embed\/|youtube\.com\/shorts\/)([A-Za-z0-9_-]+)/;

const BARE_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;

const ISO_DURATION_PATTERN = /^PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?$/;

/**
 * Video id from a watch, short-link, embed or shorts URL, or a bare 11-character id.
 */
export function extractVideoId(urlOrId: string): string | null {
  const trimmed = urlOrId.trim();
  if (BARE_ID_PATTERN.test(trimmed)) {
    return trimmed;
  }
  const match = VIDEO_ID_PATTERN.exec(trimmed);
  return match ? match[1] : null;
}

/** "PT1H2M3S" -> 3723. Anything unparseable is 0. */
export function parseIsoDuration(duration: string): number {
  const match = ISO_DURATION_PATTERN.exec(duration);
  if (!match) return 0;

  const [, h, m, s] = match;
  return Number(h ?? 0) * 3600 + Number(m ?? 0) * 60 + Number(s ?? 0);
}

export function formatDuration(totalSeconds: number): string {
  const secs = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(secs / 3600);
  const minutes = Math.floor((secs % 3600) / 60);
  const seconds = secs % 60;
  const ss = String(seconds).padStart(2, '0');

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, '0')}:${ss}`;
  }
  return `${minutes}:${ss}`;
}
