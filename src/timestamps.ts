/**
 * Timestamp grammar for viewer comments
 *
 *   timestamp := [ "at " ] ( H ":" MM ":" SS | M ":" SS )
 *   H, M      := 1-2 digits
 *   MM, SS    := 2 digits, < 60
 *
 * Candidates are maximal runs of digits and colons starting at a digit, so
 * the longest span always wins: "1:02:15" is one timestamp, never "1:02" plus
 * "02:15". A candidate that does not fit the grammar is reported as malformed
 * and skipped by callers. The optional "at " prefix is not part of the text.
 */

export interface ParsedTimestamp {
  kind: 'timestamp';
  text: string;
  seconds: number;
  index: number;
}

export interface MalformedTimestamp {
  kind: 'malformed';
  text: string;
  index: number;
  reason: string;
}

export type TimestampCandidate = ParsedTimestamp | MalformedTimestamp;

const DIGITS = /^\d+$/;

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isTwoDigitBase60(part: string): boolean {
  return part.length === 2 && DIGITS.test(part) && Number(part) < 60;
}

function isLeadingUnit(part: string): boolean {
  return part.length >= 1 && part.length <= 2 && DIGITS.test(part);
}

/**
 * Parse one candidate span against the grammar.
 */
export function parseTimestamp(text: string, index = 0): TimestampCandidate {
  const parts = text.split(':');
  const malformed = (reason: string): MalformedTimestamp => ({ kind: 'malformed', text, index, reason });

  if (parts.length === 2) {
    const [m, ss] = parts;
    if (!isLeadingUnit(m)) return malformed('minutes must be 1-2 digits');
    if (!isTwoDigitBase60(ss)) return malformed('seconds must be two digits below 60');
    return { kind: 'timestamp', text, index, seconds: Number(m) * 60 + Number(ss) };
  }

  if (parts.length === 3) {
    const [h, mm, ss] = parts;
    if (!isLeadingUnit(h)) return malformed('hours must be 1-2 digits');
    if (!isTwoDigitBase60(mm)) return malformed('minutes must be two digits below 60');
    if (!isTwoDigitBase60(ss)) return malformed('seconds must be two digits below 60');
    return { kind: 'timestamp', text, index, seconds: Number(h) * 3600 + Number(mm) * 60 + Number(ss) };
  }

  return malformed(`expected 2 or 3 fields, found ${parts.length}`);
}

/**
 * Every timestamp-like span in a comment, valid or not, in text order.
 */
export function scanTimestamps(comment: string): TimestampCandidate[] {
  const found: TimestampCandidate[] = [];
  let i = 0;

  while (i < comment.length) {
    if (!isDigit(comment[i]) || (i > 0 && isDigit(comment[i - 1]))) {
      i++;
      continue;
    }

    let end = i;
    while (end < comment.length && (isDigit(comment[end]) || comment[end] === ':')) {
      end++;
    }

    // "at 2:15: look" ends the span at the last digit
    let spanEnd = end;
    while (spanEnd > i && comment[spanEnd - 1] === ':') {
      spanEnd--;
    }

    const span = comment.slice(i, spanEnd);
    if (span.includes(':')) {
      found.push(parseTimestamp(span, i));
    }
    i = end;
  }

  return found;
}

/**
 * Valid timestamps only; identical text within one comment is reported once.
 */
export function extractTimestamps(comment: string): ParsedTimestamp[] {
  const seen = new Set<string>();
  const result: ParsedTimestamp[] = [];
  for (const candidate of scanTimestamps(comment)) {
    if (candidate.kind === 'malformed' || seen.has(candidate.text)) continue;
    seen.add(candidate.text);
    result.push(candidate);
  }
  return result;
}
