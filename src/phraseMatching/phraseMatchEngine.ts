import type { MatchRecord, MatcherResult, Transcript } from '../../shared/conversation';
import { ValidationError } from '../../server/errors';
import type { PhraseMatcher } from './phraseCatalog';

export const DEFAULT_SNIPPET_MAX_CHARS = 200;
const ELLIPSIS = '…';

export interface MatchOptions {
  snippetMaxChars?: number;
}

/**
 * Window of at most `maxChars` characters around [start, end).
 * Short turns are returned whole.
 */
export function buildSnippet(text: string, start: number, end: number, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }

  const room = Math.max(0, maxChars - (end - start));
  const centered = start - Math.floor(room / 2);
  const from = Math.max(0, Math.min(centered, text.length - maxChars));
  const to = from + maxChars;

  return `${from > 0 ? ELLIPSIS : ''}${text.slice(from, to)}${to < text.length ? ELLIPSIS : ''}`;
}

/**
 * Lower-case one code point at a time, keeping any character whose
 * lower-case form has a different UTF-16 length (e.g. 'İ'). Offsets into
 * the folded string are offsets into the original.
 */
export function foldCase(text: string): string {
  let folded = '';
  for (const char of text) {
    const lower = char.toLowerCase();
    folded += lower.length === char.length ? lower : char;
  }
  return folded;
}

function assertWellFormed(transcript: Transcript, matchers: readonly PhraseMatcher[]): void {
  if (!transcript || !Array.isArray(transcript.turns)) {
    throw new ValidationError('Transcript turns must be an array');
  }
  transcript.turns.forEach((turn, position) => {
    if (typeof turn?.text !== 'string') {
      throw new ValidationError(`Turn ${position} has no text`);
    }
  });
  if (!Array.isArray(matchers)) {
    throw new ValidationError('Matchers must be an array');
  }
  for (const matcher of matchers) {
    if (!Array.isArray(matcher?.phrases)) {
      throw new ValidationError(`Matcher ${String(matcher?.matcherId)} has no phrase list`);
    }
  }
}

/**
 * Scan every turn against every phrase of every matcher.
 *
 * Output order is turn index, then matcher order, then phrase order.
 * Every (matcher, turn, phrase) hit produces a record; there is no
 * first-match short-circuit. Matching is lexical only: case-folded
 * substring, no stemming or negation handling.
 */
export function matchTranscript(
  transcript: Transcript,
  matchers: readonly PhraseMatcher[],
  options: MatchOptions = {},
): MatchRecord[] {
  assertWellFormed(transcript, matchers);
  const snippetMaxChars = options.snippetMaxChars ?? DEFAULT_SNIPPET_MAX_CHARS;

  const turns = [...transcript.turns].sort((a, b) => a.index - b.index);
  const records: MatchRecord[] = [];

  for (const turn of turns) {
    const haystack = foldCase(turn.text);

    for (const matcher of matchers) {
      for (const phrase of matcher.phrases) {
        const needle = foldCase(phrase.trim());
        if (!needle) continue;

        const start = haystack.indexOf(needle);
        if (start === -1) continue;

        const end = start + needle.length;
        records.push({
          matcherId: matcher.matcherId,
          displayName: matcher.displayName,
          turnIndex: turn.index,
          speakerRole: turn.speakerRole,
          matchedPhrase: phrase,
          textSnippet: buildSnippet(turn.text, start, end, snippetMaxChars),
          startOffset: start,
          endOffset: end,
        });
      }
    }
  }

  return records;
}

/**
 * One result per matcher in catalog order, including matchers with no hits.
 */
export function groupMatches(records: readonly MatchRecord[], matchers: readonly PhraseMatcher[]): MatcherResult[] {
  return matchers.map(matcher => {
    const matches = records.filter(r => r.matcherId === matcher.matcherId);
    return {
      matcherId: matcher.matcherId,
      displayName: matcher.displayName,
      matchCount: matches.length,
      matches,
    };
  });
}

export function totalMatchCount(results: readonly MatcherResult[]): number {
  return results.reduce((sum, r) => sum + r.matchCount, 0);
}
