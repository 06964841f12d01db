import { describe, it, expect } from 'vitest';
import type { SpeakerRole, Transcript } from '../../shared/conversation';
import { ValidationError } from '../../server/errors';
import { createPhraseCatalog, getDefaultPhraseCatalog } from './phraseCatalog';
import { buildSnippet, groupMatches, matchTranscript, totalMatchCount } from './phraseMatchEngine';

function makeTranscript(turns: Array<[SpeakerRole, string]>): Transcript {
  return {
    conversationId: 'conv-1',
    turns: turns.map(([speakerRole, text], index) => ({
      index,
      speakerRole,
      text,
      startOffsetSeconds: index * 5,
    })),
  };
}

const testCatalog = createPhraseCatalog({
  version: 'test-1',
  matchers: [
    { matcherId: 'threats', displayName: 'Threats', phrases: ['court', 'lawyers'] },
    { matcherId: 'apologies', displayName: 'Apologies', phrases: ["I'm sorry", 'apologise'] },
  ],
});

describe('matchTranscript', () => {
  it('emits a compliance violation record for an agent wage garnishment threat', () => {
    const fillers: Array<[SpeakerRole, string]> = Array.from({ length: 8 }, (_, i) => [
      i % 2 === 0 ? 'AGENT' : 'CUSTOMER',
      'okay',
    ]);
    const transcript = makeTranscript([...fillers, ['AGENT', 'we can garnish your wages']]);

    const records = matchTranscript(transcript, getDefaultPhraseCatalog().matchers);

    expect(records).toEqual([
      {
        matcherId: 'compliance_violations',
        displayName: 'Compliance Violations',
        turnIndex: 8,
        speakerRole: 'AGENT',
        matchedPhrase: 'garnish your wages',
        textSnippet: 'we can garnish your wages',
        startOffset: 7,
        endOffset: 25,
      },
    ]);
  });

  it('returns an empty list for a transcript with no turns', () => {
    expect(matchTranscript(makeTranscript([]), testCatalog.matchers)).toEqual([]);
  });

  it('returns an empty list for an empty matcher list', () => {
    expect(matchTranscript(makeTranscript([['AGENT', 'see you in court']]), [])).toEqual([]);
  });

  it('matches case-insensitively and keeps the catalog spelling of the phrase', () => {
    const records = matchTranscript(makeTranscript([['AGENT', 'SEE YOU IN COURT']]), testCatalog.matchers);

    expect(records).toHaveLength(1);
    expect(records[0].matchedPhrase).toBe('court');
    expect(records[0].startOffset).toBe(11);
  });

  it('keeps offsets on the original text when lower-casing would change its length', () => {
    const catalog = createPhraseCatalog({
      version: 'test-1',
      matchers: [{ matcherId: 'threats', displayName: 'Threats', phrases: ['garnish your wages', 'İstanbul'] }],
    });
    const text = 'İİİİ garnish your wages from İSTANBUL';

    const records = matchTranscript(makeTranscript([['AGENT', text]]), catalog.matchers);

    expect(records.map(r => [r.startOffset, r.endOffset, text.slice(r.startOffset, r.endOffset)])).toEqual([
      [5, 23, 'garnish your wages'],
      [29, 37, 'İSTANBUL'],
    ]);
  });

  it('reports every matcher and phrase hit in a turn without short-circuiting', () => {
    const transcript = makeTranscript([
      ['CUSTOMER', 'hello'],
      ['AGENT', "I'm sorry, but our lawyers will see you in court. I apologise."],
    ]);

    const records = matchTranscript(transcript, testCatalog.matchers);

    expect(records.map(r => [r.turnIndex, r.matcherId, r.matchedPhrase])).toEqual([
      [1, 'threats', 'court'],
      [1, 'threats', 'lawyers'],
      [1, 'apologies', "I'm sorry"],
      [1, 'apologies', 'apologise'],
    ]);
  });

  it('orders output by turn index, then matcher, then phrase', () => {
    const transcript = makeTranscript([
      ['CUSTOMER', 'I apologise for the delay'],
      ['AGENT', 'the lawyers will take this to court'],
      ['CUSTOMER', 'court? I am sorry to hear that'],
    ]);

    const records = matchTranscript(transcript, testCatalog.matchers);

    expect(records.map(r => `${r.turnIndex}:${r.matcherId}:${r.matchedPhrase}`)).toEqual([
      '0:apologies:apologise',
      '1:threats:court',
      '1:threats:lawyers',
      '2:threats:court',
    ]);
  });

  it('matches negated mentions since matching is purely lexical', () => {
    const records = matchTranscript(
      makeTranscript([['AGENT', 'I understand you are NOT in hardship']]),
      getDefaultPhraseCatalog().matchers,
    );

    expect(records.map(r => r.matchedPhrase)).toEqual(['hardship', 'I understand']);
  });

  it('is deterministic across repeated calls', () => {
    const transcript = makeTranscript([
      ['AGENT', 'our lawyers say court'],
      ['CUSTOMER', "I'm sorry"],
    ]);

    const first = JSON.stringify(matchTranscript(transcript, testCatalog.matchers));
    const second = JSON.stringify(matchTranscript(transcript, testCatalog.matchers));

    expect(second).toBe(first);
  });

  it('ignores blank phrases', () => {
    const catalog = createPhraseCatalog({
      version: 'blank',
      matchers: [{ matcherId: 'blank', displayName: 'Blank', phrases: ['', '   '] }],
    });

    expect(matchTranscript(makeTranscript([['AGENT', 'anything']]), catalog.matchers)).toEqual([]);
  });

  it('rejects a transcript whose turns are not an array', () => {
    const malformed = JSON.parse('{"conversationId":"x","turns":"nope"}');

    expect(() => matchTranscript(malformed, testCatalog.matchers)).toThrow(ValidationError);
  });
});

describe('buildSnippet', () => {
  it('returns short text unchanged', () => {
    expect(buildSnippet('short text', 0, 5, 200)).toBe('short text');
  });

  it('centers a window on the match and marks trimmed ends', () => {
    const text = 'aaaaaaaaaa' + 'MATCH' + 'bbbbbbbbbb';

    expect(buildSnippet(text, 10, 15, 11)).toBe('…aaaMATCHbbb…');
  });

  it('clamps the window at the start of the text', () => {
    const text = 'MATCH' + 'x'.repeat(20);

    expect(buildSnippet(text, 0, 5, 10)).toBe('MATCHxxxxx…');
  });

  it('clamps the window at the end of the text', () => {
    const text = 'x'.repeat(20) + 'MATCH';

    expect(buildSnippet(text, 20, 25, 10)).toBe('…xxxxxMATCH');
  });
});

describe('groupMatches', () => {
  it('groups records per matcher in catalog order including empty matchers', () => {
    const transcript = makeTranscript([['AGENT', 'see you in court']]);
    const records = matchTranscript(transcript, testCatalog.matchers);

    const grouped = groupMatches(records, testCatalog.matchers);

    expect(grouped.map(g => [g.matcherId, g.matchCount])).toEqual([
      ['threats', 1],
      ['apologies', 0],
    ]);
    expect(grouped[0].matches[0]).toBe(records[0]);
    expect(totalMatchCount(grouped)).toBe(1);
  });
});
