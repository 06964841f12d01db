import type { CiFlag, SpeakerRole } from '../../shared/conversation';
import type { EnrichmentRecord } from '../../shared/schema';

export interface CoachPhraseMatch {
  phrase: string;
  turn: number;
  speaker: SpeakerRole;
}

export interface CoachPhraseContext {
  conversationId: string;
  flags: CiFlag[];
  phraseMatches: Array<{ category: string; matches: CoachPhraseMatch[] }>;
}

// Compact view of an enrichment handed to the coaching consumer
export function buildCoachPhraseContext(enrichment: EnrichmentRecord): CoachPhraseContext {
  return {
    conversationId: enrichment.conversationId,
    flags: [...enrichment.flags],
    phraseMatches: enrichment.phraseMatches
      .filter(result => result.matchCount > 0)
      .map(result => ({
        category: result.displayName,
        matches: result.matches.map(m => ({
          phrase: m.matchedPhrase,
          turn: m.turnIndex,
          speaker: m.speakerRole,
        })),
      })),
  };
}

export function toCoachPromptSection(context: CoachPhraseContext): string {
  if (context.flags.length === 0 && context.phraseMatches.length === 0) {
    return 'No phrase flags or phrase matches detected.';
  }

  const sections: string[] = [];

  if (context.flags.length > 0) {
    sections.push(`**Flags**: ${context.flags.join(', ')}`);
  }

  if (context.phraseMatches.length > 0) {
    sections.push('**Detected Phrases**:');
    for (const group of context.phraseMatches) {
      sections.push(`  - ${group.category}:`);
      for (const m of group.matches) {
        sections.push(`    - "${m.phrase}" (Turn ${m.turn}, ${m.speaker})`);
      }
    }
  }

  return sections.join('\n');
}
