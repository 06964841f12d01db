import type { CiFlag, MatcherResult, SpeakerRole } from '../../shared/conversation';
import { MATCHER_IDS } from './phraseCatalog';

export interface FlagRule {
  matcherId: string;
  speakerRole: SpeakerRole | 'ANY';
  flag: CiFlag;
}

// Extend by adding rows; never branch on matcher internals
export const FLAG_RULES: readonly FlagRule[] = Object.freeze([
  { matcherId: MATCHER_IDS.complianceViolations, speakerRole: 'AGENT', flag: 'AGENT_COMPLIANCE_VIOLATION' },
  { matcherId: MATCHER_IDS.escalationTriggers, speakerRole: 'CUSTOMER', flag: 'CUSTOMER_ESCALATION' },
  { matcherId: MATCHER_IDS.vulnerabilityIndicators, speakerRole: 'ANY', flag: 'VULNERABILITY_DETECTED' },
  { matcherId: MATCHER_IDS.empathyIndicators, speakerRole: 'AGENT', flag: 'AGENT_EMPATHY_SHOWN' },
  { matcherId: MATCHER_IDS.requiredDisclosures, speakerRole: 'AGENT', flag: 'DISCLOSURE_PRESENT' },
]);

function ruleFires(rule: FlagRule, result: MatcherResult): boolean {
  if (result.matcherId !== rule.matcherId) return false;
  return result.matches.some(m => rule.speakerRole === 'ANY' || m.speakerRole === rule.speakerRole);
}

export function deriveFlags(
  groupedMatches: readonly MatcherResult[],
  rules: readonly FlagRule[] = FLAG_RULES,
): Set<CiFlag> {
  const flags = new Set<CiFlag>();
  for (const rule of rules) {
    if (groupedMatches.some(result => ruleFires(rule, result))) {
      flags.add(rule.flag);
    }
  }
  return flags;
}

/**
 * Stable ordering for persistence, following the rule table.
 */
export function sortFlags(flags: ReadonlySet<CiFlag>, rules: readonly FlagRule[] = FLAG_RULES): CiFlag[] {
  const order = rules.map(r => r.flag);
  return [...flags].sort((a, b) => order.indexOf(a) - order.indexOf(b));
}
