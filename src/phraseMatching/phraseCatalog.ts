import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ValidationError, getErrorMessage } from '../../server/errors';
import { phraseLogger } from '../services/structuredLogger';
import { foldCase } from './phraseMatchEngine';

export type MatchMode = 'case_insensitive_substring';

export interface PhraseMatcher {
  readonly matcherId: string;
  readonly displayName: string;
  readonly phrases: readonly string[];
  readonly matchMode: MatchMode;
}

export interface PhraseCatalog {
  readonly version: string;
  readonly matchers: readonly PhraseMatcher[];
}

// Matcher ids the flag rules key on
export const MATCHER_IDS = {
  complianceViolations: 'compliance_violations',
  requiredDisclosures: 'required_disclosures',
  empathyIndicators: 'empathy_indicators',
  escalationTriggers: 'escalation_triggers',
  vulnerabilityIndicators: 'vulnerability_indicators',
} as const;

// Phrases are a set under case-insensitive matching; the first spelling wins
function uniquePhrases(phrases: string[]): string[] {
  const seen = new Set<string>();
  return phrases.filter(phrase => {
    const key = foldCase(phrase.trim());
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

const phraseMatcherDefinitionSchema = z.object({
  matcherId: z.string().min(1),
  displayName: z.string().min(1),
  phrases: z.array(z.string()).transform(uniquePhrases),
  matchMode: z.literal('case_insensitive_substring').default('case_insensitive_substring'),
});

const phraseCatalogDefinitionSchema = z
  .object({
    version: z.string().min(1),
    matchers: z.array(phraseMatcherDefinitionSchema),
  })
  .superRefine((data, ctx) => {
    const seen = new Set<string>();
    data.matchers.forEach((matcher, position) => {
      if (seen.has(matcher.matcherId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['matchers', position, 'matcherId'],
          message: `Duplicate matcher id: ${matcher.matcherId}`,
        });
      }
      seen.add(matcher.matcherId);
    });
  });

export type PhraseCatalogDefinition = z.input<typeof phraseCatalogDefinitionSchema>;

const DEFAULT_CATALOG_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../config/phrase-matchers.json',
);

function freezeMatcher(matcher: z.output<typeof phraseMatcherDefinitionSchema>): PhraseMatcher {
  return Object.freeze({
    matcherId: matcher.matcherId,
    displayName: matcher.displayName,
    phrases: Object.freeze([...matcher.phrases]),
    matchMode: matcher.matchMode,
  });
}

/**
 * Validate a catalog definition and return an immutable catalog.
 * The catalog is shared read-only across concurrent pipeline runs.
 */
export function createPhraseCatalog(definition: unknown): PhraseCatalog {
  const parsed = phraseCatalogDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    throw new ValidationError(`Invalid phrase catalog: ${getErrorMessage(parsed.error)}`);
  }

  return Object.freeze({
    version: parsed.data.version,
    matchers: Object.freeze(parsed.data.matchers.map(freezeMatcher)),
  });
}

/**
 * Catalog B = catalog A followed by additional matchers, in that order.
 */
export function extendCatalog(
  base: PhraseCatalog,
  additional: PhraseCatalogDefinition['matchers'],
  version: string,
): PhraseCatalog {
  return createPhraseCatalog({
    version,
    matchers: [...base.matchers.map(m => ({ ...m, phrases: [...m.phrases] })), ...additional],
  });
}

export function loadPhraseCatalog(catalogPath: string = DEFAULT_CATALOG_PATH): PhraseCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(catalogPath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`Could not read phrase catalog at ${catalogPath}: ${getErrorMessage(error)}`, { cause: error });
  }

  const catalog = createPhraseCatalog(raw);
  phraseLogger.info('Phrase catalog loaded', {
    event: 'catalog_loaded',
    catalogVersion: catalog.version,
    matcherCount: catalog.matchers.length,
    phraseCount: catalog.matchers.reduce((sum, m) => sum + m.phrases.length, 0),
  });
  return catalog;
}

let defaultCatalog: PhraseCatalog | null = null;

export function getDefaultPhraseCatalog(): PhraseCatalog {
  if (!defaultCatalog) {
    defaultCatalog = loadPhraseCatalog();
  }
  return defaultCatalog;
}

export function getMatcher(catalog: PhraseCatalog, matcherId: string): PhraseMatcher | undefined {
  return catalog.matchers.find(m => m.matcherId === matcherId);
}
