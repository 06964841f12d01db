// Conversation artifacts and phrase-match value types shared by the pipeline,
// the storage layer and the schema.

import { z } from 'zod';

export const SPEAKER_ROLES = ['AGENT', 'CUSTOMER'] as const;
export type SpeakerRole = (typeof SPEAKER_ROLES)[number];

export interface Turn {
  readonly index: number;
  readonly speakerRole: SpeakerRole;
  readonly text: string;
  readonly startOffsetSeconds: number;
}

export interface Transcript {
  readonly conversationId: string;
  readonly channel?: string;
  readonly language?: string;
  readonly startedAt?: string;
  readonly endedAt?: string;
  readonly turns: readonly Turn[];
}

// transcription.json as produced by the recording platform
const rawTurnSchema = z.object({
  turn_index: z.number().int().min(0),
  speaker: z.enum(SPEAKER_ROLES),
  text: z.string().min(1),
  ts_offset_sec: z.number().min(0),
});

export const transcriptSchema = z
  .object({
    conversation_id: z.string().min(1),
    channel: z.enum(['VOICE', 'CHAT', 'EMAIL']).optional(),
    language: z.string().default('en-AU'),
    started_at: z.string().datetime({ offset: true }).optional(),
    ended_at: z.string().datetime({ offset: true }).optional(),
    turns: z.array(rawTurnSchema),
  })
  .superRefine((data, ctx) => {
    data.turns.forEach((turn, position) => {
      if (turn.turn_index !== position) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['turns', position, 'turn_index'],
          message: `Expected turn_index ${position}, got ${turn.turn_index}`,
        });
      }
    });
  })
  // Frozen: a transcript is never edited after ingestion
  .transform((data): Transcript => Object.freeze({
    conversationId: data.conversation_id,
    channel: data.channel,
    language: data.language,
    startedAt: data.started_at,
    endedAt: data.ended_at,
    turns: Object.freeze(data.turns.map((turn) => Object.freeze({
      index: turn.turn_index,
      speakerRole: turn.speaker,
      text: turn.text,
      startOffsetSeconds: turn.ts_offset_sec,
    }))),
  }));

// metadata.json; only the identifiers are required, the rest passes through
export const conversationMetadataSchema = z
  .object({
    conversation_id: z.string().min(1),
    agent_id: z.string().min(1),
    agent_name: z.string().optional(),
    direction: z.enum(['INBOUND', 'OUTBOUND']).optional(),
    business_line: z.string().optional(),
    queue: z.string().optional(),
    team: z.string().optional(),
    site: z.string().optional(),
    call_outcome: z.string().optional(),
  })
  .passthrough();

export type ConversationMetadata = z.infer<typeof conversationMetadataSchema>;

export interface ConversationArtifacts {
  transcript: Transcript;
  metadata: ConversationMetadata;
}

export interface MatchRecord {
  matcherId: string;
  displayName: string;
  turnIndex: number;
  speakerRole: SpeakerRole;
  matchedPhrase: string;
  textSnippet: string;
  startOffset: number;
  endOffset: number;
}

export interface MatcherResult {
  matcherId: string;
  displayName: string;
  matchCount: number;
  matches: MatchRecord[];
}

const CI_FLAGS = [
  'AGENT_COMPLIANCE_VIOLATION',
  'CUSTOMER_ESCALATION',
  'VULNERABILITY_DETECTED',
  'AGENT_EMPATHY_SHOWN',
  'DISCLOSURE_PRESENT',
] as const;
export type CiFlag = (typeof CI_FLAGS)[number];

// Opaque pass-through from the analysis provider
export type AnnotationSummary = Record<string, unknown>;

export interface AuditMatchDetail {
  matcherId: string;
  matchedPhrase: string;
  turnIndex: number;
  speakerRole: SpeakerRole;
}
