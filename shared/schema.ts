// Database schema for the conversation pipeline

import {
  index,
  integer,
  jsonb,
  pgEnum,
  pgTable,
  serial,
  text,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";
import type {
  AnnotationSummary,
  AuditMatchDetail,
  CiFlag,
  MatcherResult,
} from "./conversation";

// Pipeline status enum
export const conversationStatusEnum = pgEnum('conversation_status', [
  'NEW',
  'INGESTED',
  'ENRICHED',
  'COACHED',
  'FAILED_INGEST',
  'FAILED_ENRICH',
  'FAILED_COACH',
]);

export type ConversationStatus = (typeof conversationStatusEnum.enumValues)[number];

// 'cancelled' is only ever recorded on the registry row, never raised
const ERROR_KINDS = ['validation', 'provider', 'storage', 'precondition', 'cancelled'] as const;
export type ErrorKind = (typeof ERROR_KINDS)[number];

// One row per conversation, mutated only by the pipeline as it advances stages
export const conversationRegistry = pgTable("conversation_registry", {
  conversationId: varchar("conversation_id").primaryKey(),
  status: conversationStatusEnum("status").notNull().default('NEW'),
  sourceUri: varchar("source_uri"),

  // Stage timestamps
  ingestedAt: timestamp("ingested_at"),
  enrichedAt: timestamp("enriched_at"),
  coachedAt: timestamp("coached_at"),

  // Error handling
  errorDetail: text("error_detail"),
  errorKind: varchar("error_kind").$type<ErrorKind>(),
  retryCount: integer("retry_count").notNull().default(0),

  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
}, (table) => [
  index("idx_conversation_registry_status").on(table.status),
  index("idx_conversation_registry_updated").on(table.updatedAt),
]);

export type ConversationRecord = typeof conversationRegistry.$inferSelect;
export type InsertConversationRecord = typeof conversationRegistry.$inferInsert;

// Replaced as a whole on every enrichment run
export const conversationEnrichment = pgTable("conversation_enrichment", {
  conversationId: varchar("conversation_id")
    .primaryKey()
    .references(() => conversationRegistry.conversationId),
  phraseMatches: jsonb("phrase_matches").$type<MatcherResult[]>().notNull(),
  flags: jsonb("flags").$type<CiFlag[]>().notNull(),
  annotationSummary: jsonb("annotation_summary").$type<AnnotationSummary>().notNull(),
  catalogVersion: varchar("catalog_version").notNull(),
  enrichedAt: timestamp("enriched_at").notNull(),
});

export type EnrichmentRecord = typeof conversationEnrichment.$inferSelect;

// Append-only; rows are never updated
export const phraseMatchAudit = pgTable("phrase_match_audit", {
  id: serial("id").primaryKey(),
  conversationId: varchar("conversation_id").notNull(),
  catalogVersion: varchar("catalog_version").notNull(),
  matchCount: integer("match_count").notNull(),
  flags: jsonb("flags").$type<CiFlag[]>().notNull(),
  matches: jsonb("matches").$type<AuditMatchDetail[]>().notNull(),
  recordedAt: timestamp("recorded_at").notNull().defaultNow(),
}, (table) => [
  index("idx_phrase_match_audit_conversation").on(table.conversationId),
]);

export type PhraseMatchAuditEntry = typeof phraseMatchAudit.$inferSelect;
export type InsertPhraseMatchAuditEntry = typeof phraseMatchAudit.$inferInsert;
