// Storage layer for the conversation pipeline

import {
  conversationEnrichment,
  conversationRegistry,
  phraseMatchAudit,
  type ConversationRecord,
  type ConversationStatus,
  type EnrichmentRecord,
  type InsertPhraseMatchAuditEntry,
  type PhraseMatchAuditEntry,
} from "../shared/schema";
import { getDb, type PipelineDatabase } from "./db";
import { StorageError, getErrorMessage } from "./errors";
import { asc, desc, eq } from "drizzle-orm";

export interface ListConversationsOptions {
  status?: ConversationStatus;
  limit?: number;
}

export const DEFAULT_LIST_LIMIT = 100;

export interface RegistryStore {
  /** Insert the row unless one exists; returns whichever row is stored. */
  insertIfAbsent(record: ConversationRecord): Promise<ConversationRecord>;
  upsertConversation(record: ConversationRecord): Promise<ConversationRecord>;
  getConversation(conversationId: string): Promise<ConversationRecord | undefined>;
  listConversations(options?: ListConversationsOptions): Promise<ConversationRecord[]>;
}

export interface EnrichmentStore {
  upsertEnrichment(record: EnrichmentRecord): Promise<EnrichmentRecord>;
  getEnrichment(conversationId: string): Promise<EnrichmentRecord | undefined>;
}

export interface AuditLogSink {
  appendAudit(entry: InsertPhraseMatchAuditEntry): Promise<PhraseMatchAuditEntry>;
  listAudit(conversationId: string): Promise<PhraseMatchAuditEntry[]>;
}

export type PipelineStorage = RegistryStore & EnrichmentStore & AuditLogSink;

export class DatabaseStorage implements PipelineStorage {
  constructor(private readonly resolveDb: () => PipelineDatabase = getDb) {}

  private async run<T>(operation: string, fn: (db: PipelineDatabase) => Promise<T>): Promise<T> {
    try {
      return await fn(this.resolveDb());
    } catch (error) {
      throw new StorageError(operation, getErrorMessage(error), { cause: error });
    }
  }

  async insertIfAbsent(record: ConversationRecord): Promise<ConversationRecord> {
    return this.run(`insertIfAbsent(${record.conversationId})`, async (db) => {
      const [inserted] = await db
        .insert(conversationRegistry)
        .values(record)
        .onConflictDoNothing({ target: conversationRegistry.conversationId })
        .returning();
      if (inserted) return inserted;

      const [existing] = await db
        .select()
        .from(conversationRegistry)
        .where(eq(conversationRegistry.conversationId, record.conversationId));
      if (!existing) {
        throw new Error('row vanished after conflicting insert');
      }
      return existing;
    });
  }

  async upsertConversation(record: ConversationRecord): Promise<ConversationRecord> {
    return this.run(`upsertConversation(${record.conversationId})`, async (db) => {
      const [row] = await db
        .insert(conversationRegistry)
        .values(record)
        .onConflictDoUpdate({
          target: conversationRegistry.conversationId,
          set: {
            status: record.status,
            sourceUri: record.sourceUri,
            ingestedAt: record.ingestedAt,
            enrichedAt: record.enrichedAt,
            coachedAt: record.coachedAt,
            errorDetail: record.errorDetail,
            errorKind: record.errorKind,
            retryCount: record.retryCount,
            updatedAt: record.updatedAt,
          },
        })
        .returning();
      if (!row) {
        throw new Error('upsert returned no row');
      }
      return row;
    });
  }

  async getConversation(conversationId: string): Promise<ConversationRecord | undefined> {
    return this.run(`getConversation(${conversationId})`, async (db) => {
      const [row] = await db
        .select()
        .from(conversationRegistry)
        .where(eq(conversationRegistry.conversationId, conversationId));
      return row;
    });
  }

  async listConversations(options: ListConversationsOptions = {}): Promise<ConversationRecord[]> {
    const { status, limit = DEFAULT_LIST_LIMIT } = options;
    return this.run('listConversations', (db) =>
      db
        .select()
        .from(conversationRegistry)
        .where(status ? eq(conversationRegistry.status, status) : undefined)
        .orderBy(desc(conversationRegistry.updatedAt))
        .limit(limit),
    );
  }

  async upsertEnrichment(record: EnrichmentRecord): Promise<EnrichmentRecord> {
    return this.run(`upsertEnrichment(${record.conversationId})`, async (db) => {
      const [row] = await db
        .insert(conversationEnrichment)
        .values(record)
        .onConflictDoUpdate({
          target: conversationEnrichment.conversationId,
          set: {
            phraseMatches: record.phraseMatches,
            flags: record.flags,
            annotationSummary: record.annotationSummary,
            catalogVersion: record.catalogVersion,
            enrichedAt: record.enrichedAt,
          },
        })
        .returning();
      if (!row) {
        throw new Error('upsert returned no row');
      }
      return row;
    });
  }

  async getEnrichment(conversationId: string): Promise<EnrichmentRecord | undefined> {
    return this.run(`getEnrichment(${conversationId})`, async (db) => {
      const [row] = await db
        .select()
        .from(conversationEnrichment)
        .where(eq(conversationEnrichment.conversationId, conversationId));
      return row;
    });
  }

  async appendAudit(entry: InsertPhraseMatchAuditEntry): Promise<PhraseMatchAuditEntry> {
    return this.run(`appendAudit(${entry.conversationId})`, async (db) => {
      const [row] = await db.insert(phraseMatchAudit).values(entry).returning();
      if (!row) {
        throw new Error('insert returned no row');
      }
      return row;
    });
  }

  async listAudit(conversationId: string): Promise<PhraseMatchAuditEntry[]> {
    return this.run(`listAudit(${conversationId})`, (db) =>
      db
        .select()
        .from(phraseMatchAudit)
        .where(eq(phraseMatchAudit.conversationId, conversationId))
        .orderBy(asc(phraseMatchAudit.id)),
    );
  }
}
