import type {
  ConversationRecord,
  EnrichmentRecord,
  InsertPhraseMatchAuditEntry,
  PhraseMatchAuditEntry,
} from "../shared/schema";
import { DEFAULT_LIST_LIMIT, type ListConversationsOptions, type PipelineStorage } from "./storage";

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * In-process storage for tests and local runs without PostgreSQL.
 * Rows are copied on the way in and out so callers never share state
 * with the store.
 */
export class MemStorage implements PipelineStorage {
  private readonly conversations = new Map<string, ConversationRecord>();
  private readonly enrichments = new Map<string, EnrichmentRecord>();
  private readonly audit: PhraseMatchAuditEntry[] = [];
  private nextAuditId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async insertIfAbsent(record: ConversationRecord): Promise<ConversationRecord> {
    const existing = this.conversations.get(record.conversationId);
    if (existing) {
      return structuredClone(existing);
    }
    this.conversations.set(record.conversationId, structuredClone(record));
    return structuredClone(record);
  }

  async upsertConversation(record: ConversationRecord): Promise<ConversationRecord> {
    const existing = this.conversations.get(record.conversationId);
    const stored: ConversationRecord = { ...structuredClone(record), createdAt: existing?.createdAt ?? record.createdAt };
    this.conversations.set(record.conversationId, stored);
    return structuredClone(stored);
  }

  async getConversation(conversationId: string): Promise<ConversationRecord | undefined> {
    const record = this.conversations.get(conversationId);
    return record ? structuredClone(record) : undefined;
  }

  async listConversations(options: ListConversationsOptions = {}): Promise<ConversationRecord[]> {
    const { status, limit = DEFAULT_LIST_LIMIT } = options;
    return [...this.conversations.values()]
      .filter(record => !status || record.status === status)
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .slice(0, limit)
      .map(record => structuredClone(record));
  }

  async upsertEnrichment(record: EnrichmentRecord): Promise<EnrichmentRecord> {
    this.enrichments.set(record.conversationId, structuredClone(record));
    return structuredClone(record);
  }

  async getEnrichment(conversationId: string): Promise<EnrichmentRecord | undefined> {
    const record = this.enrichments.get(conversationId);
    return record ? structuredClone(record) : undefined;
  }

  async appendAudit(entry: InsertPhraseMatchAuditEntry): Promise<PhraseMatchAuditEntry> {
    const stored: PhraseMatchAuditEntry = deepFreeze({
      id: this.nextAuditId++,
      conversationId: entry.conversationId,
      catalogVersion: entry.catalogVersion,
      matchCount: entry.matchCount,
      flags: structuredClone(entry.flags),
      matches: structuredClone(entry.matches),
      recordedAt: new Date((entry.recordedAt ?? this.now()).getTime()),
    });
    this.audit.push(stored);
    return stored;
  }

  async listAudit(conversationId: string): Promise<PhraseMatchAuditEntry[]> {
    return this.audit.filter(entry => entry.conversationId === conversationId);
  }
}
