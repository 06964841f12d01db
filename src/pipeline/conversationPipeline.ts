import type {
  AuditMatchDetail,
  ConversationArtifacts,
  MatchRecord,
  MatcherResult,
  Transcript,
} from '../../shared/conversation';
import type { ConversationRecord, EnrichmentRecord, ErrorKind, PhraseMatchAuditEntry } from '../../shared/schema';
import {
  PipelineError,
  PreconditionError,
  ProviderError,
  StorageError,
  ValidationError,
  classifyError,
  getErrorMessage,
  isPipelineError,
  isRetryableError,
} from '../../server/errors';
import { RegistryStateMachine, type PipelineStage } from '../../server/services/registryStateHelper';
import type { AuditLogSink, EnrichmentStore, ListConversationsOptions, RegistryStore } from '../../server/storage';
import { FLAG_RULES, deriveFlags, sortFlags, type FlagRule } from '../phraseMatching/flagDeriver';
import type { PhraseCatalog } from '../phraseMatching/phraseCatalog';
import { DEFAULT_SNIPPET_MAX_CHARS, groupMatches, matchTranscript, totalMatchCount } from '../phraseMatching/phraseMatchEngine';
import type { AnalysisProvider } from '../services/analysisProvider';
import { TimeoutError, abortable, isAbortError, throwIfAborted, withTimeout } from '../services/resilienceUtils';
import { pipelineLogger, registryLogger } from '../services/structuredLogger';
import type { ObjectStore } from './localArtifactStore';

export const DEFAULT_ANALYSIS_TIMEOUT_MS = 60000;
export const DEFAULT_BATCH_CONCURRENCY = 5;

export interface ConversationPipelineDeps {
  objectStore: ObjectStore;
  analysisProvider: AnalysisProvider;
  registryStore: RegistryStore;
  enrichmentStore: EnrichmentStore;
  auditLog: AuditLogSink;
  catalog: PhraseCatalog;
  flagRules?: readonly FlagRule[];
  clock?: () => Date;
  analysisTimeoutMs?: number;
  snippetMaxChars?: number;
  batchConcurrency?: number;
}

export interface StageOptions {
  signal?: AbortSignal;
}

export interface ProcessOptions extends StageOptions {
  /** Re-run enrichment even when an enrichment is already stored. */
  reenrich?: boolean;
}

export interface BatchItem {
  conversationId: string;
  sourceUri: string;
}

export type ProcessResult =
  | {
      conversationId: string;
      status: 'success';
      record: ConversationRecord;
      enrichment: EnrichmentRecord;
    }
  | {
      conversationId: string;
      status: 'failed';
      error: Error;
      retryable: boolean;
    };

interface StageFailure {
  message: string;
  kind: ErrorKind;
  retryable: boolean;
}

interface MatchRun {
  records: MatchRecord[];
  grouped: MatcherResult[];
}

function toAuditDetail(record: MatchRecord): AuditMatchDetail {
  return {
    matcherId: record.matcherId,
    matchedPhrase: record.matchedPhrase,
    turnIndex: record.turnIndex,
    speakerRole: record.speakerRole,
  };
}

/**
 * Drives one conversation through ingest and enrichment, one stage per
 * call. Every stage outcome is persisted to the registry before the call
 * returns; failures land in the stage's FAILED_* state and are rethrown
 * as PipelineErrors. Nothing is retried here.
 */
export class ConversationPipeline {
  private readonly objectStore: ObjectStore;
  private readonly analysisProvider: AnalysisProvider;
  private readonly registryStore: RegistryStore;
  private readonly enrichmentStore: EnrichmentStore;
  private readonly auditLog: AuditLogSink;
  private readonly catalog: PhraseCatalog;
  private readonly flagRules: readonly FlagRule[];
  private readonly clock: () => Date;
  private readonly analysisTimeoutMs: number;
  private readonly snippetMaxChars: number;
  private readonly batchConcurrency: number;

  constructor(deps: ConversationPipelineDeps) {
    this.objectStore = deps.objectStore;
    this.analysisProvider = deps.analysisProvider;
    this.registryStore = deps.registryStore;
    this.enrichmentStore = deps.enrichmentStore;
    this.auditLog = deps.auditLog;
    this.catalog = deps.catalog;
    this.flagRules = deps.flagRules ?? FLAG_RULES;
    this.clock = deps.clock ?? (() => new Date());
    this.analysisTimeoutMs = deps.analysisTimeoutMs ?? DEFAULT_ANALYSIS_TIMEOUT_MS;
    this.snippetMaxChars = deps.snippetMaxChars ?? DEFAULT_SNIPPET_MAX_CHARS;
    this.batchConcurrency = Math.max(1, deps.batchConcurrency ?? DEFAULT_BATCH_CONCURRENCY);
  }

  /**
   * Create the NEW row if absent. An existing row is returned unchanged.
   */
  async register(conversationId: string, sourceUri: string): Promise<ConversationRecord> {
    const record = await this.registryStore.insertIfAbsent(
      RegistryStateMachine.newRecord(conversationId, sourceUri, this.clock()),
    );
    registryLogger.debug('Conversation registered', { conversationId, status: record.status });
    return record;
  }

  async ingest(conversationId: string, sourceUri: string, options: StageOptions = {}): Promise<ConversationRecord> {
    const { signal } = options;
    throwIfAborted(signal);

    const record = await this.register(conversationId, sourceUri);

    if (RegistryStateMachine.hasPassed(record.status, 'ingest')) {
      pipelineLogger.stageSkipped({ conversationId, stage: 'ingest', status: record.status });
      return record;
    }
    if (record.status === 'FAILED_INGEST') {
      throw new PreconditionError(
        `Conversation ${conversationId} is in ${record.status}; reset it before re-running the pipeline`,
        { conversationId, currentStatus: record.status },
      );
    }

    const pending = { ...record, sourceUri };
    try {
      const { transcript, metadata } = await this.readArtifacts(conversationId, sourceUri, signal);
      if (transcript.conversationId !== conversationId) {
        throw new ValidationError(
          `Transcript conversation_id ${transcript.conversationId} does not match ${conversationId}`,
          { conversationId },
        );
      }
      if (metadata.conversation_id !== conversationId) {
        throw new ValidationError(
          `Metadata conversation_id ${metadata.conversation_id} does not match ${conversationId}`,
          { conversationId },
        );
      }
      throwIfAborted(signal);

      const ingested = RegistryStateMachine.applyTransition(pending, 'INGESTED', this.clock());
      const stored = await this.store('upsertConversation', conversationId, () =>
        this.registryStore.upsertConversation(ingested),
      );
      registryLogger.stageTransition(conversationId, record.status, stored.status, { turns: transcript.turns.length });
      return stored;
    } catch (error) {
      if (isAbortError(error, signal)) {
        // register() already wrote the row
        await this.recordFailure(pending, 'ingest', {
          message: `Ingest cancelled: ${getErrorMessage(signal?.reason ?? error)}`,
          kind: 'cancelled',
          retryable: true,
        });
        throw error;
      }
      const failure = classifyError(error, 'storage', conversationId);
      await this.recordFailure(pending, 'ingest', failure);
      throw failure;
    }
  }

  async enrich(conversationId: string, options: StageOptions = {}): Promise<EnrichmentRecord> {
    const { signal } = options;
    throwIfAborted(signal);

    const record = await this.registryStore.getConversation(conversationId);
    if (!record) {
      throw new PreconditionError(`Conversation ${conversationId} is not registered`, { conversationId });
    }
    if (record.status !== 'INGESTED' && record.status !== 'ENRICHED') {
      throw new PreconditionError(
        `Cannot enrich conversation ${conversationId} in status ${record.status}; it must be INGESTED or ENRICHED`,
        { conversationId, currentStatus: record.status },
      );
    }
    if (!record.sourceUri) {
      throw new PreconditionError(`Conversation ${conversationId} has no source uri`, {
        conversationId,
        currentStatus: record.status,
      });
    }

    try {
      const { transcript, metadata } = await this.readArtifacts(conversationId, record.sourceUri, signal);

      const [analysisResult, matchResult] = await Promise.allSettled([
        withTimeout(
          abortable(this.analysisProvider.analyze(transcript, metadata, signal), signal),
          this.analysisTimeoutMs,
          'Analysis provider',
        ),
        Promise.resolve().then(() => this.matchPhrases(transcript)),
      ]);

      // Cancellation before commit leaves every store untouched
      throwIfAborted(signal);

      if (matchResult.status === 'rejected') {
        throw classifyError(matchResult.reason, 'validation', conversationId);
      }
      if (analysisResult.status === 'rejected') {
        throw this.toProviderError(analysisResult.reason, conversationId);
      }

      const { records, grouped } = matchResult.value;
      const flags = sortFlags(deriveFlags(grouped, this.flagRules), this.flagRules);
      const now = this.clock();

      const enrichment: EnrichmentRecord = {
        conversationId,
        phraseMatches: grouped.filter(result => result.matchCount > 0),
        flags,
        annotationSummary: analysisResult.value,
        catalogVersion: this.catalog.version,
        enrichedAt: now,
      };

      const stored = await this.store('upsertEnrichment', conversationId, () =>
        this.enrichmentStore.upsertEnrichment(enrichment),
      );
      await this.store('appendAudit', conversationId, () =>
        this.auditLog.appendAudit({
          conversationId,
          catalogVersion: this.catalog.version,
          matchCount: records.length,
          flags,
          matches: records.map(toAuditDetail),
          recordedAt: now,
        }),
      );
      const next = RegistryStateMachine.applyTransition(record, 'ENRICHED', now);
      const enriched = await this.store('upsertConversation', conversationId, () =>
        this.registryStore.upsertConversation(next),
      );

      pipelineLogger.matchRunCompleted({
        conversationId,
        matchCount: totalMatchCount(grouped),
        flagCount: flags.length,
        catalogVersion: this.catalog.version,
      });
      registryLogger.stageTransition(conversationId, record.status, enriched.status);
      return stored;
    } catch (error) {
      if (isAbortError(error, signal)) {
        throw error;
      }
      const failure = classifyError(error, 'storage', conversationId);
      await this.recordFailure(record, 'enrich', failure);
      throw failure;
    }
  }

  /**
   * Return a FAILED_* conversation to the start of its stage.
   */
  async reset(conversationId: string): Promise<ConversationRecord> {
    const record = await this.requireConversation(conversationId);
    const next = RegistryStateMachine.applyReset(record, this.clock());
    const stored = await this.registryStore.upsertConversation(next);
    registryLogger.info(`Conversation reset: ${record.status} -> ${stored.status}`, {
      conversationId,
      event: 'conversation_reset',
      fromState: record.status,
      toState: stored.status,
      retryCount: stored.retryCount,
    });
    return stored;
  }

  async markCoached(conversationId: string): Promise<ConversationRecord> {
    const record = await this.requireConversation(conversationId);
    const stored = await this.registryStore.upsertConversation(
      RegistryStateMachine.applyTransition(record, 'COACHED', this.clock()),
    );
    registryLogger.stageTransition(conversationId, record.status, stored.status);
    return stored;
  }

  async markCoachingFailed(conversationId: string, detail: string): Promise<ConversationRecord> {
    const record = await this.requireConversation(conversationId);
    const stored = await this.registryStore.upsertConversation(
      RegistryStateMachine.applyTransition(record, 'FAILED_COACH', this.clock(), { detail, kind: 'provider' }),
    );
    registryLogger.stageTransition(conversationId, record.status, stored.status, { error: detail });
    return stored;
  }

  async getConversation(conversationId: string): Promise<ConversationRecord | undefined> {
    return this.registryStore.getConversation(conversationId);
  }

  async getEnrichment(conversationId: string): Promise<EnrichmentRecord | undefined> {
    return this.enrichmentStore.getEnrichment(conversationId);
  }

  async listConversations(options?: ListConversationsOptions): Promise<ConversationRecord[]> {
    return this.registryStore.listConversations(options);
  }

  async listAudit(conversationId: string): Promise<PhraseMatchAuditEntry[]> {
    return this.auditLog.listAudit(conversationId);
  }

  /**
   * Ingest then enrich. Per-conversation failures are reported in the
   * result rather than thrown.
   */
  async processConversation(
    conversationId: string,
    sourceUri: string,
    options: ProcessOptions = {},
  ): Promise<ProcessResult> {
    try {
      const ingested = await this.ingest(conversationId, sourceUri, options);

      if (!options.reenrich && RegistryStateMachine.hasReached(ingested.status, 'enrich')) {
        const existing = await this.enrichmentStore.getEnrichment(conversationId);
        if (existing) {
          pipelineLogger.stageSkipped({ conversationId, stage: 'enrich', status: ingested.status });
          return { conversationId, status: 'success', record: ingested, enrichment: existing };
        }
      }

      const enrichment = await this.enrich(conversationId, options);
      const record = await this.requireConversation(conversationId);
      return { conversationId, status: 'success', record, enrichment };
    } catch (error) {
      pipelineLogger.warn('Conversation processing failed', { conversationId, error: getErrorMessage(error) });
      return {
        conversationId,
        status: 'failed',
        error: error instanceof Error ? error : new Error(String(error)),
        retryable: isRetryableError(error),
      };
    }
  }

  /**
   * Process conversations in batches of `batchConcurrency`. Ids repeated
   * within one call are processed once, using the first source uri.
   */
  async processBatch(items: readonly BatchItem[], options: ProcessOptions = {}): Promise<ProcessResult[]> {
    const unique = new Map<string, BatchItem>();
    for (const item of items) {
      if (!unique.has(item.conversationId)) {
        unique.set(item.conversationId, item);
      }
    }
    const queue = [...unique.values()];
    const results: ProcessResult[] = [];

    for (let i = 0; i < queue.length; i += this.batchConcurrency) {
      const batch = queue.slice(i, i + this.batchConcurrency);
      const settled = await Promise.all(
        batch.map(item => this.processConversation(item.conversationId, item.sourceUri, options)),
      );
      results.push(...settled);
    }

    const failed = results.filter(r => r.status === 'failed').length;
    pipelineLogger.info('Batch processed', {
      event: 'batch_completed',
      total: results.length,
      succeeded: results.length - failed,
      failed,
    });
    return results;
  }

  private matchPhrases(transcript: Transcript): MatchRun {
    const records = matchTranscript(transcript, this.catalog.matchers, { snippetMaxChars: this.snippetMaxChars });
    return { records, grouped: groupMatches(records, this.catalog.matchers) };
  }

  /**
   * Object store reads and parses. Anything it throws other than a
   * cancellation is a validation failure of the source artifacts.
   */
  private async readArtifacts(
    conversationId: string,
    sourceUri: string,
    signal?: AbortSignal,
  ): Promise<ConversationArtifacts> {
    try {
      return await this.objectStore.readConversationArtifacts(sourceUri, signal);
    } catch (error) {
      if (isAbortError(error, signal)) {
        throw error;
      }
      throw classifyError(error, 'validation', conversationId);
    }
  }

  private async store<T>(operation: string, conversationId: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (isPipelineError(error)) {
        throw error;
      }
      throw new StorageError(`${operation}(${conversationId})`, getErrorMessage(error), { conversationId, cause: error });
    }
  }

  private toProviderError(reason: unknown, conversationId: string): PipelineError {
    if (reason instanceof TimeoutError) {
      return new ProviderError(reason.message, { conversationId, timedOut: true, cause: reason });
    }
    return classifyError(reason, 'provider', conversationId);
  }

  private async requireConversation(conversationId: string): Promise<ConversationRecord> {
    const record = await this.registryStore.getConversation(conversationId);
    if (!record) {
      throw new PreconditionError(`Conversation ${conversationId} is not registered`, { conversationId });
    }
    return record;
  }

  /**
   * Persist the stage's FAILED_* state. A storage failure here is logged
   * and the caller rethrows the original error.
   */
  private async recordFailure(record: ConversationRecord, stage: PipelineStage, failure: StageFailure): Promise<void> {
    const target = stage === 'ingest' ? 'FAILED_INGEST' : stage === 'enrich' ? 'FAILED_ENRICH' : 'FAILED_COACH';

    try {
      const failed = RegistryStateMachine.applyTransition(record, target, this.clock(), {
        detail: failure.message,
        kind: failure.kind,
      });
      await this.registryStore.upsertConversation(failed);
      registryLogger.stageTransition(record.conversationId, record.status, target);
    } catch (error) {
      registryLogger.error('Could not record stage failure', {
        conversationId: record.conversationId,
        stage,
        error: getErrorMessage(error),
      });
    }

    pipelineLogger.stageFailed({
      conversationId: record.conversationId,
      stage,
      errorKind: failure.kind,
      retryable: failure.retryable,
      error: failure.message,
    });
  }
}
