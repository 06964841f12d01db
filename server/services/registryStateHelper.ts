import type { ConversationRecord, ConversationStatus, ErrorKind } from '../../shared/schema';
import { InvalidTransitionError, PreconditionError } from '../errors';

export const CONVERSATION_STATUSES = {
  NEW: 'NEW',
  INGESTED: 'INGESTED',
  ENRICHED: 'ENRICHED',
  COACHED: 'COACHED',
  FAILED_INGEST: 'FAILED_INGEST',
  FAILED_ENRICH: 'FAILED_ENRICH',
  FAILED_COACH: 'FAILED_COACH',
} as const satisfies Record<ConversationStatus, ConversationStatus>;

export type PipelineStage = 'ingest' | 'enrich' | 'coach';

const FAILED_STATUSES: Set<ConversationStatus> = new Set([
  CONVERSATION_STATUSES.FAILED_INGEST,
  CONVERSATION_STATUSES.FAILED_ENRICH,
  CONVERSATION_STATUSES.FAILED_COACH,
]);

// Forward edges driven by completed units of work. ENRICHED → ENRICHED and
// ENRICHED → FAILED_ENRICH are the enrichment re-run edges.
const ALLOWED_TRANSITIONS: Record<ConversationStatus, ConversationStatus[]> = {
  NEW: ['INGESTED', 'FAILED_INGEST'],
  INGESTED: ['ENRICHED', 'FAILED_ENRICH'],
  ENRICHED: ['ENRICHED', 'FAILED_ENRICH', 'COACHED', 'FAILED_COACH'],
  COACHED: [],
  FAILED_INGEST: [],
  FAILED_ENRICH: [],
  FAILED_COACH: [],
};

// Manual re-drive only, never taken automatically
const RESET_TRANSITIONS: Partial<Record<ConversationStatus, ConversationStatus>> = {
  FAILED_INGEST: 'NEW',
  FAILED_ENRICH: 'INGESTED',
  FAILED_COACH: 'ENRICHED',
};

// Position on the success path; failed states sit where their stage started
const PROGRESS_RANK: Record<ConversationStatus, number> = {
  NEW: 0,
  FAILED_INGEST: 0,
  INGESTED: 1,
  FAILED_ENRICH: 1,
  ENRICHED: 2,
  FAILED_COACH: 2,
  COACHED: 3,
};

const STAGE_SUCCESS: Record<PipelineStage, ConversationStatus> = {
  ingest: 'INGESTED',
  enrich: 'ENRICHED',
  coach: 'COACHED',
};

export class RegistryStateMachine {
  static isFailed(status: ConversationStatus): boolean {
    return FAILED_STATUSES.has(status);
  }

  static allowedTransitions(from: ConversationStatus): readonly ConversationStatus[] {
    return ALLOWED_TRANSITIONS[from];
  }

  static canTransition(from: ConversationStatus, to: ConversationStatus): boolean {
    return ALLOWED_TRANSITIONS[from].includes(to);
  }

  static assertTransition(from: ConversationStatus, to: ConversationStatus, conversationId?: string): void {
    if (!this.canTransition(from, to)) {
      throw new InvalidTransitionError(from, to, ALLOWED_TRANSITIONS[from], conversationId);
    }
  }

  /**
   * Whether the stage's success status (or a later one) has been reached.
   * Failed states never count as having reached their own stage.
   */
  static hasReached(status: ConversationStatus, stage: PipelineStage): boolean {
    if (this.isFailed(status)) return false;
    return PROGRESS_RANK[status] >= PROGRESS_RANK[STAGE_SUCCESS[stage]];
  }

  /**
   * Like hasReached, but a failure in a later stage still counts as having
   * passed this one (FAILED_ENRICH has passed ingest).
   */
  static hasPassed(status: ConversationStatus, stage: PipelineStage): boolean {
    return PROGRESS_RANK[status] >= PROGRESS_RANK[STAGE_SUCCESS[stage]];
  }

  static resetTarget(status: ConversationStatus): ConversationStatus | undefined {
    return RESET_TRANSITIONS[status];
  }

  /**
   * Validate and apply a forward transition, returning a new record.
   * Success statuses stamp their stage timestamp and clear the error;
   * failed statuses record the error and bump the retry counter.
   * Earlier stage timestamps are never cleared here.
   */
  static applyTransition(
    record: ConversationRecord,
    to: ConversationStatus,
    now: Date,
    failure?: { detail: string; kind: ErrorKind },
  ): ConversationRecord {
    this.assertTransition(record.status, to, record.conversationId);

    const next: ConversationRecord = { ...record, status: to, updatedAt: now };

    if (this.isFailed(to)) {
      next.errorDetail = failure?.detail ?? 'Unknown error';
      next.errorKind = failure?.kind ?? null;
      next.retryCount = record.retryCount + 1;
      return next;
    }

    next.errorDetail = null;
    next.errorKind = null;
    if (to === 'INGESTED') next.ingestedAt = now;
    if (to === 'ENRICHED') next.enrichedAt = now;
    if (to === 'COACHED') next.coachedAt = now;
    return next;
  }

  /**
   * Explicit reset of a FAILED_* record to the start of its stage.
   * Clears the error and the timestamp of the stage being re-driven.
   */
  static applyReset(record: ConversationRecord, now: Date): ConversationRecord {
    const target = this.resetTarget(record.status);
    if (!target) {
      throw new PreconditionError(
        `Cannot reset conversation ${record.conversationId} in status ${record.status}; only failed conversations can be reset`,
        { conversationId: record.conversationId, currentStatus: record.status },
      );
    }

    const next: ConversationRecord = {
      ...record,
      status: target,
      errorDetail: null,
      errorKind: null,
      updatedAt: now,
    };
    if (target === 'NEW') next.ingestedAt = null;
    if (target === 'INGESTED') next.enrichedAt = null;
    if (target === 'ENRICHED') next.coachedAt = null;
    return next;
  }

  static newRecord(conversationId: string, sourceUri: string | null, now: Date): ConversationRecord {
    return {
      conversationId,
      status: CONVERSATION_STATUSES.NEW,
      sourceUri,
      ingestedAt: null,
      enrichedAt: null,
      coachedAt: null,
      errorDetail: null,
      errorKind: null,
      retryCount: 0,
      createdAt: now,
      updatedAt: now,
    };
  }
}
