import { config as loadDotenv } from 'dotenv';
import { MemStorage } from '../server/memStorage';
import { DatabaseStorage, type PipelineStorage } from '../server/storage';
import { getEnvironmentConfig } from './config/environment';
import { ConversationPipeline } from './pipeline/conversationPipeline';
import { LocalArtifactStore, type ObjectStore } from './pipeline/localArtifactStore';
import { getDefaultPhraseCatalog, loadPhraseCatalog } from './phraseMatching/phraseCatalog';
import { OpenAiAnalysisProvider, type AnalysisProvider } from './services/analysisProvider';
import { pipelineLogger } from './services/structuredLogger';

export * from '../shared/conversation';
export type { ConversationRecord, ConversationStatus, EnrichmentRecord, ErrorKind, PhraseMatchAuditEntry } from '../shared/schema';
export * from '../server/errors';
export { RegistryStateMachine, CONVERSATION_STATUSES, type PipelineStage } from '../server/services/registryStateHelper';
export { DatabaseStorage, type AuditLogSink, type EnrichmentStore, type ListConversationsOptions, type PipelineStorage, type RegistryStore } from '../server/storage';
export { MemStorage } from '../server/memStorage';
export { closeDb } from '../server/db';
export * from './phraseMatching/phraseCatalog';
export * from './phraseMatching/phraseMatchEngine';
export * from './phraseMatching/flagDeriver';
export * from './phraseMatching/coachContext';
export * from './pipeline/conversationPipeline';
export { LocalArtifactStore, type ObjectStore } from './pipeline/localArtifactStore';
export { OpenAiAnalysisProvider, type AnalysisProvider } from './services/analysisProvider';
export { getEnvironmentConfig, resetEnvironmentConfig } from './config/environment';
export { createLogger } from './services/structuredLogger';

export interface PipelineOverrides {
  env?: Record<string, string | undefined>;
  storage?: PipelineStorage;
  analysisProvider?: AnalysisProvider;
  objectStore?: ObjectStore;
}

/**
 * Wire a pipeline from environment configuration. Without a DATABASE_URL
 * the registry lives in memory for the life of the process.
 */
export function createPipelineFromEnv(overrides: PipelineOverrides = {}): ConversationPipeline {
  if (!overrides.env) {
    loadDotenv();
  }
  const config = getEnvironmentConfig(overrides.env);

  let storage = overrides.storage;
  if (!storage) {
    if (config.database.url) {
      storage = new DatabaseStorage();
    } else {
      pipelineLogger.warn('DATABASE_URL not set; using in-memory storage', { event: 'storage_fallback' });
      storage = new MemStorage();
    }
  }

  let analysisProvider = overrides.analysisProvider;
  if (!analysisProvider) {
    if (!config.analysis.apiKey) {
      throw new Error('OPENAI_API_KEY is required unless an analysis provider is supplied');
    }
    analysisProvider = new OpenAiAnalysisProvider({ apiKey: config.analysis.apiKey, model: config.analysis.model });
  }

  const catalog = config.phraseMatching.catalogPath
    ? loadPhraseCatalog(config.phraseMatching.catalogPath)
    : getDefaultPhraseCatalog();

  pipelineLogger.info('Pipeline configured', {
    event: 'pipeline_configured',
    env: config.env,
    catalogVersion: catalog.version,
    model: config.analysis.model,
    batchConcurrency: config.pipeline.batchConcurrency,
  });

  return new ConversationPipeline({
    objectStore: overrides.objectStore ?? new LocalArtifactStore(config.pipeline.artifactRoot),
    analysisProvider,
    registryStore: storage,
    enrichmentStore: storage,
    auditLog: storage,
    catalog,
    analysisTimeoutMs: config.analysis.timeoutMs,
    snippetMaxChars: config.phraseMatching.snippetMaxChars,
    batchConcurrency: config.pipeline.batchConcurrency,
  });
}
