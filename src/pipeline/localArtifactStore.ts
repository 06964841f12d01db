import { readFile } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  conversationMetadataSchema,
  transcriptSchema,
  type ConversationArtifacts,
} from '../../shared/conversation';
import { ValidationError, getErrorMessage } from '../../server/errors';
import { throwIfAborted } from '../services/resilienceUtils';

export const TRANSCRIPT_FILE = 'transcription.json';
export const METADATA_FILE = 'metadata.json';

/**
 * Read-only access to the artifacts recorded for one conversation.
 */
export interface ObjectStore {
  readConversationArtifacts(sourceUri: string, signal?: AbortSignal): Promise<ConversationArtifacts>;
}

/**
 * Reads `<sourceUri>/transcription.json` and `<sourceUri>/metadata.json`
 * from the local filesystem. Relative URIs resolve under `rootDir`.
 */
export class LocalArtifactStore implements ObjectStore {
  constructor(private readonly rootDir: string) {}

  resolveDirectory(sourceUri: string): string {
    const location = sourceUri.startsWith('file://') ? fileURLToPath(sourceUri) : sourceUri;
    return path.resolve(this.rootDir, location);
  }

  async readConversationArtifacts(sourceUri: string, signal?: AbortSignal): Promise<ConversationArtifacts> {
    const directory = this.resolveDirectory(sourceUri);

    const [transcript, metadata] = await Promise.all([
      this.readJson(path.join(directory, TRANSCRIPT_FILE), transcriptSchema, signal),
      this.readJson(path.join(directory, METADATA_FILE), conversationMetadataSchema, signal),
    ]);
    throwIfAborted(signal);

    return { transcript, metadata };
  }

  private async readJson<T>(filePath: string, schema: ZodType<T, ZodTypeDef, unknown>, signal?: AbortSignal): Promise<T> {
    let raw: string;
    try {
      raw = await readFile(filePath, { encoding: 'utf-8', signal });
    } catch (error) {
      throwIfAborted(signal);
      throw new ValidationError(`Cannot read ${filePath}: ${getErrorMessage(error)}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(`Invalid JSON in ${filePath}: ${getErrorMessage(error)}`, { cause: error });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new ValidationError(`Invalid ${path.basename(filePath)}: ${getErrorMessage(parsed.error)}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
