/**
 * Custom error classes for structured error handling in the conversation pipeline
 */

import { ZodError } from 'zod';
import type { ConversationStatus, ErrorKind } from '../shared/schema';

export type PipelineErrorKind = Exclude<ErrorKind, 'cancelled'>;

interface PipelineErrorOptions {
  conversationId?: string;
  cause?: unknown;
}

/**
 * Base class for every error the pipeline surfaces to its caller.
 * `kind` decides the FAILED_* routing and `retryable` tells the caller
 * whether re-invoking the same operation can succeed.
 */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly retryable: boolean;
  readonly conversationId?: string;

  constructor(kind: PipelineErrorKind, retryable: boolean, message: string, options: PipelineErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'PipelineError';
    this.kind = kind;
    this.retryable = retryable;
    this.conversationId = options.conversationId;
    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Malformed transcript or metadata. Not retryable, routes to FAILED_INGEST.
 */
export class ValidationError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('validation', false, message, options);
    this.name = 'ValidationError';
  }
}

/**
 * Analysis provider failure, including timeouts. Retryable, routes to FAILED_ENRICH.
 */
export class ProviderError extends PipelineError {
  readonly timedOut: boolean;

  constructor(message: string, options: PipelineErrorOptions & { timedOut?: boolean } = {}) {
    super('provider', true, message, options);
    this.name = 'ProviderError';
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * Registry or enrichment store failure. Retryable: the caller re-runs the whole stage.
 */
export class StorageError extends PipelineError {
  readonly operation: string;

  constructor(operation: string, message: string, options?: PipelineErrorOptions) {
    super('storage', true, `${operation} failed: ${message}`, options);
    this.name = 'StorageError';
    this.operation = operation;
  }
}

/**
 * Operation called in the wrong state (e.g. enrich before ingest). Caller error.
 */
export class PreconditionError extends PipelineError {
  readonly currentStatus?: ConversationStatus;

  constructor(message: string, options: PipelineErrorOptions & { currentStatus?: ConversationStatus } = {}) {
    super('precondition', false, message, options);
    this.name = 'PreconditionError';
    this.currentStatus = options.currentStatus;
  }
}

export class InvalidTransitionError extends PreconditionError {
  readonly from: ConversationStatus;
  readonly to: ConversationStatus;

  constructor(from: ConversationStatus, to: ConversationStatus, allowed: readonly ConversationStatus[], conversationId?: string) {
    super(
      `Invalid transition: ${from} → ${to}. Allowed: ${allowed.length > 0 ? allowed.join(', ') : 'none'}`,
      { conversationId, currentStatus: from },
    );
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * Type guard to check if error is a PipelineError
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function isRetryableError(error: unknown): boolean {
  return isPipelineError(error) && error.retryable;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Map an arbitrary collaborator error onto the pipeline's error kinds.
 * PipelineErrors pass through, zod failures become ValidationErrors and
 * anything else takes the fallback kind of the stage that raised it.
 */
export function classifyError(
  error: unknown,
  fallback: 'validation' | 'provider' | 'storage',
  conversationId?: string,
): PipelineError {
  if (isPipelineError(error)) {
    return error;
  }

  const message = getErrorMessage(error);
  if (error instanceof ZodError) {
    return new ValidationError(message, { conversationId, cause: error });
  }

  switch (fallback) {
    case 'validation':
      return new ValidationError(message, { conversationId, cause: error });
    case 'provider':
      return new ProviderError(message, { conversationId, cause: error });
    case 'storage':
      return new StorageError('storage', message, { conversationId, cause: error });
  }
}
