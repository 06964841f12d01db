import type { ErrorKind } from '../../shared/schema';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  conversationId?: string;
  stage?: string;
  event?: string;
  duration?: number;
  error?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

function shouldLog(level: LogLevel): boolean {
  const configured = process.env.LOG_LEVEL;
  const threshold = isLogLevel(configured) ? configured : 'info';
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

interface StructuredLogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  context: LogContext;
}

export class StructuredLogger {
  private component: string;
  private static globalContext: Record<string, unknown> = {};

  constructor(component: string) {
    this.component = component;
  }

  static setGlobalContext(ctx: Record<string, unknown>): void {
    StructuredLogger.globalContext = { ...StructuredLogger.globalContext, ...ctx };
  }

  static clearGlobalContext(): void {
    StructuredLogger.globalContext = {};
  }

  formatLog(level: LogLevel, message: string, context: LogContext = {}): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      context: { ...StructuredLogger.globalContext, ...context },
    };

    const contextStr = Object.keys(entry.context).length > 0
      ? ` ${JSON.stringify(entry.context)}`
      : '';

    return `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.component}] ${message}${contextStr}`;
  }

  debug(message: string, context?: LogContext): void {
    if (shouldLog('debug')) {
      console.log(this.formatLog('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (shouldLog('info')) {
      console.info(this.formatLog('info', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (shouldLog('warn')) {
      console.warn(this.formatLog('warn', message, context));
    }
  }

  error(message: string, context?: LogContext): void {
    console.error(this.formatLog('error', message, context));
  }

  stageTransition(conversationId: string, from: string, to: string, context?: LogContext): void {
    this.info(`Conversation state: ${from} -> ${to}`, {
      conversationId,
      event: 'state_transition',
      fromState: from,
      toState: to,
      ...context,
    });
  }

  stageSkipped(context: { conversationId: string; stage: string; status: string }): void {
    this.info(`Stage ${context.stage} already complete, skipping`, { ...context, event: 'stage_skipped' });
  }

  stageFailed(context: { conversationId: string; stage: string; errorKind: ErrorKind; retryable: boolean; error: string }): void {
    this.error(`Stage failed: ${context.stage}`, { ...context, event: 'stage_failed' });
  }

  matchRunCompleted(context: { conversationId: string; matchCount: number; flagCount: number; catalogVersion: string }): void {
    this.info('Phrase match run completed', { ...context, event: 'match_run_completed' });
  }

  providerCall(context: { conversationId: string; model: string; duration: number; success: boolean }): void {
    this.info(`Analysis provider call ${context.success ? 'succeeded' : 'failed'}`, { ...context, event: 'provider_call' });
  }
}

export function createLogger(component: string): StructuredLogger {
  return new StructuredLogger(component);
}

export const pipelineLogger = createLogger('PIPELINE');
export const registryLogger = createLogger('REGISTRY');
export const phraseLogger = createLogger('PHRASE_MATCH');
export const providerLogger = createLogger('ANALYSIS');
