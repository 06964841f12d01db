import { z } from 'zod';

export type Environment = 'development' | 'production';

const sharedEnvSchema = z.object({
  APP_ENV: z.enum(['development', 'production']).default('development'),
  ANALYSIS_MODEL: z.string().min(1).default('gpt-4o-mini'),
  ANALYSIS_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  SNIPPET_MAX_CHARS: z.coerce.number().int().min(20).default(200),
  BATCH_CONCURRENCY: z.coerce.number().int().min(1).default(5),
  ARTIFACT_ROOT: z.string().min(1).default('./data'),
  PHRASE_CATALOG_PATH: z.string().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

const devEnvSchema = sharedEnvSchema.extend({
  DATABASE_URL: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
});

const prodEnvSchema = sharedEnvSchema.extend({
  DATABASE_URL: z.string().min(1),
  OPENAI_API_KEY: z.string().min(1),
});

export interface EnvironmentConfig {
  env: Environment;
  isDevelopment: boolean;
  isProduction: boolean;
  database: {
    url: string | undefined;
  };
  analysis: {
    apiKey: string | undefined;
    model: string;
    timeoutMs: number;
  };
  phraseMatching: {
    snippetMaxChars: number;
    catalogPath: string | undefined;
  };
  pipeline: {
    artifactRoot: string;
    batchConcurrency: number;
  };
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

let cachedConfig: EnvironmentConfig | null = null;

export function getEnvironmentConfig(
  envSource: Record<string, string | undefined> = process.env,
): EnvironmentConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const appEnv: Environment = envSource.APP_ENV === 'production' ? 'production' : 'development';
  const isProduction = appEnv === 'production';

  const schema = isProduction ? prodEnvSchema : devEnvSchema;
  const parsed = schema.safeParse(envSource);

  if (!parsed.success) {
    const errors = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
    console.error(`[ENV] ${appEnv} configuration validation failed:`);
    errors.forEach(err => console.error(`  - ${err}`));
    throw new Error(`Environment configuration invalid: ${errors.join(', ')}`);
  }

  const env = parsed.data;

  cachedConfig = {
    env: appEnv,
    isDevelopment: !isProduction,
    isProduction,
    database: {
      url: env.DATABASE_URL,
    },
    analysis: {
      apiKey: env.OPENAI_API_KEY,
      model: env.ANALYSIS_MODEL,
      timeoutMs: env.ANALYSIS_TIMEOUT_MS,
    },
    phraseMatching: {
      snippetMaxChars: env.SNIPPET_MAX_CHARS,
      catalogPath: env.PHRASE_CATALOG_PATH,
    },
    pipeline: {
      artifactRoot: env.ARTIFACT_ROOT,
      batchConcurrency: env.BATCH_CONCURRENCY,
    },
    logLevel: env.LOG_LEVEL,
  };

  return cachedConfig;
}

export function resetEnvironmentConfig(): void {
  cachedConfig = null;
}
