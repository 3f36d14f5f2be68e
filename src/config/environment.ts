import { z } from 'zod';
import { config } from 'dotenv';
import fs from 'fs';

// Load environment variables based on NODE_ENV
const nodeEnv = process.env.NODE_ENV || 'development';

if (nodeEnv === 'production') {
  // In production the deployment sets the variables; a local file is optional
  if (fs.existsSync('.env.production')) {
    config({ path: '.env.production' });
  }
} else if (nodeEnv === 'development') {
  if (fs.existsSync('.env.local')) {
    config({ path: '.env.local' });
  }
  if (fs.existsSync('.env')) {
    config({ path: '.env' });
  }
} else {
  if (fs.existsSync(`.env.${nodeEnv}`)) {
    config({ path: `.env.${nodeEnv}` });
  }
  if (fs.existsSync('.env')) {
    config({ path: '.env' });
  }
}

const intVar = (fallback: number) =>
  z
    .string()
    .optional()
    .default(String(fallback))
    .transform((v) => {
      const n = parseInt(v, 10);
      return Number.isNaN(n) ? fallback : n;
    });

const boolVar = (fallback: boolean) =>
  z
    .string()
    .optional()
    .default(String(fallback))
    .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  // 'test' keeps Jest runs from failing validation
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).optional().default('development'),
  PORT: intVar(8080),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional().default('info'),

  // AI Provider Configuration
  TEXT_PROVIDER: z.enum(['openai', 'google-genai']).optional().default('google-genai'),
  IMAGE_PROVIDER: z.enum(['google-genai']).optional().default('google-genai'),
  DRIFT_PROVIDER: z.enum(['openai', 'google-genai']).optional(),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_TEXT_MODEL: z.string().optional().default('gpt-4.1-mini'),

  GOOGLE_GENAI_API_KEY: z.string().optional(),
  GOOGLE_GENAI_MODEL: z.string().optional().default('gemini-2.5-flash'),
  GOOGLE_GENAI_IMAGE_MODEL: z.string().optional().default('gemini-2.5-flash-image'),
  GOOGLE_GENAI_DRIFT_MODEL: z.string().optional(),

  // Artifact storage
  ARTIFACT_STORE: z.enum(['local', 'gcs', 'memory']).optional().default('local'),
  STORIES_DIR: z.string().optional().default('stories'),
  GOOGLE_CLOUD_PROJECT_ID: z.string().optional(),
  STORAGE_BUCKET_NAME: z.string().optional(),

  // Snapshot persistence
  SNAPSHOT_STORE: z.enum(['memory', 'postgres']).optional().default('memory'),
  DB_HOST: z.string().optional(),
  DB_PORT: intVar(5432),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  WORKFLOWS_DB: z.string().optional(),

  // Workflow bounds
  MIN_PAGE_COUNT: intVar(1),
  MAX_PAGE_COUNT: intVar(50),
  DEFAULT_PAGE_COUNT: intVar(8),
  MAX_WORDS_PER_PAGE: intVar(120),
  DEFAULT_ART_STYLE: z.string().optional().default('watercolor'),
  CHARACTER_LOCK_RETRIES: intVar(2),
  PAGE_ATTEMPT_BUDGET: intVar(3),
  RENDER_CONCURRENCY: intVar(3),
  QA_CONCURRENCY: intVar(3),
  PAGE_CONTINUITY: boolVar(false),
  RUN_TIMEOUT_MINUTES: intVar(20),
  IMAGE_RETRY_DELAY_MS: intVar(1500),
  MAX_REFERENCE_IMAGES: intVar(10),

  // Output
  IMAGE_ASPECT_RATIO: z.enum(['1:1', '2:3', '3:4', '4:3', '9:16', '16:9']).optional().default('3:4'),
  PDF_ORIENTATION: z.enum(['portrait', 'landscape']).optional().default('portrait'),
});

export type Environment = z.infer<typeof envSchema>;

let cachedEnv: Environment | null = null;

export function getEnvironment(): Environment {
  if (cachedEnv) {
    return cachedEnv;
  }

  try {
    cachedEnv = envSchema.parse(process.env);
    return cachedEnv;
  } catch (error) {
    console.error('Environment validation failed:', error);
    throw error;
  }
}

// Test-only helper to drop the cached environment between tests
export function resetEnvironmentForTests(): void {
  cachedEnv = null;
}

export function validateEnvironment(): void {
  try {
    const env = getEnvironment();
    console.log('✅ Environment variables validated successfully');
    console.log(`📍 Running in ${env.NODE_ENV} mode`);
    console.log(`🔌 Server will start on port ${env.PORT}`);
    console.log(`🧠 Text Provider: ${env.TEXT_PROVIDER}`);
    console.log(`🎨 Image Provider: ${env.IMAGE_PROVIDER} (${env.GOOGLE_GENAI_IMAGE_MODEL})`);
    console.log(`📦 Artifact Store: ${env.ARTIFACT_STORE}`);
    console.log(`💾 Snapshot Store: ${env.SNAPSHOT_STORE}`);
  } catch (error) {
    console.error('❌ Environment validation failed');
    throw error;
  }
}

export const databaseConfig = {
  get: () => {
    const env = getEnvironment();
    return {
      host: env.DB_HOST,
      port: env.DB_PORT,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      database: env.WORKFLOWS_DB,
      ssl: false,
    };
  },
};

export const storageConfig = {
  get: () => {
    const env = getEnvironment();
    return {
      kind: env.ARTIFACT_STORE,
      storiesDir: env.STORIES_DIR,
      projectId: env.GOOGLE_CLOUD_PROJECT_ID,
      bucketName: env.STORAGE_BUCKET_NAME,
    };
  },
};
