import { z } from 'zod';
import { config } from 'dotenv';
import fs from 'fs';

// Load environment variables based on NODE_ENV
const nodeEnv = process.env.NODE_ENV || 'development';

// Load environment files only if they exist; deployed environments inject variables directly
if (nodeEnv === 'production') {
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

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  PORT: z.string().default('8080').transform(Number),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional().default('info'),

  // Remote table store (PostgreSQL)
  DB_HOST: z.string(),
  DB_PORT: z.string().default('5432').transform(Number),
  DB_USER: z.string(),
  DB_PASSWORD: z.string(),
  DB_NAME: z.string(),
  DB_SSL: z
    .string()
    .optional()
    .default('false')
    .transform((v) => v === 'true' || v === '1'),

  // Text generation providers; any subset may be configured
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  GOOGLE_GENAI_API_KEY: z.string().optional(),
  DEFAULT_TEXT_MODEL: z.string().optional().default('gpt-4o-mini'),

  // Shared secret for the HTTP API (x-api-key header)
  CONTENT_WORKFLOW_API_KEY: z.string().optional(),
});

export type Environment = z.infer<typeof envSchema>;

export const environmentKeys = Object.keys(envSchema.shape);

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

// Test-only helper so suites can change process.env between cases
export function resetEnvironmentForTests(): void {
  cachedEnv = null;
}

export const databaseConfig = {
  get: () => {
    const env = getEnvironment();
    return {
      host: env.DB_HOST,
      port: env.DB_PORT,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      database: env.DB_NAME,
      ssl: env.DB_SSL,
    };
  },
};

export const aiProviderConfig = {
  get: () => {
    const env = getEnvironment();
    return {
      defaultModel: env.DEFAULT_TEXT_MODEL,
      credentials: {
        ...(env.OPENAI_API_KEY ? { openaiApiKey: env.OPENAI_API_KEY } : {}),
        ...(env.ANTHROPIC_API_KEY ? { anthropicApiKey: env.ANTHROPIC_API_KEY } : {}),
        ...(env.GOOGLE_GENAI_API_KEY ? { googleGenAIApiKey: env.GOOGLE_GENAI_API_KEY } : {}),
      },
    };
  },
};
