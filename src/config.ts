import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const rootPath = path.join(__dirname, '..');

// Helper for integers passed as env strings
const int = (defaultValue: number) =>
  z.string()
   .default(String(defaultValue))
   .transform(Number)
   .pipe(z.number().int().nonnegative());

// Helper for Boolean
const bool = (defaultValue: string) =>
  z.enum(['true', 'false'])
   .default(defaultValue as 'true' | 'false')
   .transform(val => val === 'true');

// Empty env values count as unset
const optionalString = z.string().optional().transform(val => (val && val.trim() ? val.trim() : undefined));

const resolvePath = (fallback: string) =>
  z.string().optional().transform(val => {
    if (!val) return fallback;
    return path.isAbsolute(val) ? val : path.join(rootPath, val);
  });

// Configuration Schema
const configSchema = z.object({
  // Source platform credentials
  linkedin: z.object({
    email: optionalString,
    password: optionalString,
  }),

  // Model access
  llm: z.object({
    token: optionalString,
    baseUrl: z.string().url().default('http://localhost:11434/v1'),
    model: z.string().default('mistral:7b-instruct-v0.2'),
    temperature: z.string().default('0.3').transform(Number).pipe(z.number().min(0).max(2)),
    maxTokens: int(512),
    topP: z.string().default('0.9').transform(Number).pipe(z.number().min(0).max(1)),
  }),

  // Server
  port: int(3000),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Paths
  paths: z.object({
    root: z.string().default(rootPath),
    data: z.string().default(path.join(rootPath, 'data')),
    logs: resolvePath(path.join(rootPath, 'logs')),
    database: resolvePath(path.join(rootPath, 'data', 'linkedin_posts.db')),
    checkpoint: resolvePath(path.join(rootPath, 'data', 'scraper_checkpoint.json')),
  }),

  // Ingestion defaults (CLI flags override)
  scraper: z.object({
    maxPosts: int(50),
    scrollDelaySeconds: int(2),
    timeoutMs: int(60000),
    batchSize: int(10),
    queryCooldownMs: int(10000),
    loginSettleMs: int(2000),
    searchSettleMs: int(5000),
    feedSettleMs: int(3000),
    expandDelayMs: int(300),
    initialAttempts: int(3),
    initialRetryDelayMs: int(3000),
  }),

  // Analysis defaults
  analysis: z.object({
    batchSize: int(10),
    recordDelayMs: int(500),
    batchDelayMs: int(1000),
  }),

  // Browser Controls
  browser: z.object({
    headless: bool('false'),
    slowMo: int(0),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

// Validate Environment
const rawConfig = {
  linkedin: {
    email: process.env.LINKEDIN_EMAIL,
    password: process.env.LINKEDIN_PASSWORD,
  },

  llm: {
    token: process.env.HF_TOKEN,
    baseUrl: process.env.LLM_BASE_URL || undefined,
    model: process.env.LLM_MODEL || undefined,
    temperature: process.env.LLM_TEMPERATURE || undefined,
    maxTokens: process.env.LLM_MAX_TOKENS || undefined,
    topP: process.env.LLM_TOP_P || undefined,
  },

  port: process.env.PORT || undefined,
  logLevel: process.env.LOG_LEVEL || undefined,

  paths: {
    logs: process.env.LOGS_DIR,
    database: process.env.DATABASE_PATH,
    checkpoint: process.env.CHECKPOINT_PATH,
  },

  scraper: {
    queryCooldownMs: process.env.QUERY_COOLDOWN_MS || undefined,
  },

  analysis: {},

  browser: {
    headless: process.env.HEADLESS || undefined,
    slowMo: process.env.SLOWMO || undefined,
  },
};

const parsed = configSchema.safeParse(rawConfig);

if (!parsed.success) {
  console.error('❌ Invalid Configuration:', JSON.stringify(parsed.error.format(), null, 2));
  process.exit(1);
}

export const config: AppConfig = parsed.data;
