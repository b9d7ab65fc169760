import path from 'node:path';
import { z } from 'zod';

const DATA_DIR = path.resolve(__dirname, '..', 'data');

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
const OPENROUTER_MODEL = 'mistralai/mistral-small-3.2-24b-instruct:free';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const positiveInt = (fallback: number) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() ? Number.parseInt(value, 10) : undefined),
    z.number().int().positive().catch(fallback).default(fallback),
  );

const configSchema = z.object({
  OPENAI_API_KEY: z
    .string({ required_error: 'LLM API key not configured. Set OPENAI_API_KEY to your provider token.' })
    .trim()
    .min(1, 'LLM API key not configured. Set OPENAI_API_KEY to your provider token.'),
  PORT: positiveInt(3000),
  LLM_BASE_URL: z.string().url().default(OPENROUTER_BASE_URL),
  LLM_MODEL: z.string().min(1).default(OPENROUTER_MODEL),
  OLLAMA_EMBED_URL: z.string().url().default('http://127.0.0.1:11434'),
  OLLAMA_EMBED_MODEL: z.string().min(1).default('nomic-embed-text'),
  EMBED_MAX_ATTEMPTS: positiveInt(3),
  QUESTION_BANK_PATH: z.string().default(path.join(DATA_DIR, 'question_bank.json')),
  SKILL_TAXONOMY_PATH: z.string().default(path.join(DATA_DIR, 'skill_taxonomy.json')),
  AUDIT_LOG_PATH: z.string().default('audit_log.jsonl'),
  UPLOAD_DIR: z.string().default(path.resolve('.data', 'files')),
});

export type AppConfig = {
  port: number;
  llm: {
    apiKey: string;
    baseUrl: string;
    model: string;
  };
  embeddings: {
    baseUrl: string;
    model: string;
    maxAttempts: number;
  };
  questionBankPath: string;
  skillTaxonomyPath: string;
  auditLogPath: string;
  uploadDir: string;
};

const blankToUndefined = (env: Record<string, string | undefined>): Record<string, string | undefined> =>
  Object.fromEntries(
    Object.entries(env).map(([key, value]) => [key, value && value.trim() ? value : undefined]),
  );

/**
 * Reads the service configuration from the environment. A missing model
 * credential is fatal and throws a ConfigError.
 */
export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  const parsed = configSchema.safeParse(blankToUndefined(env));

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration. ${detail}`);
  }

  const values = parsed.data;

  return {
    port: values.PORT,
    llm: {
      apiKey: values.OPENAI_API_KEY,
      baseUrl: values.LLM_BASE_URL,
      model: values.LLM_MODEL,
    },
    embeddings: {
      baseUrl: values.OLLAMA_EMBED_URL,
      model: values.OLLAMA_EMBED_MODEL,
      maxAttempts: values.EMBED_MAX_ATTEMPTS,
    },
    questionBankPath: values.QUESTION_BANK_PATH,
    skillTaxonomyPath: values.SKILL_TAXONOMY_PATH,
    auditLogPath: values.AUDIT_LOG_PATH,
    uploadDir: values.UPLOAD_DIR,
  };
};
