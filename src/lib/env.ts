import { z } from 'zod';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback)
    .transform(v => v === 'true' || v === '1');

const envSchema = z.object({
  CHROMA_HOST: z.string().min(1).default('localhost'),
  CHROMA_PORT: z.coerce.number().int().positive().default(8000),
  CHROMA_SSL: booleanFlag('false'),
  CHROMA_API_KEY: z.string().optional(),
  CHROMA_TENANT: z.string().optional(),
  CHROMA_DATABASE: z.string().optional(),
  RAGME_COLLECTION: z.string().min(1).default('RagMeDocs'),
  DUPLICATE_POLICY: z.enum(['append', 'replace']).default('append'),
  BATCH_SIZE: z.coerce.number().int().positive().default(100),
  READER_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  READER_HTML_TO_TEXT: booleanFlag('true'),
  LLM_PROVIDER: z.enum(['ollama', 'openai']).default('openai'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  OLLAMA_BASE: z.string().optional(),
  OLLAMA_MODEL: z.string().optional(),
  OLLAMA_EMBEDDING_MODEL: z.string().default('nomic-embed-text'),
  EMBEDDING_MAX_CHARS: z.coerce.number().int().positive().default(8000),
  QUERY_TOP_K: z.coerce.number().int().positive().default(5),
  AGENT_MAX_STEPS: z.coerce.number().int().positive().default(5),
  PORT: z.coerce.number().int().positive().default(4000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

export const env = parseEnv(process.env);
