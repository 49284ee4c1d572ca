import axios from 'axios';
import type { FastifyBaseLogger } from 'fastify';
import OpenAI from 'openai';
import type { Env } from '../lib/env';

export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}

// Embedding endpoints reject inputs past their context window; stored text is kept whole.
export function clipForEmbedding(text: string, maxChars: number): string {
  return text.length > maxChars ? text.slice(0, maxChars) : text;
}

export class OpenAIEmbedder implements Embedder {
  private readonly client: OpenAI;

  constructor(
    private readonly logger: FastifyBaseLogger,
    apiKey: string,
    private readonly model: string,
    private readonly maxChars: number
  ) {
    this.client = new OpenAI({ apiKey });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const res = await this.client.embeddings.create({
        model: this.model,
        input: texts.map(t => clipForEmbedding(t, this.maxChars)),
      });
      return [...res.data]
        .sort((a, b) => a.index - b.index)
        .map(d => d.embedding);
    } catch (error) {
      this.logger.error({ err: error, model: this.model }, 'OpenAI embed failed');
      throw error;
    }
  }
}

type OllamaEmbedResponse = { embeddings?: number[][] };

export class OllamaEmbedder implements Embedder {
  constructor(
    private readonly logger: FastifyBaseLogger,
    private readonly baseUrl: string,
    private readonly model: string,
    private readonly maxChars: number
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const res = await axios.post<OllamaEmbedResponse>(
        `${this.baseUrl}/api/embed`,
        {
          model: this.model,
          input: texts.map(t => clipForEmbedding(t, this.maxChars)),
        },
        { headers: { 'content-type': 'application/json' } }
      );
      const embeddings = res.data?.embeddings ?? [];
      if (embeddings.length !== texts.length) {
        throw new Error(
          `expected ${texts.length} embeddings, got ${embeddings.length}`
        );
      }
      return embeddings;
    } catch (error) {
      this.logger.error({ err: error, model: this.model }, 'ollama embed failed');
      throw error;
    }
  }
}

export function createEmbedder(
  logger: FastifyBaseLogger,
  config: Pick<
    Env,
    | 'LLM_PROVIDER'
    | 'OPENAI_API_KEY'
    | 'OPENAI_EMBEDDING_MODEL'
    | 'OLLAMA_BASE'
    | 'OLLAMA_EMBEDDING_MODEL'
    | 'EMBEDDING_MAX_CHARS'
  >
): Embedder {
  switch (config.LLM_PROVIDER) {
    case 'openai':
      if (!config.OPENAI_API_KEY) {
        throw new Error(
          'OPENAI_API_KEY is required when LLM_PROVIDER is set to openai'
        );
      }
      return new OpenAIEmbedder(
        logger,
        config.OPENAI_API_KEY,
        config.OPENAI_EMBEDDING_MODEL,
        config.EMBEDDING_MAX_CHARS
      );

    case 'ollama':
    default:
      return new OllamaEmbedder(
        logger,
        config.OLLAMA_BASE ?? 'http://localhost:11434',
        config.OLLAMA_EMBEDDING_MODEL,
        config.EMBEDDING_MAX_CHARS
      );
  }
}
