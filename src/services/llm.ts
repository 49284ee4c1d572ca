import axios from 'axios';
import type { FastifyBaseLogger } from 'fastify';
import OpenAI from 'openai';
import type { Env } from '../lib/env';

export type LLMUsage = {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
};

export type GenerateOptions = { temperature?: number; maxTokens?: number };

export interface LLMService {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
  generateWithUsage?: (
    prompt: string,
    options?: GenerateOptions
  ) => Promise<{ text: string; usage?: LLMUsage }>;
}

type OllamaGenerateResponse = {
  response?: string;
  prompt_eval_count?: number;
  eval_count?: number;
};

export class OllamaService implements LLMService {
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly logger: FastifyBaseLogger;

  constructor(logger: FastifyBaseLogger, baseUrl?: string, model?: string) {
    this.baseUrl = baseUrl ?? 'http://localhost:11434';
    this.model = model ?? 'llama3';
    this.logger = logger;
  }

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    const { text } = await this.generateWithUsage(prompt, options);
    return text;
  }

  async generateWithUsage(
    prompt: string,
    options?: GenerateOptions
  ): Promise<{ text: string; usage?: LLMUsage }> {
    const body = {
      model: this.model,
      prompt,
      stream: false,
      options: {
        temperature: options?.temperature ?? 0.2,
        num_predict: options?.maxTokens ?? 1024,
      },
    } as const;

    try {
      const res = await axios.post<OllamaGenerateResponse>(
        `${this.baseUrl}/api/generate`,
        body,
        { headers: { 'content-type': 'application/json' } }
      );
      const text = res.data?.response ?? '';
      const promptTokens = res.data?.prompt_eval_count;
      const completionTokens = res.data?.eval_count;
      if (
        typeof promptTokens === 'number' &&
        typeof completionTokens === 'number'
      ) {
        return {
          text,
          usage: {
            promptTokens,
            completionTokens,
            totalTokens: promptTokens + completionTokens,
          },
        };
      }
      return { text };
    } catch (error) {
      this.logger.error({ err: error }, 'ollama generate failed');
      throw error;
    }
  }
}

export class OpenAIService implements LLMService {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly logger: FastifyBaseLogger;

  constructor(logger: FastifyBaseLogger, apiKey?: string, model?: string) {
    if (!apiKey) {
      throw new Error('OpenAI API key is required');
    }
    this.client = new OpenAI({ apiKey });
    this.model = model ?? 'gpt-4o-mini';
    this.logger = logger;
    this.logger.info(`OpenAI service initialized with model: ${this.model}`);
  }

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    const { text } = await this.generateWithUsage(prompt, options);
    return text;
  }

  async generateWithUsage(
    prompt: string,
    options?: GenerateOptions
  ): Promise<{ text: string; usage?: LLMUsage }> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: options?.temperature ?? 0.1,
        max_tokens: options?.maxTokens ?? 1024,
      });

      const text = response.choices[0]?.message?.content ?? '';

      if (response.usage) {
        return {
          text,
          usage: {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens,
          },
        };
      }

      return { text };
    } catch (error) {
      this.logger.error({ err: error }, 'OpenAI generate failed');
      throw error;
    }
  }
}

export function createLLMService(
  logger: FastifyBaseLogger,
  config: Pick<
    Env,
    | 'LLM_PROVIDER'
    | 'OPENAI_API_KEY'
    | 'OPENAI_MODEL'
    | 'OLLAMA_BASE'
    | 'OLLAMA_MODEL'
  >
): LLMService {
  switch (config.LLM_PROVIDER) {
    case 'openai':
      if (!config.OPENAI_API_KEY) {
        throw new Error(
          'OPENAI_API_KEY is required when LLM_PROVIDER is set to openai'
        );
      }
      return new OpenAIService(
        logger,
        config.OPENAI_API_KEY,
        config.OPENAI_MODEL
      );

    case 'ollama':
    default:
      return new OllamaService(logger, config.OLLAMA_BASE, config.OLLAMA_MODEL);
  }
}
