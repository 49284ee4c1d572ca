import { describe, it, expect, vi, beforeEach } from 'vitest';
import { parseEnv } from '../src/lib/env';
import {
  OllamaService,
  OpenAIService,
  createLLMService,
} from '../src/services/llm';
import { silentLogger } from './utils';

const http = vi.hoisted(() => ({
  posts: [] as Array<{ url: string; body: unknown }>,
  reply: {} as unknown,
}));

vi.mock('axios', () => ({
  default: {
    post: async (url: string, body: unknown) => {
      http.posts.push({ url, body });
      return { data: http.reply };
    },
  },
}));

beforeEach(() => {
  http.posts.length = 0;
  http.reply = {};
});

describe('LLM Service Factory', () => {
  const logger = silentLogger();

  it('should create OllamaService when LLM_PROVIDER is ollama', () => {
    const service = createLLMService(
      logger,
      parseEnv({ LLM_PROVIDER: 'ollama' })
    );
    expect(service).toBeInstanceOf(OllamaService);
  });

  it('should create OpenAIService when LLM_PROVIDER is openai and API key is provided', () => {
    const service = createLLMService(
      logger,
      parseEnv({ LLM_PROVIDER: 'openai', OPENAI_API_KEY: 'test-key' })
    );
    expect(service).toBeInstanceOf(OpenAIService);
  });

  it('should throw error when LLM_PROVIDER is openai but API key is missing', () => {
    expect(() =>
      createLLMService(logger, parseEnv({ LLM_PROVIDER: 'openai' }))
    ).toThrow('OPENAI_API_KEY is required when LLM_PROVIDER is set to openai');
  });
});

describe('OpenAI Service', () => {
  it('should throw error when API key is missing or empty', () => {
    const logger = silentLogger();
    expect(() => new OpenAIService(logger, undefined)).toThrow(
      'OpenAI API key is required'
    );
    expect(() => new OpenAIService(logger, '')).toThrow(
      'OpenAI API key is required'
    );
  });
});

describe('Ollama Service', () => {
  it('should report token usage from the eval counts', async () => {
    http.reply = { response: 'Hello', prompt_eval_count: 12, eval_count: 5 };
    const service = new OllamaService(silentLogger(), 'http://ollama.test', 'llama3');

    const result = await service.generateWithUsage('Hi there', {
      temperature: 0.5,
    });

    expect(result).toEqual({
      text: 'Hello',
      usage: { promptTokens: 12, completionTokens: 5, totalTokens: 17 },
    });
    expect(http.posts).toEqual([
      {
        url: 'http://ollama.test/api/generate',
        body: {
          model: 'llama3',
          prompt: 'Hi there',
          stream: false,
          options: { temperature: 0.5, num_predict: 1024 },
        },
      },
    ]);
  });

  it('should omit usage when the counts are missing', async () => {
    http.reply = { response: 'Hello' };
    const service = new OllamaService(silentLogger());

    expect(await service.generateWithUsage('Hi')).toEqual({ text: 'Hello' });
    expect(await service.generate('Hi')).toBe('Hello');
    expect(http.posts[0]?.url).toBe('http://localhost:11434/api/generate');
  });
});
