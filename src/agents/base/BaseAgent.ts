import type { FastifyBaseLogger } from 'fastify';
import type { CollectionHandle } from '../../ingestion/types';
import type { LLMService } from '../../services/llm';
import type { AgentOutput } from './AgentTypes';

export abstract class BaseAgent {
  protected readonly llm: LLMService;
  protected readonly logger: FastifyBaseLogger;
  protected readonly collection: CollectionHandle;
  protected agentName: string;

  constructor(
    llm: LLMService,
    logger: FastifyBaseLogger,
    collection: CollectionHandle,
    agentName: string
  ) {
    this.llm = llm;
    this.logger = logger.child({ agent: agentName });
    this.collection = collection;
    this.agentName = agentName;
  }

  abstract getCapabilities(): string[];

  // Runs the prompt and keeps the token count when the provider reports one.
  protected async complete(
    prompt: string,
    temperature: number
  ): Promise<{ text: string; usageTotalTokens?: number }> {
    if (this.llm.generateWithUsage) {
      const { text, usage } = await this.llm.generateWithUsage(prompt, {
        temperature,
      });
      return typeof usage?.totalTokens === 'number'
        ? { text, usageTotalTokens: usage.totalTokens }
        : { text };
    }
    return { text: await this.llm.generate(prompt, { temperature }) };
  }

  protected errorOutput(reason: string, error: unknown): AgentOutput {
    return {
      reply:
        "I'm sorry, I encountered an error while processing your request. Please try again.",
      actions: [
        {
          type: 'error',
          status: 'failed',
          payload: {
            reason,
            details: error instanceof Error ? error.message : String(error),
          },
        },
      ],
    };
  }
}
