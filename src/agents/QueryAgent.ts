import type { FastifyBaseLogger } from 'fastify';
import type { CollectionHandle, RetrievedChunk } from '../ingestion/types';
import type { LLMService } from '../services/llm';
import { BaseAgent } from './base/BaseAgent';

export type QueryAnswer = {
  finalAnswer: string;
  sources: Array<{ url: string; distance: number | null }>;
  usageTotalTokens?: number;
};

export const NO_CONTEXT_ANSWER =
  'I could not find anything relevant to that question in the stored documents.';

export function buildQueryPrompt(
  collection: string,
  question: string,
  chunks: RetrievedChunk[]
): string {
  const context = chunks
    .map((c, i) => `[${i + 1}] (${c.url})\n${c.text}`)
    .join('\n\n');
  return `You answer questions using only the documents below, taken from the ${collection} collection.
Cite the documents you use by their number, e.g. [1].
If the documents do not contain the answer, say so.

Documents:
${context}

Question: ${question}

Answer:`;
}

/**
 * Answers a question from the collection: nearest documents first, then one
 * LLM completion over them.
 */
export class QueryAgent extends BaseAgent {
  constructor(
    llm: LLMService,
    logger: FastifyBaseLogger,
    collection: CollectionHandle,
    private readonly topK: number = 5
  ) {
    super(llm, logger, collection, 'query');
  }

  getCapabilities() {
    return ['semantic-search', 'answer-from-collection'];
  }

  async run(question: string): Promise<QueryAnswer> {
    const chunks = await this.collection.query(question, this.topK);
    this.logger.info(
      { collection: this.collection.name, hits: chunks.length },
      'query context retrieved'
    );
    if (chunks.length === 0) {
      return { finalAnswer: NO_CONTEXT_ANSWER, sources: [] };
    }

    const prompt = buildQueryPrompt(this.collection.name, question, chunks);
    const { text, usageTotalTokens } = await this.complete(prompt, 0.2);
    const answer: QueryAnswer = {
      finalAnswer: text.trim(),
      sources: chunks.map(c => ({ url: c.url, distance: c.distance })),
    };
    if (typeof usageTotalTokens === 'number') {
      answer.usageTotalTokens = usageTotalTokens;
    }
    return answer;
  }
}
