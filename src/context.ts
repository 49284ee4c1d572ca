import type { FastifyBaseLogger } from 'fastify';
import { ChromaService } from './lib/chroma';
import type { Env } from './lib/env';
import { VectorStoreError } from './lib/errors';
import type { PageReader, VectorStoreClient } from './ingestion/types';
import { WebPageReader } from './ingestion/webReader';
import { createEmbedder } from './services/embeddings';
import { createLLMService, type LLMService } from './services/llm';

export type RagMeContextParts = {
  store: VectorStoreClient;
  reader: PageReader;
  llm: LLMService;
  logger: FastifyBaseLogger;
};

/**
 * The external clients RagMe talks to. Built once by the entry point and
 * handed to `RagMe.create`; nothing here is a module-level singleton.
 */
export class RagMeContext {
  readonly store: VectorStoreClient;
  readonly reader: PageReader;
  readonly llm: LLMService;
  readonly logger: FastifyBaseLogger;
  private opened = false;

  constructor(parts: RagMeContextParts) {
    this.store = parts.store;
    this.reader = parts.reader;
    this.llm = parts.llm;
    this.logger = parts.logger;
  }

  static fromEnv(config: Env, logger: FastifyBaseLogger): RagMeContext {
    const embedder = createEmbedder(logger, config);
    const store = new ChromaService(
      {
        host: config.CHROMA_HOST,
        port: config.CHROMA_PORT,
        ssl: config.CHROMA_SSL,
        apiKey: config.CHROMA_API_KEY,
        tenant: config.CHROMA_TENANT,
        database: config.CHROMA_DATABASE,
      },
      embedder,
      logger,
      {
        batchSize: config.BATCH_SIZE,
        duplicatePolicy: config.DUPLICATE_POLICY,
      }
    );
    const reader = new WebPageReader(logger, {
      htmlToText: config.READER_HTML_TO_TEXT,
      timeoutMs: config.READER_TIMEOUT_MS,
    });
    return new RagMeContext({
      store,
      reader,
      llm: createLLMService(logger, config),
      logger,
    });
  }

  get isOpen(): boolean {
    return this.opened;
  }

  async open(): Promise<void> {
    if (this.opened) return;
    const status = await this.store.ping();
    if (!status.connected) {
      this.logger.error(status.message);
      throw new VectorStoreError(status.message);
    }
    this.logger.info(status.message);
    this.opened = true;
  }

  async close(): Promise<void> {
    if (!this.opened) return;
    this.opened = false;
    await this.store.close();
  }
}
