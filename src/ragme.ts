import { QueryAgent, type QueryAnswer } from './agents/QueryAgent';
import { RagMeAgent } from './agents/RagMeAgent';
import type { AgentOutput } from './agents/base/AgentTypes';
import { buildRagMeTools, type RagMeOperations } from './agents/tools/ragme';
import type { RagMeContext } from './context';
import { writeAll } from './ingestion/batchWriter';
import { shapePageRecord } from './ingestion/shape';
import type {
  CollectionHandle,
  IngestionResult,
  StoredDocument,
  VectorStoreClient,
} from './ingestion/types';

export const DEFAULT_COLLECTION = 'RagMeDocs';

const COLLECTION_DESCRIPTION =
  'A dataset with the contents of web pages added to RagMe';

export type RagMeOptions = {
  collectionName?: string;
  queryTopK?: number;
  agentMaxSteps?: number;
};

export class RagMe implements RagMeOperations {
  readonly collectionName: string;
  readonly queryAgent: QueryAgent;
  readonly ragmeAgent: RagMeAgent;

  private constructor(
    private readonly context: RagMeContext,
    private readonly collection: CollectionHandle,
    options: RagMeOptions
  ) {
    this.collectionName = collection.name;
    const logger = context.logger;
    this.queryAgent = new QueryAgent(
      context.llm,
      logger,
      collection,
      options.queryTopK
    );
    this.ragmeAgent = new RagMeAgent(
      context.llm,
      logger,
      collection,
      buildRagMeTools(this, logger),
      options.agentMaxSteps
    );
  }

  /**
   * Opens the context, makes sure the collection exists (it is only created
   * when missing) and builds both agents against it.
   */
  static async create(
    context: RagMeContext,
    options: RagMeOptions = {}
  ): Promise<RagMe> {
    const name = options.collectionName ?? DEFAULT_COLLECTION;
    await context.open();
    if (!(await context.store.collectionExists(name))) {
      context.logger.info({ collection: name }, 'creating collection');
      await context.store.createCollection(name, COLLECTION_DESCRIPTION);
    }
    const collection = await context.store.getCollection(name);
    return new RagMe(context, collection, options);
  }

  get store(): VectorStoreClient {
    return this.context.store;
  }

  async writeWebpagesToVectorStore(urls: string[]): Promise<IngestionResult> {
    const pages = await this.context.reader.load(urls);
    const records = pages.map(shapePageRecord);
    const written = await writeAll(this.collection, records);
    this.context.logger.info(
      { collection: this.collectionName, requested: urls.length, written },
      'web pages written'
    );
    return { urls, written };
  }

  async listDocuments(limit = 10, offset = 0): Promise<StoredDocument[]> {
    return this.collection.fetchObjects(limit, offset);
  }

  async clearCollection(): Promise<number> {
    return this.collection.deleteAll();
  }

  async query(question: string): Promise<QueryAnswer> {
    return this.queryAgent.run(question);
  }

  async run(message: string, sessionId?: string): Promise<AgentOutput> {
    return this.ragmeAgent.process(
      sessionId === undefined ? { message } : { message, sessionId }
    );
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}
