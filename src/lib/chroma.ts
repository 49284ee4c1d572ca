import { createHash } from 'crypto';
import { ChromaClient, type Collection } from 'chromadb';
import type { FastifyBaseLogger } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import type {
  BatchScope,
  CollectionHandle,
  DuplicatePolicy,
  RetrievedChunk,
  StorageRecord,
  StoredDocument,
  VectorStoreClient,
} from '../ingestion/types';
import type { Embedder } from '../services/embeddings';
import { VectorStoreError, WriteError, errorMessage } from './errors';

export type ChromaConnection = {
  host: string;
  port: number;
  ssl: boolean;
  apiKey?: string;
  tenant?: string;
  database?: string;
};

export type ChromaWriteOptions = {
  batchSize: number;
  duplicatePolicy: DuplicatePolicy;
};

const LIST_PAGE_SIZE = 100;

export function recordId(record: StorageRecord, policy: DuplicatePolicy) {
  if (policy === 'replace') {
    return createHash('sha256').update(record.url).digest('hex');
  }
  return uuidv4();
}

function readString(
  metadata: Record<string, unknown> | null | undefined,
  key: string
): string {
  const value = metadata?.[key];
  return typeof value === 'string' ? value : '';
}

export class ChromaBatch implements BatchScope {
  private pending = new Map<string, StorageRecord>();
  private closed = false;

  constructor(
    private readonly collection: Collection,
    private readonly embedder: Embedder,
    private readonly logger: FastifyBaseLogger,
    private readonly options: ChromaWriteOptions
  ) {}

  async add(record: StorageRecord): Promise<void> {
    if (this.closed) {
      throw new WriteError(`Batch on ${this.collection.name} is closed`);
    }
    this.pending.set(recordId(record, this.options.duplicatePolicy), record);
    if (this.pending.size >= this.options.batchSize) {
      await this.flush();
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.flush();
  }

  private async flush(): Promise<void> {
    if (this.pending.size === 0) return;
    const entries = [...this.pending.entries()];
    this.pending = new Map();

    const ids = entries.map(([id]) => id);
    const documents = entries.map(([, r]) => r.text);
    // Embedding endpoints reject empty strings; the stored document stays empty.
    const inputs = documents.map(text => (text === '' ? ' ' : text));
    const metadatas = entries.map(([, r]) => ({
      url: r.url,
      metadata: r.metadata,
    }));

    try {
      const embeddings = await this.embedder.embed(inputs);
      const payload = { ids, embeddings, documents, metadatas };
      if (this.options.duplicatePolicy === 'replace') {
        await this.collection.upsert(payload);
      } else {
        await this.collection.add(payload);
      }
      this.logger.info(
        { collection: this.collection.name, count: ids.length },
        'chroma batch flushed'
      );
    } catch (error) {
      this.logger.error(
        { collection: this.collection.name, err: error },
        'chroma batch flush failed'
      );
      throw new WriteError(
        `Document addition failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}

export class ChromaCollection implements CollectionHandle {
  constructor(
    private readonly collection: Collection,
    private readonly embedder: Embedder,
    private readonly logger: FastifyBaseLogger,
    private readonly options: ChromaWriteOptions
  ) {}

  get name(): string {
    return this.collection.name;
  }

  openBatch(): BatchScope {
    return new ChromaBatch(
      this.collection,
      this.embedder,
      this.logger,
      this.options
    );
  }

  async fetchObjects(limit: number, offset: number): Promise<StoredDocument[]> {
    try {
      const res = await this.collection.get({ limit, offset });
      return res.ids.map((id, i) => {
        const metadata = res.metadatas[i];
        return {
          id,
          url: readString(metadata, 'url'),
          text: res.documents[i] ?? '',
          metadata: readString(metadata, 'metadata'),
        };
      });
    } catch (error) {
      throw new VectorStoreError(`Listing failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async query(text: string, topK: number): Promise<RetrievedChunk[]> {
    try {
      const [queryEmbedding] = await this.embedder.embed([text]);
      if (!queryEmbedding) return [];
      const res = await this.collection.query({
        queryEmbeddings: [queryEmbedding],
        nResults: topK,
      });
      const ids = res.ids[0] ?? [];
      const documents = res.documents[0] ?? [];
      const metadatas = res.metadatas[0] ?? [];
      const distances = res.distances?.[0] ?? [];
      return ids.map((id, i) => {
        const metadata = metadatas[i];
        const distance = distances[i];
        return {
          id,
          url: readString(metadata, 'url'),
          text: documents[i] ?? '',
          metadata: readString(metadata, 'metadata'),
          distance: typeof distance === 'number' ? distance : null,
        };
      });
    } catch (error) {
      throw new VectorStoreError(`Query failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async deleteAll(): Promise<number> {
    try {
      const { ids } = await this.collection.get({ include: [] });
      if (ids.length > 0) {
        await this.collection.delete({ ids });
      }
      this.logger.info(
        { collection: this.collection.name, deleted: ids.length },
        'chroma collection cleared'
      );
      return ids.length;
    } catch (error) {
      throw new VectorStoreError(`Deletion failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async count(): Promise<number> {
    return this.collection.count();
  }
}

export class ChromaService implements VectorStoreClient {
  private readonly client: ChromaClient;

  constructor(
    connection: ChromaConnection,
    private readonly embedder: Embedder,
    private readonly logger: FastifyBaseLogger,
    private readonly writeOptions: ChromaWriteOptions
  ) {
    this.client = new ChromaClient({
      host: connection.host,
      port: connection.port,
      ssl: connection.ssl,
      ...(connection.tenant ? { tenant: connection.tenant } : {}),
      ...(connection.database ? { database: connection.database } : {}),
      ...(connection.apiKey
        ? { headers: { 'x-chroma-token': connection.apiKey } }
        : {}),
    });
  }

  async ping(): Promise<{ connected: boolean; message: string }> {
    try {
      await this.client.heartbeat();
      return {
        connected: true,
        message: 'Chroma connected',
      };
    } catch (error) {
      return {
        connected: false,
        message: `Chroma connection failed: ${errorMessage(error)}`,
      };
    }
  }

  async collectionExists(name: string): Promise<boolean> {
    try {
      for (let offset = 0; ; offset += LIST_PAGE_SIZE) {
        const page = await this.client.listCollections({
          limit: LIST_PAGE_SIZE,
          offset,
        });
        if (page.some(c => c.name === name)) return true;
        if (page.length < LIST_PAGE_SIZE) return false;
      }
    } catch (error) {
      throw new VectorStoreError(
        `Collection lookup failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async createCollection(name: string, description?: string): Promise<void> {
    try {
      await this.client.createCollection({
        name,
        // Vectors always come from our own embedder.
        embeddingFunction: null,
        metadata: {
          description: description ?? `Collection for ${name}`,
        },
      });
      this.logger.info({ collection: name }, 'chroma collection created');
    } catch (error) {
      throw new VectorStoreError(
        `Collection creation failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async getCollection(name: string): Promise<CollectionHandle> {
    try {
      const collection = await this.client.getCollection({ name });
      return new ChromaCollection(
        collection,
        this.embedder,
        this.logger,
        this.writeOptions
      );
    } catch (error) {
      throw new VectorStoreError(
        `Collection retrieval failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async deleteCollection(name: string): Promise<void> {
    try {
      await this.client.deleteCollection({ name });
    } catch (error) {
      throw new VectorStoreError(
        `Collection deletion failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  // The HTTP client holds no sockets of its own.
  async close(): Promise<void> {
    this.logger.debug('chroma client released');
  }
}
