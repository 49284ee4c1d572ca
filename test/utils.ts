import type { FastifyBaseLogger } from 'fastify';
import { RagMeContext } from '../src/context';
import type {
  BatchScope,
  CollectionHandle,
  PageReader,
  PageRecord,
  RetrievedChunk,
  StorageRecord,
  StoredDocument,
  VectorStoreClient,
} from '../src/ingestion/types';
import { createLogger } from '../src/lib/logger';
import type { GenerateOptions, LLMService } from '../src/services/llm';

export function silentLogger(): FastifyBaseLogger {
  return createLogger({ level: 'silent' });
}

export class FakeBatch implements BatchScope {
  closeCount = 0;

  constructor(private readonly owner: FakeCollection) {}

  async add(record: StorageRecord): Promise<void> {
    this.owner.addCalls.push(record);
    if (this.owner.failOnAdd === this.owner.addCalls.length) {
      throw new Error('store rejected record');
    }
    this.owner.documents.push({
      id: `doc_${this.owner.documents.length + 1}`,
      ...record,
    });
  }

  async close(): Promise<void> {
    this.closeCount += 1;
    this.owner.closeCalls += 1;
    if (this.owner.failOnClose) {
      throw new Error('batch flush failed');
    }
  }
}

export class FakeCollection implements CollectionHandle {
  readonly batches: FakeBatch[] = [];
  readonly addCalls: StorageRecord[] = [];
  readonly documents: StoredDocument[] = [];
  readonly queries: Array<{ text: string; topK: number }> = [];
  closeCalls = 0;
  failOnAdd: number | undefined;
  failOnClose = false;
  hits: RetrievedChunk[] = [];

  constructor(readonly name: string) {}

  openBatch(): BatchScope {
    const batch = new FakeBatch(this);
    this.batches.push(batch);
    return batch;
  }

  async fetchObjects(limit: number, offset: number): Promise<StoredDocument[]> {
    return this.documents.slice(offset, offset + limit);
  }

  async query(text: string, topK: number): Promise<RetrievedChunk[]> {
    this.queries.push({ text, topK });
    return this.hits.slice(0, topK);
  }

  async deleteAll(): Promise<number> {
    return this.documents.splice(0, this.documents.length).length;
  }

  async count(): Promise<number> {
    return this.documents.length;
  }
}

export class FakeVectorStore implements VectorStoreClient {
  readonly existing = new Set<string>();
  readonly created: string[] = [];
  readonly collections = new Map<string, FakeCollection>();
  connected = true;
  closeCount = 0;

  constructor(existing: string[] = []) {
    for (const name of existing) this.existing.add(name);
  }

  async ping() {
    return this.connected
      ? { connected: true, message: 'fake store connected' }
      : { connected: false, message: 'fake store unreachable' };
  }

  async collectionExists(name: string): Promise<boolean> {
    return this.existing.has(name);
  }

  async createCollection(name: string): Promise<void> {
    this.created.push(name);
    this.existing.add(name);
  }

  async getCollection(name: string): Promise<FakeCollection> {
    let collection = this.collections.get(name);
    if (!collection) {
      collection = new FakeCollection(name);
      this.collections.set(name, collection);
    }
    return collection;
  }

  async deleteCollection(name: string): Promise<void> {
    this.existing.delete(name);
    this.collections.delete(name);
  }

  async close(): Promise<void> {
    this.closeCount += 1;
  }
}

export class StubReader implements PageReader {
  readonly calls: string[][] = [];
  failWith: Error | undefined;

  constructor(private readonly pages: PageRecord[]) {}

  async load(urls: string[]): Promise<PageRecord[]> {
    this.calls.push(urls);
    if (this.failWith) throw this.failWith;
    return this.pages;
  }
}

// Replies are handed out in order; the last one repeats.
export class ScriptedLLM implements LLMService {
  readonly prompts: string[] = [];

  constructor(private readonly replies: string[]) {}

  async generate(prompt: string, _options?: GenerateOptions): Promise<string> {
    this.prompts.push(prompt);
    const index = Math.min(this.prompts.length, this.replies.length) - 1;
    return this.replies[index] ?? '';
  }
}

export class ThrowLLM implements LLMService {
  async generate(): Promise<string> {
    throw new Error('LLM failure');
  }
}

export function buildContext(
  parts: {
    store?: FakeVectorStore;
    reader?: StubReader;
    llm?: LLMService;
  } = {}
) {
  const store = parts.store ?? new FakeVectorStore(['RagMeDocs']);
  const reader = parts.reader ?? new StubReader([]);
  const llm = parts.llm ?? new ScriptedLLM(['{"answer": "ok"}']);
  const context = new RagMeContext({
    store,
    reader,
    llm,
    logger: silentLogger(),
  });
  return { context, store, reader, llm };
}
