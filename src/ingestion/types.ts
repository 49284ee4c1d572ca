export type PageRecord = {
  id: string;
  text: string;
};

export type StorageRecord = {
  url: string;
  text: string;
  metadata: string;
};

export type StoredDocument = StorageRecord & { id: string };

export type RetrievedChunk = StoredDocument & { distance: number | null };

export type DuplicatePolicy = 'append' | 'replace';

export interface PageReader {
  load(urls: string[]): Promise<PageRecord[]>;
}

export interface BatchScope {
  add(record: StorageRecord): Promise<void>;
  close(): Promise<void>;
}

export interface CollectionHandle {
  readonly name: string;
  openBatch(): BatchScope;
  fetchObjects(limit: number, offset: number): Promise<StoredDocument[]>;
  query(text: string, topK: number): Promise<RetrievedChunk[]>;
  deleteAll(): Promise<number>;
  count(): Promise<number>;
}

export interface VectorStoreClient {
  ping(): Promise<{ connected: boolean; message: string }>;
  collectionExists(name: string): Promise<boolean>;
  createCollection(name: string, description?: string): Promise<void>;
  getCollection(name: string): Promise<CollectionHandle>;
  deleteCollection(name: string): Promise<void>;
  close(): Promise<void>;
}

export type IngestionResult = {
  urls: string[];
  written: number;
};
