import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { IngestionResult, StoredDocument } from '../../ingestion/types';
import type { QueryAnswer } from '../QueryAgent';

export interface RagMeOperations {
  readonly collectionName: string;
  writeWebpagesToVectorStore(urls: string[]): Promise<IngestionResult>;
  listDocuments(limit?: number, offset?: number): Promise<StoredDocument[]>;
  clearCollection(): Promise<number>;
  query(question: string): Promise<QueryAnswer>;
}

export type ToolResult = { ok: true; output: string } | { ok: false; error: string };

export type RagMeTool = {
  name: string;
  description: string;
  signature: string;
  execute(args: unknown): Promise<ToolResult>;
};

const PREVIEW_CHARS = 200;

function defineTool<S extends z.ZodTypeAny>(
  logger: FastifyBaseLogger,
  definition: {
    name: string;
    description: string;
    signature: string;
    parameters: S;
    run: (args: z.infer<S>) => Promise<string>;
  }
): RagMeTool {
  return {
    name: definition.name,
    description: definition.description,
    signature: definition.signature,
    async execute(args: unknown): Promise<ToolResult> {
      const parsed = definition.parameters.safeParse(args ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map(i => `${i.path.join('.') || 'arguments'}: ${i.message}`)
          .join('; ');
        return { ok: false, error: `invalid arguments: ${issues}` };
      }
      try {
        const output = await definition.run(parsed.data);
        logger.info({ tool: definition.name }, 'ragme tool ok');
        return { ok: true, output };
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : 'unknown_error';
        logger.error({ err, tool: definition.name }, 'ragme tool failed');
        return { ok: false, error: message };
      }
    },
  };
}

export function previewDocuments(documents: StoredDocument[]): string {
  return JSON.stringify(
    documents.map(d => ({
      url: d.url,
      preview:
        d.text.length > PREVIEW_CHARS
          ? `${d.text.slice(0, PREVIEW_CHARS)}...`
          : d.text,
    }))
  );
}

export function buildRagMeTools(
  ops: RagMeOperations,
  logger: FastifyBaseLogger
): RagMeTool[] {
  return [
    defineTool(logger, {
      name: 'write_to_ragme_collection',
      description: `Fetch the given web pages and store their text in the ${ops.collectionName} collection.`,
      signature: '{"urls": string[]}',
      parameters: z.object({ urls: z.array(z.string().url()).min(1) }),
      run: async ({ urls }) => {
        const { written } = await ops.writeWebpagesToVectorStore(urls);
        return `Added ${written} page(s) to ${ops.collectionName}.`;
      },
    }),
    defineTool(logger, {
      name: 'delete_ragme_collection',
      description: `Delete every document stored in the ${ops.collectionName} collection.`,
      signature: '{}',
      parameters: z.object({}),
      run: async () => {
        const deleted = await ops.clearCollection();
        return `Deleted ${deleted} document(s) from ${ops.collectionName}.`;
      },
    }),
    defineTool(logger, {
      name: 'list_ragme_collection',
      description: `List documents stored in the ${ops.collectionName} collection with a short preview.`,
      signature: '{"limit"?: number, "offset"?: number}',
      parameters: z.object({
        limit: z.number().int().positive().max(100).default(10),
        offset: z.number().int().min(0).default(0),
      }),
      run: async ({ limit, offset }) =>
        previewDocuments(await ops.listDocuments(limit, offset)),
    }),
    defineTool(logger, {
      name: 'query_agent',
      description: `Answer a question using the documents in the ${ops.collectionName} collection.`,
      signature: '{"query": string}',
      parameters: z.object({ query: z.string().min(1) }),
      run: async ({ query }) => (await ops.query(query)).finalAnswer,
    }),
  ];
}
