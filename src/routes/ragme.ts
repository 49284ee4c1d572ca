import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { FetchError } from '../lib/errors';
import type { RagMe } from '../ragme';

const addUrlsBody = z.object({
  urls: z.array(z.string().url()).min(1),
});

const queryBody = z.object({
  query: z.string().trim().min(1),
  sessionId: z.string().optional(),
});

const listQuery = z.object({
  limit: z.coerce.number().int().positive().max(100).default(10),
  offset: z.coerce.number().int().min(0).default(0),
});

function issuesOf(error: z.ZodError): string {
  return error.issues
    .map(i => `${i.path.join('.') || 'body'}: ${i.message}`)
    .join('; ');
}

// Upstream page failures are a bad gateway; everything else is ours.
function statusFor(error: unknown): number {
  return error instanceof FetchError ? 502 : 500;
}

export async function ragmeRoutes(
  fastify: FastifyInstance,
  options: { ragme: RagMe }
) {
  const { ragme } = options;

  fastify.post('/add-urls', async (request, reply) => {
    const parsed = addUrlsBody.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: issuesOf(parsed.error) });
    }

    try {
      const { written } = await ragme.writeWebpagesToVectorStore(
        parsed.data.urls
      );
      return reply.send({
        status: 'success',
        message: `Processed ${parsed.data.urls.length} URL(s)`,
        written,
      });
    } catch (error) {
      fastify.log.error({ err: error }, 'add-urls failed');
      return reply.status(statusFor(error)).send({
        status: 'error',
        error: error instanceof Error ? error.message : String(error),
        ...(error instanceof FetchError ? { url: error.url } : {}),
      });
    }
  });

  fastify.post('/query', async (request, reply) => {
    const parsed = queryBody.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: issuesOf(parsed.error) });
    }
    const response = await ragme.run(parsed.data.query, parsed.data.sessionId);
    return reply.send({ status: 'success', response });
  });

  fastify.get('/list-documents', async (request, reply) => {
    const parsed = listQuery.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: issuesOf(parsed.error) });
    }
    try {
      const documents = await ragme.listDocuments(
        parsed.data.limit,
        parsed.data.offset
      );
      return reply.send({
        status: 'success',
        documents,
        count: documents.length,
      });
    } catch (error) {
      fastify.log.error({ err: error }, 'list-documents failed');
      return reply.status(500).send({
        status: 'error',
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });
}
