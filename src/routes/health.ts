import type { FastifyPluginAsync } from 'fastify';
import type { VectorStoreClient } from '../ingestion/types';

const routes: FastifyPluginAsync<{ store: VectorStoreClient }> = async (
  app,
  { store }
) => {
  app.get('/', async (_req, reply) => {
    const vectorStore = await store.ping();
    return reply.status(vectorStore.connected ? 200 : 503).send({
      ok: vectorStore.connected,
      ts: new Date().toISOString(),
      vectorStore,
    });
  });
};

export default routes;
