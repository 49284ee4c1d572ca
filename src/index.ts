import 'dotenv/config';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { RagMeContext } from './context';
import { env } from './lib/env';
import { RagMe } from './ragme';
import healthRoutes from './routes/health';
import { ragmeRoutes } from './routes/ragme';

const app = Fastify({ logger: { level: env.LOG_LEVEL } });

async function start() {
  await app.register(cors, { origin: true, credentials: true });

  const context = RagMeContext.fromEnv(env, app.log);
  const ragme = await RagMe.create(context, {
    collectionName: env.RAGME_COLLECTION,
    queryTopK: env.QUERY_TOP_K,
    agentMaxSteps: env.AGENT_MAX_STEPS,
  });
  app.addHook('onClose', async () => {
    await ragme.close();
  });

  await app.register(healthRoutes, { prefix: '/health', store: ragme.store });
  await app.register(ragmeRoutes, { prefix: '/ragme', ragme });

  await app.listen({ port: env.PORT, host: '0.0.0.0' });
}

start().catch(err => {
  app.log.error(err);
  process.exit(1);
});
