#!/usr/bin/env node
import 'dotenv/config';
import { CommanderError } from 'commander';
import { createInterface, type Interface } from 'readline/promises';
import { buildProgram, type CliIO } from './cli/program';
import { RagMeContext } from './context';
import { env } from './lib/env';
import { createLogger } from './lib/logger';
import { RagMe } from './ragme';

async function main() {
  const logger = createLogger({ level: env.LOG_LEVEL });
  let rl: Interface | undefined;
  let inputClosed = false;
  const io: CliIO = {
    write: line => process.stdout.write(`${line}\n`),
    prompt: async question => {
      if (!rl) {
        rl = createInterface({ input: process.stdin, output: process.stdout });
        rl.on('close', () => {
          inputClosed = true;
        });
      }
      return inputClosed ? null : rl.question(question);
    },
  };
  const program = buildProgram(
    () =>
      RagMe.create(RagMeContext.fromEnv(env, logger), {
        collectionName: env.RAGME_COLLECTION,
        queryTopK: env.QUERY_TOP_K,
        agentMaxSteps: env.AGENT_MAX_STEPS,
      }),
    io
  );
  try {
    await program.parseAsync(process.argv);
  } finally {
    rl?.close();
  }
}

main().catch(err => {
  if (err instanceof CommanderError) process.exit(err.exitCode);
  process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
