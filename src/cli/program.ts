import { Command, InvalidArgumentError } from 'commander';
import type { RagMe } from '../ragme';

export type CliIO = {
  write: (line: string) => void;
  prompt?: (question: string) => Promise<string | null>;
  writeErr?: (text: string) => void;
};

function integerAtLeast(min: number) {
  return (value: string): number => {
    const n = Number(value);
    if (!Number.isInteger(n) || n < min) {
      throw new InvalidArgumentError(`expected an integer >= ${min}`);
    }
    return n;
  };
}

const EXIT_WORDS = new Set(['quit', 'exit', 'bye']);

/**
 * Each command opens RagMe, runs, and closes it again. Commander errors are
 * thrown as `CommanderError` instead of exiting the process.
 */
export function buildProgram(
  openRagMe: () => Promise<RagMe>,
  io: CliIO
): Command {
  const withRagMe = async (fn: (ragme: RagMe) => Promise<void>) => {
    const ragme = await openRagMe();
    try {
      await fn(ragme);
    } finally {
      await ragme.close();
    }
  };

  const program = new Command();
  program
    .name('ragme')
    .description('Store web pages in a vector collection and ask questions about them')
    .exitOverride();
  if (io.writeErr) {
    program.configureOutput({ writeErr: io.writeErr });
  }

  program
    .command('add')
    .description('fetch web pages and add them to the collection')
    .argument('<urls...>', 'page URLs')
    .action((urls: string[]) =>
      withRagMe(async ragme => {
        const { written } = await ragme.writeWebpagesToVectorStore(urls);
        io.write(`Added ${written} page(s) to ${ragme.collectionName}`);
      })
    );

  program
    .command('list')
    .description('list stored documents')
    .option('-l, --limit <n>', 'number of documents', integerAtLeast(1), 10)
    .option('-o, --offset <n>', 'documents to skip', integerAtLeast(0), 0)
    .action((opts: { limit: number; offset: number }) =>
      withRagMe(async ragme => {
        const docs = await ragme.listDocuments(opts.limit, opts.offset);
        for (const doc of docs) {
          io.write(`${doc.id}\t${doc.url}\t${doc.text.length} chars`);
        }
        io.write(`${docs.length} document(s)`);
      })
    );

  program
    .command('ask')
    .description('answer a question from the stored documents')
    .argument('<question...>', 'the question')
    .action((words: string[]) =>
      withRagMe(async ragme => {
        const answer = await ragme.query(words.join(' '));
        io.write(answer.finalAnswer);
        for (const source of answer.sources) {
          io.write(`- ${source.url}`);
        }
      })
    );

  program
    .command('clear')
    .description('delete every stored document')
    .action(() =>
      withRagMe(async ragme => {
        const deleted = await ragme.clearCollection();
        io.write(`Deleted ${deleted} document(s) from ${ragme.collectionName}`);
      })
    );

  program
    .command('chat')
    .description('talk to the RagMe agent; type quit to leave')
    .action(() =>
      withRagMe(async ragme => {
        const prompt = io.prompt;
        if (!prompt) throw new Error('chat needs an interactive terminal');
        for (;;) {
          const line = await prompt('You: ');
          if (line === null || EXIT_WORDS.has(line.trim().toLowerCase())) break;
          if (!line.trim()) continue;
          const res = await ragme.run(line);
          io.write(`RagMe: ${res.reply}`);
        }
      })
    );

  return program;
}
