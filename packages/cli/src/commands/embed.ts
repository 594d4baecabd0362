import path from 'node:path';
import { readFile } from 'node:fs/promises';
import type { Command } from 'commander';
import { CachedEmbeddingEngine } from '@embedcache/core';
import { UsageError } from '@embedcache/shared';
import { withStore } from '@embedcache/store';
import { createContext, parsePositiveInt, type CliEnvironment } from '../context';

interface EmbedCommandOptions {
  file?: string;
  stats?: boolean;
}

/** Reads one sentence per line, skipping blank lines. */
export async function readSentenceFile(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new UsageError(`Cannot read sentence file: ${filePath}`, { cause: error });
  }
  return content.split(/\r?\n/).filter((line) => line.trim() !== '');
}

export function registerEmbedCommand(program: Command, env: CliEnvironment) {
  program
    .command('embed')
    .description('Embed sentences through the cache and print the vectors as JSON')
    .argument('[sentences...]', 'Sentences to embed')
    .option('--file <path>', 'Read sentences from a file, one per line')
    .option('--normalize', 'L2-normalize each vector')
    .option('--truncate-dim <n>', 'Keep only the first n components', parsePositiveInt)
    .option('--stats', 'Print namespace and hit/miss counts alongside the vectors')
    .action(async (sentences: string[], options: EmbedCommandOptions, command: Command) => {
      const { cwd, config, logger, renderer } = createContext(command, env);

      const input = [...sentences];
      if (options.file) {
        input.push(...(await readSentenceFile(path.resolve(cwd, options.file))));
      }
      if (input.length === 0) {
        throw new UsageError('No sentences given. Pass them as arguments or with --file.');
      }

      const result = await withStore(
        config.store,
        (store) => new CachedEmbeddingEngine({ store, logger }).embedWithStats(config.embeddings, input),
        { cwd, logger },
      );

      const vectors = result.vectors.map((vector) => Array.from(vector));
      if (options.stats) {
        renderer.data({
          namespace: result.namespace,
          hits: result.hits,
          misses: result.misses,
          vectors,
        });
      } else {
        renderer.data(vectors);
      }
    });
}
