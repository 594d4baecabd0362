import type { Command } from 'commander';
import { modelIdentity, resolveNamespace } from '@embedcache/core';
import { createContext, parsePositiveInt, type CliEnvironment } from '../context';

export function registerNamespaceCommand(program: Command, env: CliEnvironment) {
  program
    .command('namespace')
    .description('Print the namespace the current configuration resolves to')
    .option('--normalize', 'L2-normalize each vector')
    .option('--truncate-dim <n>', 'Keep only the first n components', parsePositiveInt)
    .action((_options: unknown, command: Command) => {
      const { config, renderer } = createContext(command, env);
      const embeddings = config.embeddings;
      const namespace = resolveNamespace(embeddings);

      if (renderer.isJson) {
        renderer.data({
          namespace,
          provider: embeddings.provider,
          model: modelIdentity(embeddings),
          normalize: embeddings.normalize,
          truncateDim: embeddings.truncateDim ?? null,
        });
      } else {
        renderer.text(namespace);
      }
    });
}
