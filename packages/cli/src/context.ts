import path from 'node:path';
import { InvalidArgumentError, type Command } from 'commander';
import { ConfigLoader } from '@embedcache/core';
import {
  ConsoleLogger,
  JsonlLogger,
  type EmbedCacheConfig,
  type EmbedCacheConfigInput,
  type Logger,
} from '@embedcache/shared';
import { OutputRenderer } from './output/renderer';

export interface CliEnvironment {
  /** Directory holding the project config; relative paths resolve against it */
  cwd: string;
}

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

/** Options shared by commands that derive a namespace. */
export interface EmbeddingFlags {
  normalize?: boolean;
  truncateDim?: number;
}

export interface CommandContext {
  cwd: string;
  config: EmbedCacheConfig;
  logger: Logger;
  renderer: OutputRenderer;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function configFlags(opts: GlobalOptions & EmbeddingFlags): EmbedCacheConfigInput {
  return {
    embeddings: { normalize: opts.normalize, truncateDim: opts.truncateDim },
    logging: { verbose: opts.verbose },
  };
}

/**
 * Loads configuration for a command, merging its flags on top, and builds the
 * logger and renderer it reports through.
 */
export function createContext(command: Command, env: CliEnvironment): CommandContext {
  const opts = command.optsWithGlobals<GlobalOptions & EmbeddingFlags>();
  const config = ConfigLoader.load({
    cwd: env.cwd,
    configPath: opts.config ? path.resolve(env.cwd, opts.config) : undefined,
    flags: configFlags(opts),
  });

  const logger = config.logging.jsonlPath
    ? new JsonlLogger(path.resolve(env.cwd, config.logging.jsonlPath))
    : new ConsoleLogger(config.logging.verbose);

  return {
    cwd: env.cwd,
    config,
    logger,
    renderer: new OutputRenderer(Boolean(opts.json), config.logging.verbose),
  };
}
