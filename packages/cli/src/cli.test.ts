import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { resolveNamespace } from '@embedcache/core';
import { EmbeddingsConfigSchema } from '@embedcache/shared';
import { createProgram, name, runCli } from './cli';

const CONFIG = ['embeddings:', '  dims: 4', 'store:', '  path: cache.sqlite', ''].join('\n');

describe('cli', () => {
  let cwd: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errSpy: ReturnType<typeof vi.spyOn>;

  function writeConfig(content: string) {
    mkdirSync(join(cwd, '.embedcache'), { recursive: true });
    writeFileSync(join(cwd, '.embedcache', 'config.yaml'), content);
  }

  function run(...args: string[]) {
    return runCli(['node', 'embedcache', ...args], { cwd });
  }

  function stdout(call = 0): unknown {
    return JSON.parse(String(logSpy.mock.calls[call][0]));
  }

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'embedcache-cli-'));
    writeConfig(CONFIG);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(cwd, { recursive: true, force: true });
  });

  it('exports name', () => {
    expect(name).toBe('@embedcache/cli');
  });

  it('registers the embed and namespace commands', () => {
    const program = createProgram({ cwd });
    expect(program.commands.map((c) => c.name())).toEqual(['embed', 'namespace']);
  });

  describe('embed', () => {
    it('prints one vector per sentence', async () => {
      const code = await run('embed', 'hello', 'world', 'hello');

      expect(code).toBe(0);
      const vectors = stdout();
      expect(vectors).toHaveLength(3);
      expect(vectors).toEqual([
        expect.any(Array),
        expect.any(Array),
        (vectors as unknown[])[0],
      ]);
      expect((vectors as number[][])[0]).toHaveLength(4);
    });

    it('serves the second run from the sqlite cache', async () => {
      await run('embed', '--stats', 'alpha', 'beta');
      await run('embed', '--stats', 'beta', 'alpha');

      const first = stdout(0);
      const second = stdout(1);
      const namespace = resolveNamespace(EmbeddingsConfigSchema.parse({ dims: 4 }));

      expect(first).toMatchObject({ namespace, hits: 0, misses: 2 });
      expect(second).toMatchObject({ namespace, hits: 2, misses: 0 });
      const firstVectors = (first as { vectors: number[][] }).vectors;
      const secondVectors = (second as { vectors: number[][] }).vectors;
      expect(secondVectors).toEqual([firstVectors[1], firstVectors[0]]);
    });

    it('reads sentences from a file and skips blank lines', async () => {
      writeFileSync(join(cwd, 'sentences.txt'), 'first\n\n   \nsecond\r\n');

      const code = await run('embed', '--stats', '--file', 'sentences.txt');

      expect(code).toBe(0);
      expect(stdout()).toMatchObject({ hits: 0, misses: 2 });
    });

    it('uses a separate namespace for normalized vectors', async () => {
      await run('embed', '--stats', 'hello');
      await run('embed', '--stats', '--normalize', 'hello');

      const normalized = stdout(1);
      expect(normalized).toMatchObject({
        namespace: resolveNamespace(EmbeddingsConfigSchema.parse({ dims: 4, normalize: true })),
        misses: 1,
      });
    });

    it('truncates vectors', async () => {
      await run('embed', '--truncate-dim', '2', 'hello');

      expect((stdout() as number[][])[0]).toHaveLength(2);
    });
  });

  describe('namespace', () => {
    it('prints the resolved namespace', async () => {
      const code = await run('namespace');

      expect(code).toBe(0);
      expect(logSpy).toHaveBeenCalledWith(
        resolveNamespace(EmbeddingsConfigSchema.parse({ dims: 4 })),
      );
    });

    it('prints the namespace inputs as JSON', async () => {
      await run('--json', 'namespace', '--normalize', '--truncate-dim', '2');

      expect(stdout()).toEqual({
        namespace: resolveNamespace(
          EmbeddingsConfigSchema.parse({ dims: 4, normalize: true, truncateDim: 2 }),
        ),
        provider: 'local-hash',
        model: 'local-hash-4',
        normalize: true,
        truncateDim: 2,
      });
    });
  });

  describe('errors', () => {
    it('exits with 2 and a JSON error when no sentences are given', async () => {
      const code = await run('--json', 'embed');

      expect(code).toBe(2);
      expect(stdout()).toEqual({
        error: {
          code: 'UsageError',
          message: 'No sentences given. Pass them as arguments or with --file.',
        },
      });
    });

    it('reports a missing sentence file as a usage error', async () => {
      const code = await run('--json', 'embed', '--file', 'missing.txt');

      expect(code).toBe(2);
      expect(stdout()).toEqual({
        error: {
          code: 'UsageError',
          message: `Cannot read sentence file: ${join(cwd, 'missing.txt')}`,
        },
      });
    });

    it('treats invalid option values as usage errors', async () => {
      const code = await run('--json', 'embed', '--truncate-dim', 'abc', 'hello');

      expect(code).toBe(2);
      expect(stdout()).toMatchObject({ error: { code: 'UsageError' } });
    });

    it('treats unknown commands as usage errors', async () => {
      expect(await run('bogus')).toBe(2);
    });

    it('exits with 2 when truncation exceeds the configured dims', async () => {
      const code = await run('--json', 'embed', '--truncate-dim', '8', 'hello');

      expect(code).toBe(2);
      expect(stdout()).toMatchObject({
        error: {
          code: 'ConfigError',
          details: {
            issues: [
              {
                path: 'embeddings.truncateDim',
                message: 'embeddings.truncateDim (8) exceeds embeddings.dims (4)',
              },
            ],
          },
        },
      });
    });

    it('exits with 1 when the store cannot be opened', async () => {
      writeFileSync(join(cwd, 'blocker'), 'not a directory');
      writeConfig(['embeddings:', '  dims: 4', 'store:', '  path: blocker/cache.sqlite', ''].join('\n'));

      const code = await run('--json', 'embed', 'hello');

      expect(code).toBe(1);
      expect(stdout()).toMatchObject({ error: { code: 'StoreUnavailable' } });
    });

    it('prints human-readable errors to stderr without --json', async () => {
      const code = await run('embed');

      expect(code).toBe(2);
      expect(logSpy).not.toHaveBeenCalled();
      expect(String(errSpy.mock.calls[0][0])).toContain(
        'Error: No sentences given. Pass them as arguments or with --file.',
      );
    });
  });
});
