import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { JsonlLogger } from './jsonlLogger';
import type { CacheLookup, CacheWrite } from '../types/events';

describe('JsonlLogger', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  const lookup: CacheLookup = {
    schemaVersion: 1,
    timestamp: '2026-01-01T00:00:00Z',
    namespace: 'emb_a_1111111111111111',
    type: 'CacheLookup',
    payload: { requested: 2, distinct: 2, hits: 0, misses: 2 },
  };

  it('logs events to file in JSONL format', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'embedcache-logger-test-'));
    const logPath = path.join(tmpDir, 'nested', 'events.jsonl');
    const logger = new JsonlLogger(logPath);

    await logger.log(lookup);

    const content = await fs.readFile(logPath, 'utf8');
    expect(content).toBe(JSON.stringify(lookup) + '\n');
  });

  it('appends multiple events and merges child bindings', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'embedcache-logger-test-'));
    const logPath = path.join(tmpDir, 'events.jsonl');
    const logger = new JsonlLogger(logPath);
    const write: CacheWrite = {
      schemaVersion: 1,
      timestamp: '2026-01-01T00:00:01Z',
      namespace: lookup.namespace,
      type: 'CacheWrite',
      payload: { entries: 2, bytes: 16 },
    };

    await logger.log(lookup);
    await logger.child({ run: 'r1' }).trace(write, 'ignored');

    const lines = (await fs.readFile(logPath, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(lookup);
    expect(JSON.parse(lines[1])).toEqual({ ...write, run: 'r1' });
  });

  it('reports write failures on stderr without throwing', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'embedcache-logger-test-'));
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    // A directory in place of the log file makes appendFile fail.
    const logger = new JsonlLogger(tmpDir);

    await expect(logger.log(lookup)).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledWith(
      `Failed to write to log file at ${tmpDir}`,
      expect.any(Error),
    );
  });

  it('prefixes console messages with bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    new JsonlLogger('/unused.jsonl', { ns: 'a' }).info('opened');
    expect(infoSpy).toHaveBeenCalledWith('[ns=a] opened');
  });
});
