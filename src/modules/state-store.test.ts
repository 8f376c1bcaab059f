import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { FileStateStore, PgStateStore, STATE_SCHEMA_SQL, type Queryable } from './state-store.js';

describe('FileStateStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'signal-bot-state-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads back what it wrote', async () => {
    const store = new FileStateStore(path.join(dir, 'nested'));
    await store.write('interval', { minutes: 15 });

    await expect(store.read('interval')).resolves.toEqual({ minutes: 15 });
    const onDisk = await readFile(path.join(dir, 'nested', 'interval.json'), 'utf8');
    expect(JSON.parse(onDisk)).toEqual({ minutes: 15 });
  });

  it('returns undefined for a document never written', async () => {
    await expect(new FileStateStore(dir).read('thresholds')).resolves.toBeUndefined();
  });

  it('rejects on a malformed document', async () => {
    await writeFile(path.join(dir, 'state.json'), '{ not json', 'utf8');
    await expect(new FileStateStore(dir).read('state')).rejects.toThrow(SyntaxError);
  });
});

describe('PgStateStore', () => {
  function fakeDb(rows: Array<Record<string, unknown>> = []) {
    const query = vi.fn(async (_text: string, _values?: unknown[]) => ({ rows }));
    const db: Queryable = { query };
    return { db, query };
  }

  it('creates the table once before the first query', async () => {
    const { db, query } = fakeDb([{ value: ['addr-1'] }]);
    const store = new PgStateStore(db);

    await expect(store.read('processed_tokens')).resolves.toEqual(['addr-1']);
    await store.read('processed_tokens');

    expect(query.mock.calls[0]?.[0]).toBe(STATE_SCHEMA_SQL);
    expect(query.mock.calls.filter(([text]) => text === STATE_SCHEMA_SQL)).toHaveLength(1);
    expect(query.mock.calls[1]?.[1]).toEqual(['processed_tokens']);
  });

  it('returns undefined when no row exists', async () => {
    const { db } = fakeDb([]);
    await expect(new PgStateStore(db).read('thresholds')).resolves.toBeUndefined();
  });

  it('upserts documents as JSON', async () => {
    const { db, query } = fakeDb();
    await new PgStateStore(db).write('state', { enabled: true, testMode: false });

    const [text, values] = query.mock.calls[1] ?? [];
    expect(text).toContain('ON CONFLICT (name) DO UPDATE');
    expect(values).toEqual(['state', '{"enabled":true,"testMode":false}']);
  });

  it('closes through the provided hook', async () => {
    const onClose = vi.fn(async () => {});
    await new PgStateStore(fakeDb().db, onClose).close();
    expect(onClose).toHaveBeenCalledTimes(1);
  });
});
