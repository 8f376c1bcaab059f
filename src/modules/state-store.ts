// ===========================================
// DURABLE STATE STORE
// Named JSON documents on disk, or in Postgres when DATABASE_URL is set
// ===========================================

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import pg from 'pg';
import { componentLogger } from '../utils/logger.js';

const { Pool } = pg;
const log = componentLogger('state-store');

export type StateDocument = 'thresholds' | 'processed_tokens' | 'interval' | 'state';

/**
 * `read` resolves `undefined` for a document that was never written and
 * rejects when one exists but cannot be parsed. `write` rejects on failure.
 */
export interface StateStore {
  readonly kind: string;
  read(name: StateDocument): Promise<unknown>;
  write(name: StateDocument, value: unknown): Promise<void>;
  close(): Promise<void>;
}

// ============ FILE STORE ============

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileStateStore implements StateStore {
  readonly kind = 'file';

  constructor(private readonly dataDir: string) {}

  private pathFor(name: StateDocument): string {
    return path.join(this.dataDir, `${name}.json`);
  }

  async read(name: StateDocument): Promise<unknown> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(name), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
    return JSON.parse(raw);
  }

  async write(name: StateDocument, value: unknown): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    // Write beside the target then rename so a crash never leaves half a document
    const target = this.pathFor(name);
    const temp = `${target}.${process.pid}.tmp`;
    await writeFile(temp, JSON.stringify(value, null, 2), 'utf8');
    await rename(temp, target);
  }

  async close(): Promise<void> {
    // Nothing held open
  }
}

// ============ POSTGRES STORE ============

export const STATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS bot_state (
  name VARCHAR(64) PRIMARY KEY,
  value JSONB NOT NULL,
  updated_at TIMESTAMP DEFAULT NOW()
);
`;

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }>;
}

export class PgStateStore implements StateStore {
  readonly kind = 'postgres';
  private initialized = false;

  constructor(
    private readonly db: Queryable,
    private readonly onClose: () => Promise<void> = async () => {}
  ) {}

  static connect(connectionString: string): PgStateStore {
    const pool = new Pool({
      connectionString,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    pool.on('error', (err) => {
      log.error({ err }, 'Unexpected database pool error');
    });

    return new PgStateStore(pool, () => pool.end());
  }

  private async ensureSchema(): Promise<void> {
    if (this.initialized) return;
    await this.db.query(STATE_SCHEMA_SQL);
    this.initialized = true;
    log.info('State table ready');
  }

  async read(name: StateDocument): Promise<unknown> {
    await this.ensureSchema();
    const result = await this.db.query('SELECT value FROM bot_state WHERE name = $1', [name]);
    const row = result.rows[0];
    return row ? row.value : undefined;
  }

  async write(name: StateDocument, value: unknown): Promise<void> {
    await this.ensureSchema();
    await this.db.query(
      `INSERT INTO bot_state (name, value, updated_at)
       VALUES ($1, $2::jsonb, NOW())
       ON CONFLICT (name) DO UPDATE SET
         value = EXCLUDED.value,
         updated_at = NOW()`,
      [name, JSON.stringify(value)]
    );
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}

export function createStateStore(options: { databaseUrl: string; dataDir: string }): StateStore {
  if (options.databaseUrl) {
    log.info('Persisting state to Postgres');
    return PgStateStore.connect(options.databaseUrl);
  }
  log.info({ dataDir: options.dataDir }, 'Persisting state to JSON files');
  return new FileStateStore(options.dataDir);
}
