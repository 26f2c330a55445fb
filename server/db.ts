import crypto from 'crypto';
import os from 'os';
import { Pool, type PoolClient } from 'pg';
import type { AppConfig } from './config';
import type { DateRange, OpenTimer, PendingTimer, Registries, StoredTimeEntry, TimeEntry } from '../types';
import { StorageError, errorMessage } from '../shared/errors';
import type { EntrySink } from '../shared/session';

export interface TimeLogStore extends EntrySink {
  query(range: DateRange): Promise<StoredTimeEntry[]>;
  deleteRange(range: DateRange): Promise<number>;
  startTimer(timer: PendingTimer): Promise<OpenTimer>;
  /** The most recently started timer that is still running, if any. */
  openTimer(): Promise<OpenTimer | null>;
  /** Saves the finished entry and drops the timer in one transaction. */
  closeTimer(id: string, entry: TimeEntry, registries: Registries): Promise<void>;
  discardTimer(id: string): Promise<void>;
}

export function createPool(config: AppConfig): Pool {
  return new Pool({
    host: config.postgres.host,
    port: config.postgres.port,
    user: config.postgres.user,
    password: config.postgres.password,
    database: config.postgres.database,
  });
}

export async function initSchema(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      app_version TEXT NOT NULL,
      host TEXT,
      platform TEXT NOT NULL,
      input_type TEXT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS time_log (
      id TEXT PRIMARY KEY,
      session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
      date_key DATE NOT NULL,
      duration DOUBLE PRECISION NOT NULL CHECK (duration > 0),
      category_key INTEGER NOT NULL,
      category_name TEXT NOT NULL,
      account_key TEXT NOT NULL,
      account_name TEXT NOT NULL,
      comment TEXT NOT NULL DEFAULT '',
      start_ts TIMESTAMPTZ,
      end_ts TIMESTAMPTZ,
      position INTEGER NOT NULL DEFAULT 0,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `);

  // Running timers have no duration yet, so they live outside time_log.
  await pool.query(`
    CREATE TABLE IF NOT EXISTS timers (
      id TEXT PRIMARY KEY,
      start_ts TIMESTAMPTZ NOT NULL,
      category_key INTEGER,
      account_key TEXT,
      comment TEXT NOT NULL DEFAULT '',
      created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `);

  await pool.query(`CREATE INDEX IF NOT EXISTS idx_time_log_date_key ON time_log(date_key);`);
  await pool.query(`CREATE INDEX IF NOT EXISTS idx_time_log_category_name ON time_log(category_name);`);
}

function rangeClause(range: DateRange, params: unknown[]): string {
  const clauses: string[] = [];
  if (range.start) {
    params.push(range.start);
    clauses.push(`date_key >= $${params.length}`);
  }
  if (range.end) {
    params.push(range.end);
    clauses.push(`date_key <= $${params.length}`);
  }
  return clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
}

export class PgTimeLogStore implements TimeLogStore {
  constructor(
    private readonly pool: Pool,
    private readonly meta: { appVersion: string; inputType?: string }
  ) {}

  private async transaction(action: string, work: (client: PoolClient) => Promise<void>): Promise<void> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err: unknown) {
      throw new StorageError(`Cannot connect to Postgres: ${errorMessage(err)}`, err);
    }

    try {
      await client.query('BEGIN');
      await work(client);
      await client.query('COMMIT');
    } catch (err: unknown) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        console.error('Rollback failed:', rollbackErr);
      });
      throw new StorageError(`Failed to ${action}: ${errorMessage(err)}`, err);
    } finally {
      client.release();
    }
  }

  private async insertEntries(
    client: PoolClient,
    entries: TimeEntry[],
    registries: Registries,
    inputType: string
  ): Promise<void> {
    const sessionId = crypto.randomUUID();
    await client.query(
      `INSERT INTO sessions (id, app_version, host, platform, input_type)
       VALUES ($1, $2, $3, $4, $5)`,
      [sessionId, this.meta.appVersion, os.hostname(), process.platform, inputType]
    );
    for (const [position, e] of entries.entries()) {
      await client.query(
        `INSERT INTO time_log (id, session_id, date_key, duration, category_key, category_name,
                               account_key, account_name, comment, start_ts, end_ts, position)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
        [
          crypto.randomUUID(),
          sessionId,
          e.date,
          e.duration,
          e.category,
          registries.categories.get(e.category) ?? String(e.category),
          e.account,
          registries.accounts.get(e.account) ?? e.account,
          e.comment,
          e.startTs ?? null,
          e.endTs ?? null,
          position,
        ]
      );
    }
  }

  async save(entries: TimeEntry[], registries: Registries): Promise<void> {
    await this.transaction('write time log', (client) =>
      this.insertEntries(client, entries, registries, this.meta.inputType ?? 'user')
    );
  }

  async startTimer(timer: PendingTimer): Promise<OpenTimer> {
    const id = crypto.randomUUID();
    try {
      await this.pool.query(
        `INSERT INTO timers (id, start_ts, category_key, account_key, comment) VALUES ($1, $2, $3, $4, $5)`,
        [id, timer.startTs, timer.category ?? null, timer.account ?? null, timer.comment]
      );
    } catch (err: unknown) {
      throw new StorageError(`Failed to start timer: ${errorMessage(err)}`, err);
    }
    return { ...timer, id };
  }

  async openTimer(): Promise<OpenTimer | null> {
    try {
      const { rows } = await this.pool.query(
        `SELECT id, start_ts, category_key, account_key, comment
         FROM timers
         ORDER BY start_ts DESC, created_at DESC
         LIMIT 1`
      );
      const [r] = rows;
      if (!r) return null;
      return {
        id: String(r.id),
        startTs: r.start_ts instanceof Date ? r.start_ts.toISOString() : String(r.start_ts),
        category: r.category_key === null ? undefined : Number(r.category_key),
        account: r.account_key === null ? undefined : String(r.account_key),
        comment: String(r.comment ?? ''),
      };
    } catch (err: unknown) {
      throw new StorageError(`Failed to read timers: ${errorMessage(err)}`, err);
    }
  }

  async closeTimer(id: string, entry: TimeEntry, registries: Registries): Promise<void> {
    await this.transaction('stop timer', async (client) => {
      await this.insertEntries(client, [entry], registries, 'timer');
      await client.query(`DELETE FROM timers WHERE id = $1`, [id]);
    });
  }

  async discardTimer(id: string): Promise<void> {
    try {
      await this.pool.query(`DELETE FROM timers WHERE id = $1`, [id]);
    } catch (err: unknown) {
      throw new StorageError(`Failed to discard timer: ${errorMessage(err)}`, err);
    }
  }

  async query(range: DateRange): Promise<StoredTimeEntry[]> {
    const params: unknown[] = [];
    const where = rangeClause(range, params);
    try {
      const { rows } = await this.pool.query(
        `SELECT id, session_id, to_char(date_key, 'YYYY-MM-DD') AS date_key, duration,
                category_key, category_name, account_key, account_name, comment, start_ts, end_ts
         FROM time_log
         ${where}
         ORDER BY date_key ASC, created_at ASC, position ASC`,
        params
      );
      return rows.map((r) => ({
        id: String(r.id),
        sessionId: String(r.session_id),
        date: String(r.date_key),
        duration: Number(r.duration),
        category: Number(r.category_key),
        categoryName: String(r.category_name),
        account: String(r.account_key),
        accountName: String(r.account_name),
        comment: String(r.comment ?? ''),
        startTs: r.start_ts instanceof Date ? r.start_ts.toISOString() : undefined,
        endTs: r.end_ts instanceof Date ? r.end_ts.toISOString() : undefined,
      }));
    } catch (err: unknown) {
      throw new StorageError(`Failed to query time log: ${errorMessage(err)}`, err);
    }
  }

  async deleteRange(range: DateRange): Promise<number> {
    const params: unknown[] = [];
    const where = rangeClause(range, params);
    try {
      const result = await this.pool.query(`DELETE FROM time_log ${where}`, params);
      return result.rowCount ?? 0;
    } catch (err: unknown) {
      throw new StorageError(`Failed to delete time log entries: ${errorMessage(err)}`, err);
    }
  }
}
