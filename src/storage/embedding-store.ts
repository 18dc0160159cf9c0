import Database from 'better-sqlite3';
import { createHash } from 'node:crypto';
import type { RunRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: scoring session metadata
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  authorfit_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  strategy TEXT NOT NULL,
  query_id TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Embeddings: one vector per (provider, model, text)
CREATE TABLE IF NOT EXISTS embeddings (
  provider TEXT NOT NULL,
  model TEXT NOT NULL,
  text_hash TEXT NOT NULL,
  dimensions INTEGER NOT NULL,
  vector_json TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (provider, model, text_hash)
);

CREATE INDEX IF NOT EXISTS idx_embeddings_model ON embeddings(provider, model);
`;

interface EmbeddingRow {
    vector_json: string;
}

interface CountRow {
    count: number;
}

/**
 * Embedding cache and run log on top of better-sqlite3.
 *
 * Cache key = provider + model + SHA-256 of the embedded text, so identical
 * text is never sent to a provider twice for the same model.
 */
export class EmbeddingStore {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        if (dbPath !== ':memory:') {
            this.db.pragma('journal_mode = WAL');
        }

        this.migrate();

        logger.debug({ dbPath }, 'Embedding store initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            logger.debug('Embedding store migrated to v1');
        }
    }

    // ─── Embeddings ───────────────────────────────────────────

    getEmbedding(provider: string, model: string, text: string): number[] | undefined {
        const row = this.db
            .prepare<[string, string, string], EmbeddingRow>(
                'SELECT vector_json FROM embeddings WHERE provider = ? AND model = ? AND text_hash = ?'
            )
            .get(provider, model, hashText(text));

        if (!row) return undefined;

        const parsed: unknown = JSON.parse(row.vector_json);
        if (!Array.isArray(parsed) || !parsed.every((v): v is number => typeof v === 'number')) {
            logger.warn({ provider, model }, 'Discarding corrupt cached embedding');
            return undefined;
        }
        return parsed;
    }

    putEmbedding(provider: string, model: string, text: string, vector: number[]): void {
        this.db
            .prepare(`
      INSERT OR REPLACE INTO embeddings (provider, model, text_hash, dimensions, vector_json)
      VALUES (?, ?, ?, ?, ?)
    `)
            .run(provider, model, hashText(text), vector.length, JSON.stringify(vector));
    }

    getEmbeddingCount(): number {
        const row = this.db.prepare<[], CountRow>('SELECT COUNT(*) as count FROM embeddings').get();
        return row?.count ?? 0;
    }

    clearEmbeddings(): number {
        return this.db.prepare('DELETE FROM embeddings').run().changes;
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, authorfit_version, config_json, strategy, query_id, stats_json)
      VALUES (@created_at, @authorfit_version, @config_json, @strategy, @query_id, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getRuns(): RunRecord[] {
        return this.db.prepare<[], RunRecord>('SELECT * FROM runs ORDER BY run_id').all();
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): {
        embeddings: number;
        runs: number;
        embeddingsByModel: Record<string, number>;
    } {
        const embeddings = this.getEmbeddingCount();
        const runs = this.db.prepare<[], CountRow>('SELECT COUNT(*) as count FROM runs').get()?.count ?? 0;

        const modelRows = this.db
            .prepare<[], { provider: string; model: string; count: number }>(
                'SELECT provider, model, COUNT(*) as count FROM embeddings GROUP BY provider, model ORDER BY provider, model'
            )
            .all();
        const embeddingsByModel: Record<string, number> = {};
        for (const row of modelRows) {
            embeddingsByModel[`${row.provider}:${row.model}`] = row.count;
        }

        return { embeddings, runs, embeddingsByModel };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        logger.debug('Embedding store closed');
    }
}

function hashText(text: string): string {
    return createHash('sha256').update(text).digest('hex');
}
