import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import logger from './logger';
import { ValidationError } from './errors';

interface CacheRow {
    value: number;
    timestamp: number;
}

/**
 * Durable namespaced key -> integer store used to remember scraped
 * identifiers between runs. A connection is opened per call, so instances are
 * cheap to share and nothing stays open once a call returns.
 */
export class IdentifierCache {
    constructor(private readonly dbPath: string) {
        // Ensure data directory exists
        const dir = path.dirname(dbPath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }

        this.withConnection(db => {
            db.exec(`
                CREATE TABLE IF NOT EXISTS cache (
                    namespace TEXT NOT NULL,
                    key TEXT NOT NULL,
                    value INTEGER NOT NULL,
                    timestamp INTEGER NOT NULL,
                    PRIMARY KEY (namespace, key)
                )
            `);
        });
        logger.debug(`Initialized identifier cache at ${dbPath}`);
    }

    /**
     * @param timeoutMs - when given, an entry older than this is evicted and reported as a miss
     */
    public get(namespace: string, key: string, timeoutMs?: number): number | null {
        return this.withConnection(db => {
            const row = db
                .prepare<[string, string], CacheRow>('SELECT value, timestamp FROM cache WHERE namespace = ? AND key = ?')
                .get(namespace, key);

            if (!row) return null;

            if (timeoutMs !== undefined && Date.now() - row.timestamp > timeoutMs) {
                db.prepare('DELETE FROM cache WHERE namespace = ? AND key = ?').run(namespace, key);
                logger.debug(`[CACHE EXPIRED] ${namespace}/${key}`);
                return null;
            }

            return row.value;
        });
    }

    public save(namespace: string, key: string, value: number): void {
        if (!Number.isSafeInteger(value)) {
            throw new ValidationError(`Cache values must be integers, got ${value} for ${namespace}/${key}`);
        }

        this.withConnection(db => {
            db.prepare('INSERT OR REPLACE INTO cache (namespace, key, value, timestamp) VALUES (?, ?, ?, ?)')
                .run(namespace, key, value, Date.now());
        });
    }

    /**
     * Deletes one entry, one namespace, or everything, depending on which
     * arguments are given.
     */
    public clear(namespace?: string, key?: string): number {
        if (key !== undefined && namespace === undefined) {
            throw new ValidationError('Clearing a single key requires its namespace');
        }

        return this.withConnection(db => {
            if (namespace !== undefined && key !== undefined) {
                return db.prepare('DELETE FROM cache WHERE namespace = ? AND key = ?').run(namespace, key).changes;
            }
            if (namespace !== undefined) {
                return db.prepare('DELETE FROM cache WHERE namespace = ?').run(namespace).changes;
            }
            const { changes } = db.prepare('DELETE FROM cache').run();
            db.exec('VACUUM'); // Reclaim space
            return changes;
        });
    }

    private withConnection<T>(fn: (db: Database.Database) => T): T {
        const db = new Database(this.dbPath);
        try {
            return fn(db);
        } finally {
            db.close();
        }
    }
}
