import { mkdirSync } from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';
import { createClient, type Client, type Row } from '@libsql/client';
import {
    PersistenceError,
    emptySessionStats,
    errorMessage,
    type Interaction,
    type NewInteraction,
    type SessionStats,
    type SessionStore
} from '@newsroute/core';
import { InteractionRowSchema, InsertedRowSchema, StatsRowSchema, parseMetadata } from './schema';

const MIGRATIONS = `
CREATE TABLE IF NOT EXISTS interactions (
    id         INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id TEXT    NOT NULL,
    timestamp  TEXT    NOT NULL,
    query      TEXT    NOT NULL,
    category   TEXT    NOT NULL DEFAULT '',
    response   TEXT    NOT NULL,
    metadata   TEXT    NOT NULL DEFAULT '{}'
);
CREATE INDEX IF NOT EXISTS idx_interactions_session_time ON interactions (session_id, timestamp, id);
`;

const STATS_SQL = `
SELECT
    COUNT(*) AS total,
    COALESCE(SUM(json_extract(metadata, '$.route') = 'news'), 0)      AS news,
    COALESCE(SUM(json_extract(metadata, '$.route') = 'search'), 0)    AS search,
    COALESCE(SUM(json_extract(metadata, '$.route') = 'qa'), 0)        AS qa,
    COALESCE(SUM(json_extract(metadata, '$.source') = 'fallback'), 0) AS fallbacks,
    COALESCE(SUM(json_extract(metadata, '$.error') IS NOT NULL), 0)   AS errors
FROM interactions
WHERE session_id = ?
`;

function parseRow<T>(schema: z.ZodType<T>, row: Row | undefined, what: string): T {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
        throw new PersistenceError(`Unexpected ${what} row from the session database`, { cause: parsed.error });
    }
    return parsed.data;
}

function toInteraction(row: Row): Interaction {
    const parsed = parseRow(InteractionRowSchema, row, 'interaction');
    return {
        id: String(parsed.id),
        timestamp: new Date(parsed.timestamp),
        sessionId: parsed.session_id,
        query: parsed.query,
        category: parsed.category,
        response: parsed.response,
        metadata: parseMetadata(parsed.metadata)
    };
}

function toDatabaseUrl(filename: string): string {
    return filename === ':memory:' ? ':memory:' : `file:${path.resolve(filename)}`;
}

export interface SqliteSessionStoreOptions {
    /** Database file, or `:memory:`. Parent directories are created on start. */
    filename: string;
}

/**
 * Durable interaction log on SQLite. Appends are single INSERTs and SQLite
 * serializes writers, so independent requests never race on a session.
 */
export class SqliteSessionStore implements SessionStore {
    private client: Client | null = null;

    public constructor(private readonly options: SqliteSessionStoreOptions) { }

    public async start(): Promise<void> {
        if (this.client) return;

        const { filename } = this.options;
        if (filename !== ':memory:') {
            mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
        }

        const client = createClient({ url: toDatabaseUrl(filename) });
        try {
            await client.execute('PRAGMA journal_mode = WAL');
            await client.executeMultiple(MIGRATIONS);
        } catch (error) {
            client.close();
            throw new PersistenceError(`Failed to open session database ${filename}: ${errorMessage(error)}`, { cause: error });
        }
        this.client = client;
    }

    public async close(): Promise<void> {
        this.client?.close();
        this.client = null;
    }

    public async saveInteraction(input: NewInteraction): Promise<Interaction> {
        const client = this.requireClient();
        const timestamp = input.timestamp ?? new Date();

        try {
            const result = await client.execute({
                sql: 'INSERT INTO interactions (session_id, timestamp, query, category, response, metadata) VALUES (?, ?, ?, ?, ?, ?) RETURNING id',
                args: [
                    input.sessionId,
                    timestamp.toISOString(),
                    input.query,
                    input.category,
                    input.response,
                    JSON.stringify(input.metadata)
                ]
            });
            const inserted = parseRow(InsertedRowSchema, result.rows[0], 'inserted');

            return {
                id: String(inserted.id),
                timestamp,
                sessionId: input.sessionId,
                query: input.query,
                category: input.category,
                response: input.response,
                metadata: { ...input.metadata }
            };
        } catch (error) {
            throw new PersistenceError(`Failed to save interaction for session ${input.sessionId}: ${errorMessage(error)}`, { cause: error });
        }
    }

    public async getHistory(sessionId: string, limit: number): Promise<Interaction[]> {
        if (limit <= 0) return [];
        const result = await this.requireClient().execute({
            sql: 'SELECT * FROM interactions WHERE session_id = ? ORDER BY timestamp DESC, id DESC LIMIT ?',
            args: [sessionId, limit]
        });
        return result.rows.map(toInteraction);
    }

    public async clear(sessionId: string): Promise<number> {
        const result = await this.requireClient().execute({
            sql: 'DELETE FROM interactions WHERE session_id = ?',
            args: [sessionId]
        });
        return result.rowsAffected;
    }

    public async stats(sessionId: string): Promise<SessionStats> {
        const result = await this.requireClient().execute({ sql: STATS_SQL, args: [sessionId] });
        const first = result.rows[0];
        if (!first) return emptySessionStats(sessionId);

        const row = parseRow(StatsRowSchema, first, 'stats');
        return {
            sessionId,
            total: row.total,
            byRoute: { news: row.news, search: row.search, qa: row.qa },
            fallbacks: row.fallbacks,
            errors: row.errors
        };
    }

    private requireClient(): Client {
        if (!this.client) {
            throw new PersistenceError('SqliteSessionStore used before start()');
        }
        return this.client;
    }
}
