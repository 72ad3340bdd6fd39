import Database from 'better-sqlite3';
import { appendFile, mkdir } from 'node:fs/promises';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Config } from '../config.js';
import type { LogEntry } from './types.js';

/**
 * Durable destination for activity log entries. Appends are awaited one at a time.
 */
export interface ActivitySink {
    readonly description: string;
    append(entry: LogEntry): Promise<void> | void;
    close(): void;
}

/**
 * One JSON object per line.
 */
export class JsonLinesFileSink implements ActivitySink {
    private dirReady = false;

    constructor(private path: string) { }

    get description(): string {
        return this.path;
    }

    async append(entry: LogEntry): Promise<void> {
        if (!this.dirReady) {
            await mkdir(dirname(this.path), { recursive: true });
            this.dirReady = true;
        }
        await appendFile(this.path, `${JSON.stringify(entry)}\n`, 'utf-8');
    }

    close(): void { }
}

interface ActivityRow {
    id: number;
    timestamp: string;
    attempt_index: number;
    topic_title: string;
    credential_username: string;
    status: string;
    topic_id: number | null;
    post_number: number | null;
    url: string | null;
    error_kind: string | null;
    error_detail: string | null;
}

export class SqliteSink implements ActivitySink {
    private db: Database.Database;

    constructor(private path: string) {
        if (path !== ':memory:') {
            const dataDir = dirname(path);
            if (!existsSync(dataDir)) {
                mkdirSync(dataDir, { recursive: true });
            }
        }

        this.db = new Database(path);
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('synchronous = NORMAL');
        this.initializeSchema();
    }

    get description(): string {
        return `sqlite:${this.path}`;
    }

    private initializeSchema(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS activity (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                timestamp TEXT NOT NULL,
                attempt_index INTEGER NOT NULL,
                topic_title TEXT NOT NULL,
                credential_username TEXT NOT NULL,
                status TEXT NOT NULL,
                topic_id INTEGER,
                post_number INTEGER,
                url TEXT,
                error_kind TEXT,
                error_detail TEXT
            );
        `);
    }

    append(entry: LogEntry): void {
        this.db.prepare(`
            INSERT INTO activity (timestamp, attempt_index, topic_title, credential_username, status, topic_id, post_number, url, error_kind, error_detail)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
            entry.timestamp,
            entry.attemptIndex,
            entry.topicTitle,
            entry.credentialUsername,
            entry.status,
            entry.topicId ?? null,
            entry.postNumber ?? null,
            entry.url ?? null,
            entry.errorKind ?? null,
            entry.errorDetail ?? null
        );
    }

    /**
     * Entries in insertion order.
     */
    getEntries(): ActivityRow[] {
        return this.db.prepare<[], ActivityRow>('SELECT * FROM activity ORDER BY id ASC').all();
    }

    close(): void {
        this.db.close();
    }
}

export function createActivitySink(config: Pick<Config, 'LOG_SINK' | 'LOG_FILE' | 'LOG_DB_PATH'>): ActivitySink {
    switch (config.LOG_SINK) {
        case 'sqlite':
            return new SqliteSink(config.LOG_DB_PATH);
        case 'file':
        default:
            return new JsonLinesFileSink(config.LOG_FILE);
    }
}
