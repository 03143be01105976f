import { mkdirSync } from 'node:fs'
import path from 'node:path'
import Database from 'better-sqlite3'
import { AlreadyRunningError, StorageError, errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import {
    type SessionRow,
    type StorageGateway,
    TABLE_SCHEMAS,
    type TableName,
    type TableRows,
    rowKey,
} from './types.js'

interface TableLayout {
    key: string
    columns: readonly string[]
    orderBy: string
}

const LAYOUT: Record<TableName, TableLayout> = {
    sessions: {
        key: 'id',
        columns: [
            'id',
            'task_id',
            'start_time',
            'planned_duration',
            'status',
            'end_time',
            'actual_duration',
            'interrupt_reason',
        ],
        orderBy: 'start_time, id',
    },
    tasks: { key: 'id', columns: ['id', 'name', 'created_at', 'active'], orderBy: 'created_at, id' },
    config: { key: 'key', columns: ['key', 'value'], orderBy: 'key' },
}

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sessions (
    id TEXT PRIMARY KEY,
    task_id TEXT,
    start_time TEXT NOT NULL,
    planned_duration INTEGER NOT NULL CHECK (planned_duration > 0),
    status TEXT NOT NULL CHECK (status IN ('running', 'completed', 'interrupted', 'abandoned')),
    end_time TEXT,
    actual_duration INTEGER,
    interrupt_reason TEXT
);
CREATE UNIQUE INDEX IF NOT EXISTS sessions_one_running ON sessions (status) WHERE status = 'running';
CREATE INDEX IF NOT EXISTS sessions_start_time ON sessions (start_time);
CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    created_at TEXT NOT NULL,
    active INTEGER NOT NULL DEFAULT 1
);
CREATE TABLE IF NOT EXISTS config (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
);
`

type SqlValue = string | number | null

function sqliteCode(error: unknown): string | null {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code.startsWith('SQLITE_') ? error.code : null
    }
    return null
}

function toRecord(row: TableRows[TableName]): Record<string, SqlValue> {
    const record: Record<string, SqlValue> = {}
    for (const [column, value] of Object.entries(row)) {
        record[column] = typeof value === 'boolean' ? (value ? 1 : 0) : value
    }
    return record
}

function fromRecord(table: TableName, record: unknown): unknown {
    if (table === 'tasks' && typeof record === 'object' && record !== null) {
        return { ...record, active: 'active' in record && record.active === 1 }
    }
    return record
}

export interface SqliteGatewayOptions {
    /** Database file, or ':memory:' */
    filename: string
    logger: Logger
    busyTimeoutMs?: number
}

export class SqliteStorageGateway implements StorageGateway {
    private db: Database.Database

    constructor(private options: SqliteGatewayOptions) {
        this.db = this.guard('open', () => {
            if (options.filename !== ':memory:') {
                mkdirSync(path.dirname(options.filename), { recursive: true })
            }
            const db = new Database(options.filename)
            db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`)
            db.pragma('journal_mode = WAL')
            db.exec(SCHEMA_SQL)
            return db
        })
        options.logger.debug({ filename: options.filename }, 'storage:open')
    }

    get<T extends TableName>(table: T, key: string): TableRows[T] | null {
        const { key: keyColumn } = LAYOUT[table]
        const record = this.guard(`get ${table}`, () =>
            this.db.prepare(`SELECT * FROM ${table} WHERE ${keyColumn} = ?`).get(key)
        )
        return record === undefined ? null : this.decode(table, record)
    }

    put<T extends TableName>(table: T, key: string, row: TableRows[T]): void {
        const parsed = TABLE_SCHEMAS[table].safeParse(row)
        if (!parsed.success) {
            throw new StorageError(`Refusing to write invalid ${table} row: ${parsed.error.issues[0]?.message}`)
        }
        if (rowKey(parsed.data) !== key) {
            throw new StorageError(`Row key mismatch for ${table}: expected "${key}"`)
        }

        const { key: keyColumn, columns } = LAYOUT[table]
        const updates = columns
            .filter((c) => c !== keyColumn)
            .map((c) => `${c} = excluded.${c}`)
            .join(', ')
        const sql =
            `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${columns.map((c) => `@${c}`).join(', ')}) ` +
            `ON CONFLICT (${keyColumn}) DO UPDATE SET ${updates}`

        try {
            this.db.prepare(sql).run(toRecord(parsed.data))
        } catch (error) {
            if (table === 'sessions' && sqliteCode(error) === 'SQLITE_CONSTRAINT_UNIQUE' && errorMessage(error).includes('sessions.status')) {
                throw new AlreadyRunningError(this.findRunning()?.id ?? 'unknown', { cause: error })
            }
            throw this.wrap(`put ${table}`, error)
        }
    }

    scan<T extends TableName>(table: T, predicate?: (row: TableRows[T]) => boolean): TableRows[T][] {
        const records = this.guard(`scan ${table}`, () =>
            this.db.prepare(`SELECT * FROM ${table} ORDER BY ${LAYOUT[table].orderBy}`).all()
        )
        const rows = records.map((record) => this.decode(table, record))
        return predicate ? rows.filter(predicate) : rows
    }

    findRunning(): SessionRow | null {
        const record = this.guard('find running', () =>
            this.db.prepare(`SELECT * FROM sessions WHERE status = 'running'`).get()
        )
        return record === undefined ? null : this.decode('sessions', record)
    }

    transact<R>(fn: () => R): R {
        try {
            return this.db.transaction(fn).immediate()
        } catch (error) {
            throw sqliteCode(error) ? this.wrap('transaction', error) : error
        }
    }

    close(): void {
        if (this.db.open) this.db.close()
    }

    private decode<T extends TableName>(table: T, record: unknown): TableRows[T] {
        const parsed = TABLE_SCHEMAS[table].safeParse(fromRecord(table, record))
        if (!parsed.success) {
            throw new StorageError(`Corrupt ${table} row in ${this.options.filename}: ${parsed.error.issues[0]?.message}`)
        }
        return parsed.data
    }

    private guard<R>(operation: string, fn: () => R): R {
        try {
            return fn()
        } catch (error) {
            throw this.wrap(operation, error)
        }
    }

    private wrap(operation: string, error: unknown): StorageError {
        if (error instanceof StorageError) return error
        return new StorageError(`Storage ${operation} failed: ${errorMessage(error)}`, { cause: error })
    }
}
