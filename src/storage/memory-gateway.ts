import { AlreadyRunningError, StorageError } from '../core/errors.js'
import { type SessionRow, type StorageGateway, TABLE_SCHEMAS, type TableName, type TableRows, rowKey } from './types.js'

type Tables = { [T in TableName]: Map<string, TableRows[T]> }

function emptyTables(): Tables {
    return { sessions: new Map(), tasks: new Map(), config: new Map() }
}

function copyTables(tables: Tables): Tables {
    return {
        sessions: new Map(tables.sessions),
        tasks: new Map(tables.tasks),
        config: new Map(tables.config),
    }
}

/**
 * Process-local gateway with the same structural guarantees as the SQLite
 * one: validated rows, one running session, all-or-nothing transactions.
 */
export class InMemoryStorageGateway implements StorageGateway {
    private tables: Tables = emptyTables()
    private closed = false

    get<T extends TableName>(table: T, key: string): TableRows[T] | null {
        this.assertOpen()
        const rows: Map<string, TableRows[T]> = this.tables[table]
        const row = rows.get(key)
        return row ? { ...row } : null
    }

    put<T extends TableName>(table: T, key: string, row: TableRows[T]): void {
        this.assertOpen()
        const parsed = TABLE_SCHEMAS[table].safeParse(row)
        if (!parsed.success) {
            throw new StorageError(`Refusing to write invalid ${table} row: ${parsed.error.issues[0]?.message}`)
        }
        if (rowKey(parsed.data) !== key) {
            throw new StorageError(`Row key mismatch for ${table}: expected "${key}"`)
        }
        if (table === 'sessions' && 'status' in parsed.data && parsed.data.status === 'running') {
            const running = this.findRunning()
            if (running && running.id !== key) throw new AlreadyRunningError(running.id)
        }
        const rows: Map<string, TableRows[T]> = this.tables[table]
        rows.set(key, parsed.data)
    }

    scan<T extends TableName>(table: T, predicate?: (row: TableRows[T]) => boolean): TableRows[T][] {
        this.assertOpen()
        const rows: Map<string, TableRows[T]> = this.tables[table]
        const all = [...rows.values()].map((row) => ({ ...row }))
        all.sort((a, b) => sortKey(a).localeCompare(sortKey(b)))
        return predicate ? all.filter(predicate) : all
    }

    findRunning(): SessionRow | null {
        return this.scan('sessions', (row) => row.status === 'running')[0] ?? null
    }

    transact<R>(fn: () => R): R {
        this.assertOpen()
        const snapshot = copyTables(this.tables)
        try {
            return fn()
        } catch (error) {
            this.tables = snapshot
            throw error
        }
    }

    close(): void {
        this.closed = true
    }

    private assertOpen(): void {
        if (this.closed) throw new StorageError('Storage is closed')
    }
}

function sortKey(row: TableRows[TableName]): string {
    if ('start_time' in row) return `${row.start_time}|${row.id}`
    if ('created_at' in row) return `${row.created_at}|${row.id}`
    return row.key
}
