import { z } from 'zod'

export const SESSION_STATUSES = ['running', 'completed', 'interrupted', 'abandoned'] as const
export type SessionStatus = (typeof SESSION_STATUSES)[number]
export type TerminalStatus = Exclude<SessionStatus, 'running'>

const isoTimestamp = z.string().datetime({ offset: true })

export const SessionRowSchema = z
    .object({
        id: z.string().min(1),
        task_id: z.string().min(1).nullable(),
        start_time: isoTimestamp,
        /** seconds */
        planned_duration: z.number().int().positive(),
        status: z.enum(SESSION_STATUSES),
        end_time: isoTimestamp.nullable(),
        /** seconds */
        actual_duration: z.number().int().min(0).nullable(),
        interrupt_reason: z.string().nullable(),
    })
    .refine(
        (row) =>
            row.status === 'running'
                ? row.end_time === null && row.actual_duration === null
                : row.end_time !== null && row.actual_duration !== null,
        { message: 'end_time and actual_duration must be set exactly when the session has ended' }
    )

export const TaskRowSchema = z.object({
    id: z.string().min(1),
    name: z.string().trim().min(1),
    created_at: isoTimestamp,
    active: z.boolean(),
})

export const ConfigRowSchema = z.object({
    key: z.string().min(1),
    value: z.string(),
})

export type SessionRow = z.infer<typeof SessionRowSchema>
export type TaskRow = z.infer<typeof TaskRowSchema>
export type ConfigRow = z.infer<typeof ConfigRowSchema>

export interface TableRows {
    sessions: SessionRow
    tasks: TaskRow
    config: ConfigRow
}

export type TableName = keyof TableRows

export const TABLE_SCHEMAS: { [T in TableName]: z.ZodType<TableRows[T]> } = {
    sessions: SessionRowSchema,
    tasks: TaskRowSchema,
    config: ConfigRowSchema,
}

export function rowKey(row: TableRows[TableName]): string {
    return 'key' in row ? row.key : row.id
}

/**
 * Durable keyed table store. All calls are synchronous; `transact` runs `fn`
 * holding the database write lock, so a read-then-write inside it cannot
 * interleave with another process doing the same.
 */
export interface StorageGateway {
    get<T extends TableName>(table: T, key: string): TableRows[T] | null
    put<T extends TableName>(table: T, key: string, row: TableRows[T]): void
    scan<T extends TableName>(table: T, predicate?: (row: TableRows[T]) => boolean): TableRows[T][]
    /** Running session row, if any. Backed by the one-running-row index. */
    findRunning(): SessionRow | null
    transact<R>(fn: () => R): R
    close(): void
}
