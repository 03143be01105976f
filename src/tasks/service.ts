import { randomUUID } from 'node:crypto'
import type { Clock } from '../core/clock.js'
import { InvalidArgumentError, TaskNotFoundError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type { StorageGateway, TaskRow } from '../storage/types.js'

export interface Task {
    id: string
    name: string
    createdAt: Date
    active: boolean
}

export interface TaskStats {
    task: Task
    completedCount: number
    focusMinutes: number
}

function toTask(row: TaskRow): Task {
    return { id: row.id, name: row.name, createdAt: new Date(row.created_at), active: row.active }
}

export class TaskService {
    constructor(
        private storage: StorageGateway,
        private clock: Clock,
        private logger: Logger,
        private newId: () => string = randomUUID
    ) {}

    add(name: string): Task {
        const trimmed = name.trim()
        if (!trimmed) throw new InvalidArgumentError('Task name cannot be empty')

        const row = this.storage.transact(() => {
            if (this.findRow(trimmed)) throw new InvalidArgumentError(`Task "${trimmed}" already exists`)
            const created: TaskRow = {
                id: this.newId(),
                name: trimmed,
                created_at: this.clock.now().toISOString(),
                active: true,
            }
            this.storage.put('tasks', created.id, created)
            return created
        })

        this.logger.debug({ taskId: row.id, name: row.name }, 'task:added')
        return toTask(row)
    }

    findByName(name: string): Task | null {
        const row = this.findRow(name.trim())
        return row ? toTask(row) : null
    }

    resolveActive(name: string): Task {
        const task = this.findByName(name)
        if (!task || !task.active) throw new TaskNotFoundError(name)
        return task
    }

    archive(name: string): Task {
        const row = this.storage.transact(() => {
            const existing = this.findRow(name.trim())
            if (!existing || !existing.active) throw new TaskNotFoundError(name)
            const archived: TaskRow = { ...existing, active: false }
            this.storage.put('tasks', archived.id, archived)
            return archived
        })
        this.logger.debug({ taskId: row.id }, 'task:archived')
        return toTask(row)
    }

    /** Tasks with completed-pomodoro counts and focus minutes, newest first. */
    list(options: { includeArchived?: boolean } = {}): TaskStats[] {
        const tasks = this.storage.scan('tasks', (row) => options.includeArchived === true || row.active)
        const totals = new Map<string, { count: number; seconds: number }>()

        for (const session of this.storage.scan('sessions', (row) => row.status === 'completed' && row.task_id !== null)) {
            if (session.task_id === null) continue
            const entry = totals.get(session.task_id) ?? { count: 0, seconds: 0 }
            entry.count += 1
            entry.seconds += session.actual_duration ?? 0
            totals.set(session.task_id, entry)
        }

        return tasks.reverse().map((row) => {
            const entry = totals.get(row.id)
            return {
                task: toTask(row),
                completedCount: entry?.count ?? 0,
                focusMinutes: Math.floor((entry?.seconds ?? 0) / 60),
            }
        })
    }

    private findRow(name: string): TaskRow | null {
        return this.storage.scan('tasks', (row) => row.name === name)[0] ?? null
    }
}
