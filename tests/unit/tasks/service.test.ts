import { beforeEach, describe, expect, it } from 'vitest'
import { FakeClock } from '../../../src/core/clock.js'
import { InvalidArgumentError, TaskNotFoundError } from '../../../src/core/errors.js'
import { InMemoryStorageGateway } from '../../../src/storage/memory-gateway.js'
import { TaskService } from '../../../src/tasks/service.js'
import { sessionRow, silentLogger } from '../../helpers/fixtures.js'

describe('TaskService', () => {
    let storage: InMemoryStorageGateway
    let clock: FakeClock
    let tasks: TaskService

    beforeEach(() => {
        storage = new InMemoryStorageGateway()
        clock = new FakeClock()
        let ids = 0
        tasks = new TaskService(storage, clock, silentLogger(), () => `task-${++ids}`)
    })

    it('adds a task with a trimmed name', () => {
        const task = tasks.add('  Write report ')
        expect(task).toEqual({
            id: 'task-1',
            name: 'Write report',
            createdAt: new Date('2026-02-01T09:00:00Z'),
            active: true,
        })
        expect(tasks.findByName('Write report')?.id).toBe('task-1')
    })

    it('rejects empty and duplicate names', () => {
        tasks.add('Write report')
        expect(() => tasks.add('   ')).toThrow('Task name cannot be empty')
        expect(() => tasks.add('Write report ')).toThrow(InvalidArgumentError)
        expect(() => tasks.add('Write report')).toThrow('Task "Write report" already exists')
    })

    it('resolves only active tasks', () => {
        tasks.add('Write report')
        expect(tasks.resolveActive('Write report').name).toBe('Write report')
        expect(() => tasks.resolveActive('Nope')).toThrow('No active task "Nope". Add it with `task add`.')
    })

    it('archives a task', () => {
        tasks.add('Write report')
        expect(tasks.archive('Write report').active).toBe(false)
        expect(() => tasks.resolveActive('Write report')).toThrow(TaskNotFoundError)
        expect(() => tasks.archive('Write report')).toThrow(TaskNotFoundError)
    })

    it('lists tasks newest first with completed totals', () => {
        const older = tasks.add('Write report')
        clock.advanceMinutes(5)
        tasks.add('Review PRs')

        for (const row of [
            sessionRow('2026-02-01T10:00:00Z', 'completed', 25, { task_id: older.id, actual_duration: 1500 }),
            sessionRow('2026-02-01T11:00:00Z', 'completed', 25, { task_id: older.id, actual_duration: 1530 }),
            sessionRow('2026-02-01T12:00:00Z', 'interrupted', 25, { task_id: older.id, actual_duration: 300 }),
        ]) {
            storage.put('sessions', row.id, row)
        }

        const stats = tasks.list()
        expect(stats.map((s) => s.task.name)).toEqual(['Review PRs', 'Write report'])
        expect(stats[0]).toMatchObject({ completedCount: 0, focusMinutes: 0 })
        expect(stats[1]).toMatchObject({ completedCount: 2, focusMinutes: 50 })
    })

    it('hides archived tasks unless asked', () => {
        tasks.add('Write report')
        tasks.add('Review PRs')
        tasks.archive('Review PRs')

        expect(tasks.list().map((s) => s.task.name)).toEqual(['Write report'])
        expect(tasks.list({ includeArchived: true })).toHaveLength(2)
    })
})
