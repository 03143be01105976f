import { describe, expect, it } from 'vitest'
import { InvalidArgumentError, InvalidConfigError } from '../../../src/core/errors.js'
import { InMemoryStorageGateway } from '../../../src/storage/memory-gateway.js'
import { exportData, formatExport, importData, parseExport } from '../../../src/transfer/transfer.js'
import { sessionRow, silentLogger, taskRow } from '../../helpers/fixtures.js'

function seeded(): InMemoryStorageGateway {
    const storage = new InMemoryStorageGateway()
    storage.put('tasks', 't1', taskRow('t1', 'Write report'))
    storage.put('config', 'daily_goal', { key: 'daily_goal', value: '4' })
    for (const row of [
        sessionRow('2026-02-01T09:00:00Z', 'completed', 25, { task_id: 't1' }),
        sessionRow('2026-02-01T10:00:00Z', 'interrupted', 25, { actual_duration: 420, interrupt_reason: 'meeting' }),
        sessionRow('2026-02-01T11:00:00Z', 'running'),
    ]) {
        storage.put('sessions', row.id, row)
    }
    return storage
}

describe('transfer', () => {
    it('exports every table as stored', () => {
        const document = exportData(seeded())
        expect(document.version).toBe(1)
        expect(document.sessions.map((s) => s.status)).toEqual(['completed', 'interrupted', 'running'])
        expect(document.tasks).toEqual([taskRow('t1', 'Write report')])
        expect(document.config).toEqual([{ key: 'daily_goal', value: '4' }])
    })

    it('formats JSON that parses back to the same document', () => {
        const document = exportData(seeded())
        expect(JSON.parse(formatExport(document, 'json'))).toEqual(document)
    })

    it('imports an export into an empty store unchanged', () => {
        const document = exportData(seeded())
        const target = new InMemoryStorageGateway()

        const summary = importData(target, JSON.parse(formatExport(document, 'json')), silentLogger())

        expect(summary).toEqual({ sessions: 3, tasks: 1, config: 1 })
        expect(exportData(target)).toEqual(document)
    })

    it('rejects documents that are not exports', () => {
        expect(() => parseExport({ version: 2, sessions: [], tasks: [], config: [] })).toThrow(
            /^Not a valid export file at version/
        )
        expect(() => parseExport('hello')).toThrow(InvalidArgumentError)
    })

    it('rejects more than one running session', () => {
        const document = {
            version: 1,
            sessions: [sessionRow('2026-02-01T09:00:00Z', 'running'), sessionRow('2026-02-01T10:00:00Z', 'running')],
            tasks: [],
            config: [],
        }
        expect(() => parseExport(document)).toThrow('Export file has 2 running sessions; at most one is allowed')
    })

    it('rejects an ended session without an end time', () => {
        const target = new InMemoryStorageGateway()
        const document = {
            version: 1,
            sessions: [{ ...sessionRow('2026-02-01T09:00:00Z', 'completed'), end_time: null }],
            tasks: [],
            config: [],
        }

        expect(() => importData(target, document, silentLogger())).toThrow(
            'Not a valid export file at sessions.0: end_time and actual_duration must be set exactly when the session has ended'
        )
        expect(target.scan('sessions')).toEqual([])
    })

    it('validates config rows', () => {
        const base = { version: 1, sessions: [], tasks: [] }
        expect(() => parseExport({ ...base, config: [{ key: 'volume', value: '11' }] })).toThrow(InvalidConfigError)
        expect(() => parseExport({ ...base, config: [{ key: 'daily_goal', value: '-3' }] })).toThrow(
            'Invalid value for daily_goal in export file: must be >= 0'
        )
    })

    it('imports nothing when a task name clashes', () => {
        const target = new InMemoryStorageGateway()
        target.put('tasks', 'existing', taskRow('existing', 'Review PRs'))
        const document = {
            version: 1,
            sessions: [],
            tasks: [taskRow('fresh', 'Write report'), taskRow('other', 'Review PRs')],
            config: [],
        }

        expect(() => importData(target, document, silentLogger())).toThrow(
            'Task "Review PRs" already exists with a different id'
        )
        expect(target.get('tasks', 'fresh')).toBeNull()
    })
})
