import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import Database from 'better-sqlite3'
import { execa } from 'execa'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { FakeClock } from '../../../src/core/clock.js'
import { AlreadyRunningError, StorageError } from '../../../src/core/errors.js'
import { SessionLifecycleManager } from '../../../src/sessions/lifecycle.js'
import { SettingsStore } from '../../../src/settings/store.js'
import { SqliteStorageGateway } from '../../../src/storage/sqlite-gateway.js'
import { silentLogger } from '../../helpers/fixtures.js'

const startSessionScript = fileURLToPath(new URL('../../fixtures/start-session.ts', import.meta.url))

describe('SqliteStorageGateway on disk', () => {
    let dir: string
    let file: string
    const open: SqliteStorageGateway[] = []

    function connect(): SqliteStorageGateway {
        const gateway = new SqliteStorageGateway({ filename: file, logger: silentLogger() })
        open.push(gateway)
        return gateway
    }

    function lifecycleOn(storage: SqliteStorageGateway, clock: FakeClock, prefix: string): SessionLifecycleManager {
        const logger = silentLogger()
        return new SessionLifecycleManager({
            storage,
            settings: new SettingsStore(storage, logger),
            clock,
            logger,
            newId: () => `${prefix}-session`,
        })
    }

    beforeEach(() => {
        dir = mkdtempSync(path.join(tmpdir(), 'pomotrack-db-'))
        file = path.join(dir, 'nested', 'pomodoro.db')
    })

    afterEach(() => {
        for (const gateway of open.splice(0)) gateway.close()
        rmSync(dir, { recursive: true, force: true })
    })

    it('creates the parent directory and persists across connections', async () => {
        const clock = new FakeClock()
        const first = connect()
        await lifecycleOn(first, clock, 'a').start({ plannedMinutes: 25 })
        first.close()

        const reopened = connect()
        expect(reopened.findRunning()).toMatchObject({
            id: 'a-session',
            start_time: '2026-02-01T09:00:00.000Z',
            planned_duration: 1500,
            status: 'running',
        })
    })

    it('lets exactly one of two connections start a session', async () => {
        const clock = new FakeClock()
        const a = lifecycleOn(connect(), clock, 'a')
        const b = lifecycleOn(connect(), clock, 'b')

        await a.start()
        await expect(b.start()).rejects.toBeInstanceOf(AlreadyRunningError)
        await expect(b.start()).rejects.toMatchObject({ sessionId: 'a-session' })
    })

    it('lets exactly one of two racing processes start a session', async () => {
        connect().close()
        const startAt = String(Date.now() + 2000)
        const race = ['a', 'b'].map((prefix) =>
            execa(process.execPath, ['--import', 'tsx', startSessionScript, file, prefix, startAt], { cwd: process.cwd() })
        )
        const outcomes = (await Promise.all(race)).map((result) => result.stdout.trim())

        const winner = connect().findRunning()
        expect(winner?.id).toMatch(/^[ab]-session$/)
        expect(outcomes.sort()).toEqual([`refused ${winner?.id}`, `started ${winner?.id}`])
        expect(connect().scan('sessions')).toHaveLength(1)
    }, 30_000)

    it('maps the one-running index violation to AlreadyRunningError', () => {
        const a = connect()
        const b = connect()
        const row = {
            task_id: null,
            start_time: '2026-02-01T09:00:00.000Z',
            planned_duration: 1500,
            status: 'running' as const,
            end_time: null,
            actual_duration: null,
            interrupt_reason: null,
        }
        a.put('sessions', 'one', { ...row, id: 'one' })

        expect(() => b.put('sessions', 'two', { ...row, id: 'two' })).toThrow(AlreadyRunningError)
    })

    it('reports corrupt rows as StorageError', () => {
        const gateway = connect()
        const raw = new Database(file)
        raw.prepare(
            `INSERT INTO sessions (id, task_id, start_time, planned_duration, status, end_time, actual_duration, interrupt_reason)
             VALUES ('bad', NULL, 'yesterday', 1500, 'completed', NULL, NULL, NULL)`
        ).run()
        raw.close()

        expect(() => gateway.scan('sessions')).toThrow(StorageError)
        expect(() => gateway.get('sessions', 'bad')).toThrow(/Corrupt sessions row/)
    })
})
