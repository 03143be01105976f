import pino from 'pino'
import { FakeClock } from '../../src/core/clock.js'
import type { Logger } from '../../src/logger/index.js'
import type { Notifier } from '../../src/notify/notifier.js'
import { SessionLifecycleManager } from '../../src/sessions/lifecycle.js'
import { type Session, toDomain } from '../../src/sessions/types.js'
import { SettingsStore } from '../../src/settings/store.js'
import { InMemoryStorageGateway } from '../../src/storage/memory-gateway.js'
import type { SessionRow, SessionStatus, TaskRow } from '../../src/storage/types.js'

export function silentLogger(): Logger {
    return pino({ level: 'silent' })
}

let sequence = 0

/** Ended rows default to ending exactly at the planned end. */
export function sessionRow(
    start: string,
    status: SessionStatus,
    minutes = 25,
    overrides: Partial<SessionRow> = {}
): SessionRow {
    sequence += 1
    const planned = minutes * 60
    const startDate = new Date(start)
    const ended = status !== 'running'
    return {
        id: `row-${sequence}`,
        task_id: null,
        start_time: startDate.toISOString(),
        planned_duration: planned,
        status,
        end_time: ended ? new Date(startDate.getTime() + planned * 1000).toISOString() : null,
        actual_duration: ended ? planned : null,
        interrupt_reason: null,
        ...overrides,
    }
}

export function session(start: string, status: SessionStatus, minutes = 25, overrides: Partial<SessionRow> = {}): Session {
    return toDomain(sessionRow(start, status, minutes, overrides))
}

export function taskRow(id: string, name: string, createdAt = '2026-01-15T08:00:00Z', active = true): TaskRow {
    return { id, name, created_at: new Date(createdAt).toISOString(), active }
}

export function lifecycleFixture(options: { clock?: FakeClock; notifier?: Notifier } = {}) {
    const storage = new InMemoryStorageGateway()
    const logger = silentLogger()
    const clock = options.clock ?? new FakeClock()
    const settings = new SettingsStore(storage, logger)
    let ids = 0
    const lifecycle = new SessionLifecycleManager({
        storage,
        settings,
        clock,
        logger,
        notifier: options.notifier,
        newId: () => `session-${++ids}`,
    })
    return { storage, logger, clock, settings, lifecycle }
}
