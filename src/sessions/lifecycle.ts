import { randomUUID } from 'node:crypto'
import type { Clock } from '../core/clock.js'
import { AlreadyRunningError, InvalidArgumentError, NoActiveSessionError, TaskNotFoundError, errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type { Notifier } from '../notify/notifier.js'
import type { GracePolicy, SettingsStore } from '../settings/store.js'
import type { StorageGateway, TerminalStatus } from '../storage/types.js'
import {
    type ActiveSession,
    type EndedSession,
    type ReconcileResult,
    type Session,
    type StartOptions,
    toDomain,
    toRow,
} from './types.js'

const MAX_PLANNED_MINUTES = 600

export interface SessionLifecycleDeps {
    storage: StorageGateway
    settings: SettingsStore
    clock: Clock
    logger: Logger
    notifier?: Notifier
    newId?: () => string
}

/** Whole seconds between two instants; a clock that moved backwards yields 0. */
export function elapsedSeconds(from: Date, to: Date): number {
    return Math.max(0, Math.floor((to.getTime() - from.getTime()) / 1000))
}

export function graceSeconds(policy: GracePolicy, plannedDuration: number): number {
    return policy.kind === 'planned' ? plannedDuration : policy.minutes * 60
}

export function abandonDeadline(session: Session, policy: GracePolicy): Date {
    const offset = session.plannedDuration + graceSeconds(policy, session.plannedDuration)
    return new Date(session.startTime.getTime() + offset * 1000)
}

/**
 * Drives a session through running -> completed | interrupted | abandoned.
 *
 * Nothing lives in memory between invocations: every transition re-reads the
 * running row inside a storage transaction and derives elapsed time from the
 * persisted start time and the clock.
 */
export class SessionLifecycleManager {
    private newId: () => string

    constructor(private deps: SessionLifecycleDeps) {
        this.newId = deps.newId ?? randomUUID
    }

    async start(options: StartOptions = {}): Promise<Session> {
        const { storage, settings, clock, logger } = this.deps
        const plannedMinutes = options.plannedMinutes ?? settings.int('default_duration')
        if (!Number.isInteger(plannedMinutes) || plannedMinutes <= 0 || plannedMinutes > MAX_PLANNED_MINUTES) {
            throw new InvalidArgumentError(`Duration must be a whole number of minutes between 1 and ${MAX_PLANNED_MINUTES}`)
        }

        const session = storage.transact(() => {
            const running = storage.findRunning()
            if (running) throw new AlreadyRunningError(running.id)

            if (options.taskId !== undefined) {
                const task = storage.get('tasks', options.taskId)
                if (!task || !task.active) throw new TaskNotFoundError(options.taskId)
            }

            const created: Session = {
                id: this.newId(),
                taskId: options.taskId ?? null,
                startTime: clock.now(),
                plannedDuration: plannedMinutes * 60,
                status: 'running',
                endTime: null,
                actualDuration: null,
                interruptReason: null,
            }
            storage.put('sessions', created.id, toRow(created))
            return created
        })

        logger.info({ sessionId: session.id, taskId: session.taskId, plannedMinutes }, 'session:started')
        await this.scheduleNotification(session)
        return session
    }

    complete(): EndedSession {
        return this.finish('completed', null)
    }

    interrupt(reason?: string): EndedSession {
        const trimmed = reason?.trim()
        return this.finish('interrupted', trimmed ? trimmed : null)
    }

    /**
     * Abandons a running session whose planned end plus grace has passed.
     * The recorded end is the planned end, since the real one is unknown.
     * Safe to call any number of times.
     */
    reconcile(): ReconcileResult {
        const { storage, settings, clock, logger } = this.deps
        const now = clock.now()
        const policy = settings.gracePolicy()

        const abandoned = storage.transact((): EndedSession | null => {
            const running = storage.findRunning()
            if (!running) return null

            const session = toDomain(running)
            if (now.getTime() < abandonDeadline(session, policy).getTime()) return null

            const ended: EndedSession = {
                ...session,
                status: 'abandoned',
                endTime: new Date(session.startTime.getTime() + session.plannedDuration * 1000),
                actualDuration: session.plannedDuration,
            }
            storage.put('sessions', ended.id, toRow(ended))
            return ended
        })

        if (abandoned) {
            logger.info({ sessionId: abandoned.id, policy }, 'session:abandoned')
        }
        return { abandoned }
    }

    current(): ActiveSession | null {
        const running = this.deps.storage.findRunning()
        if (!running) return null

        const session = toDomain(running)
        const elapsed = elapsedSeconds(session.startTime, this.deps.clock.now())
        return {
            session,
            elapsedSeconds: elapsed,
            remainingSeconds: Math.max(0, session.plannedDuration - elapsed),
            overtime: elapsed > session.plannedDuration,
            abandonAt: abandonDeadline(session, this.deps.settings.gracePolicy()),
        }
    }

    private finish(status: Exclude<TerminalStatus, 'abandoned'>, reason: string | null): EndedSession {
        const { storage, clock, logger } = this.deps

        const ended = storage.transact((): EndedSession => {
            const running = storage.findRunning()
            if (!running) throw new NoActiveSessionError()

            const session = toDomain(running)
            const endTime = clock.now()
            const result: EndedSession = {
                ...session,
                status,
                endTime,
                actualDuration: elapsedSeconds(session.startTime, endTime),
                interruptReason: reason,
            }
            storage.put('sessions', result.id, toRow(result))
            return result
        })

        logger.info({ sessionId: ended.id, actualDuration: ended.actualDuration }, `session:${status}`)
        return ended
    }

    private async scheduleNotification(session: Session): Promise<void> {
        const { notifier, storage, logger } = this.deps
        if (!notifier) return

        try {
            const taskName = session.taskId ? (storage.get('tasks', session.taskId)?.name ?? null) : null
            await notifier.schedule({ sessionId: session.id, delaySeconds: session.plannedDuration, taskName })
        } catch (error) {
            logger.warn({ sessionId: session.id, error: errorMessage(error) }, 'notify:failed')
        }
    }
}
