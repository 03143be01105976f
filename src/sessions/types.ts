import type { SessionRow, SessionStatus, TerminalStatus } from '../storage/types.js'

export interface Session {
    id: string
    taskId: string | null
    startTime: Date
    /** seconds */
    plannedDuration: number
    status: SessionStatus
    endTime: Date | null
    /** seconds */
    actualDuration: number | null
    interruptReason: string | null
}

export interface EndedSession extends Session {
    status: TerminalStatus
    endTime: Date
    actualDuration: number
}

export interface StartOptions {
    taskId?: string
    /** Defaults to the `default_duration` setting */
    plannedMinutes?: number
}

export interface ActiveSession {
    session: Session
    elapsedSeconds: number
    remainingSeconds: number
    overtime: boolean
    /** When reconciliation will abandon the session if nothing else happens */
    abandonAt: Date
}

export interface ReconcileResult {
    abandoned: EndedSession | null
}

export function isEnded(session: Session): session is EndedSession {
    return session.status !== 'running' && session.endTime !== null && session.actualDuration !== null
}

export function toDomain(row: SessionRow): Session {
    return {
        id: row.id,
        taskId: row.task_id,
        startTime: new Date(row.start_time),
        plannedDuration: row.planned_duration,
        status: row.status,
        endTime: row.end_time === null ? null : new Date(row.end_time),
        actualDuration: row.actual_duration,
        interruptReason: row.interrupt_reason,
    }
}

export function toRow(session: Session): SessionRow {
    return {
        id: session.id,
        task_id: session.taskId,
        start_time: session.startTime.toISOString(),
        planned_duration: session.plannedDuration,
        status: session.status,
        end_time: session.endTime?.toISOString() ?? null,
        actual_duration: session.actualDuration,
        interrupt_reason: session.interruptReason,
    }
}
