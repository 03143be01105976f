export type ErrorKind = 'recoverable' | 'fatal'

export class PomotrackError extends Error {
    readonly kind: ErrorKind
    readonly code: string

    constructor(message: string, code: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'PomotrackError'
        this.code = code
        this.kind = kind
    }
}

export class AlreadyRunningError extends PomotrackError {
    readonly sessionId: string

    constructor(sessionId: string, options?: ErrorOptions) {
        super(
            `A session is already running (${sessionId}). Complete or interrupt it first.`,
            'ALREADY_RUNNING',
            'recoverable',
            options
        )
        this.name = 'AlreadyRunningError'
        this.sessionId = sessionId
    }
}

export class NoActiveSessionError extends PomotrackError {
    constructor() {
        super('No active session. Start one first.', 'NO_ACTIVE_SESSION', 'recoverable')
        this.name = 'NoActiveSessionError'
    }
}

export class InvalidConfigError extends PomotrackError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'INVALID_CONFIG', 'recoverable', options)
        this.name = 'InvalidConfigError'
    }
}

export class InvalidArgumentError extends PomotrackError {
    constructor(message: string) {
        super(message, 'INVALID_ARGUMENT', 'recoverable')
        this.name = 'InvalidArgumentError'
    }
}

export class TaskNotFoundError extends PomotrackError {
    constructor(task: string) {
        super(`No active task "${task}". Add it with \`task add\`.`, 'TASK_NOT_FOUND', 'recoverable')
        this.name = 'TaskNotFoundError'
    }
}

export class RenderError extends PomotrackError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'RENDER_FAILED', 'recoverable', options)
        this.name = 'RenderError'
    }
}

export class StorageError extends PomotrackError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'STORAGE_FAILED', 'fatal', options)
        this.name = 'StorageError'
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof PomotrackError) return error.kind
    return 'fatal'
}

export function exitCodeFor(error: unknown): number {
    return classifyError(error) === 'recoverable' ? 1 : 2
}
