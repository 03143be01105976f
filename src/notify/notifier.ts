import { execa } from 'execa'
import type { Logger } from '../logger/index.js'

export interface NotificationRequest {
    sessionId: string
    /** Seconds from now until the planned end */
    delaySeconds: number
    taskName: string | null
}

export interface Notifier {
    schedule(request: NotificationRequest): Promise<void>
}

/**
 * Hands the notification to a user command, e.g.
 * `sleep $POMOTRACK_DELAY_SECONDS && notify-send "Pomodoro done"`.
 * The command runs detached so this process can exit right away; waiting
 * is the command's job.
 */
export class CommandNotifier implements Notifier {
    constructor(
        private command: string,
        private logger: Logger
    ) {}

    async schedule(request: NotificationRequest): Promise<void> {
        const subprocess = execa(this.command, {
            shell: true,
            detached: true,
            cleanup: false,
            stdio: 'ignore',
            reject: false,
            env: {
                POMOTRACK_SESSION_ID: request.sessionId,
                POMOTRACK_DELAY_SECONDS: String(request.delaySeconds),
                POMOTRACK_TASK: request.taskName ?? '',
            },
        })
        subprocess.unref()

        if (subprocess.pid === undefined) {
            throw new Error(`Could not spawn notify command "${this.command}"`)
        }
        void subprocess.then((result) => {
            if (result.failed) this.logger.warn({ command: this.command, exitCode: result.exitCode }, 'notify:command-failed')
        })
        this.logger.debug({ command: this.command, pid: subprocess.pid, ...request }, 'notify:scheduled')
    }
}
