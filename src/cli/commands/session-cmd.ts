import type { Container } from '../../core/container.js'
import { type Printer, colors, formatClock, formatMinutes } from '../ui.js'

export interface StartArgs {
    task?: string
    duration?: number
}

export async function startCommand(container: Container, printer: Printer, args: StartArgs): Promise<void> {
    const task = args.task === undefined ? null : container.tasks.resolveActive(args.task)
    const session = await container.lifecycle.start({ taskId: task?.id, plannedMinutes: args.duration })

    printer.out(colors.success(`Pomodoro started: ${formatMinutes(session.plannedDuration)}.`))
    printer.out(`Task: ${task ? task.name : colors.dim('none')}`)
    printer.out(colors.dim('Run `complete` when done, or `interrupt` if you get pulled away.'))
}

export function completeCommand(container: Container, printer: Printer): void {
    const session = container.lifecycle.complete()
    printer.out(colors.success(`Pomodoro completed after ${formatMinutes(session.actualDuration)}.`))
}

export function interruptCommand(container: Container, printer: Printer, reason?: string): void {
    const session = container.lifecycle.interrupt(reason)
    printer.out(colors.warn(`Pomodoro interrupted after ${formatMinutes(session.actualDuration)}.`))
    printer.out(`Reason: ${session.interruptReason ?? colors.dim('not specified')}`)
}

export function statusCommand(container: Container, printer: Printer): void {
    const active = container.lifecycle.current()
    if (!active) {
        printer.out('No active session.')
        return
    }

    const { session } = active
    const taskName = session.taskId ? container.storage.get('tasks', session.taskId)?.name : undefined
    printer.out(`Running since ${session.startTime.toISOString()}${taskName ? ` on "${taskName}"` : ''}`)
    printer.out(`Elapsed: ${formatClock(active.elapsedSeconds)} of ${formatClock(session.plannedDuration)}`)
    if (active.overtime) {
        printer.out(colors.warn(`Planned time is up. Abandoned automatically at ${active.abandonAt.toISOString()}.`))
    } else {
        printer.out(`Remaining: ${formatClock(active.remainingSeconds)}`)
    }
}
