import type { Container } from '../../core/container.js'
import { InvalidArgumentError } from '../../core/errors.js'
import { askTaskName, canPrompt } from '../prompts.js'
import { type Printer, colors, plural } from '../ui.js'

export async function taskAddCommand(container: Container, printer: Printer, name?: string): Promise<void> {
    let taskName = name
    if (taskName === undefined && canPrompt()) {
        taskName = (await askTaskName()) ?? undefined
        if (taskName === undefined) {
            printer.out(colors.dim('Cancelled.'))
            return
        }
    }
    if (taskName === undefined) throw new InvalidArgumentError('Please provide a task name')

    const task = container.tasks.add(taskName)
    printer.out(colors.success(`Task "${task.name}" added.`))
}

export function taskListCommand(container: Container, printer: Printer, options: { all?: boolean }): void {
    const stats = container.tasks.list({ includeArchived: options.all })
    if (stats.length === 0) {
        printer.out('No tasks yet. Add one with `task add NAME`.')
        return
    }

    for (const { task, completedCount, focusMinutes } of stats) {
        const suffix = task.active ? '' : colors.dim(' (archived)')
        printer.out(`  • ${task.name}${suffix}`)
        printer.out(
            colors.dim(
                `    ${plural(completedCount, 'pomodoro')} | ${focusMinutes} min | created ${task.createdAt.toISOString().slice(0, 10)}`
            )
        )
    }
}

export function taskArchiveCommand(container: Container, printer: Printer, name: string): void {
    const task = container.tasks.archive(name)
    printer.out(`Task "${task.name}" archived.`)
}
