import { Command, InvalidArgumentError as CommanderArgumentError, Option } from 'commander'
import { APP_NAME } from '../config/defaults.js'
import { loadConfig } from '../config/loader.js'
import type { Config, ResolvedConfig } from '../config/schema.js'
import { type Container, createContainer } from '../core/container.js'
import { StorageError, errorMessage, exitCodeFor } from '../core/errors.js'
import { type FileSystem, NodeFileSystem } from '../core/fs.js'
import { EXPORT_FORMATS, type ExportFormat } from '../transfer/transfer.js'
import { configCommand } from './commands/config-cmd.js'
import { type ReportFlags, heatmapCommand, streakCommand, todayCommand, weekCommand } from './commands/report-cmd.js'
import { completeCommand, interruptCommand, startCommand, statusCommand } from './commands/session-cmd.js'
import { taskAddCommand, taskArchiveCommand, taskListCommand } from './commands/task-cmd.js'
import { exportCommand, importCommand } from './commands/transfer-cmd.js'
import { type Printer, colors, consolePrinter, formatError, formatMinutes } from './ui.js'

interface GlobalOptions {
    dataDir?: string
    debug?: boolean
    chart: boolean
}

export interface ProgramDeps {
    fs?: FileSystem
    printer?: Printer
    env?: NodeJS.ProcessEnv
    projectDir?: string
    containerFactory?: (config: ResolvedConfig) => Container
    setExitCode?: (code: number) => void
    /** Applied before any subcommand exists, so they inherit it (exitOverride, configureOutput). */
    configure?: (program: Command) => void
}

type Handler = (container: Container, printer: Printer, command: Command) => Promise<void> | void

function positiveInt(name: string) {
    return (raw: string): number => {
        if (!/^\d+$/.test(raw.trim())) throw new CommanderArgumentError(`${name} must be a positive integer.`)
        return Number.parseInt(raw, 10)
    }
}

function reportFlags(command: Command): ReportFlags {
    return { chart: command.optsWithGlobals<GlobalOptions>().chart }
}

/** Stale running sessions are closed before any command looks at the data. */
function reconcile(container: Container, printer: Printer): void {
    try {
        const { abandoned } = container.lifecycle.reconcile()
        if (abandoned) {
            printer.err(
                colors.warn(
                    `Session started ${abandoned.startTime.toISOString()} was never completed; recorded as abandoned (${formatMinutes(abandoned.actualDuration)}).`
                )
            )
        }
    } catch (error) {
        if (error instanceof StorageError) throw error
        container.logger.warn({ error: errorMessage(error) }, 'reconcile:failed')
    }
}

export function createProgram(deps: ProgramDeps = {}): Command {
    const fs = deps.fs ?? new NodeFileSystem()
    const printer = deps.printer ?? consolePrinter
    const setExitCode =
        deps.setExitCode ??
        ((code: number) => {
            process.exitCode = code
        })
    const program = new Command()
    deps.configure?.(program)

    const run =
        (handler: Handler) =>
        async (...actionArgs: unknown[]): Promise<void> => {
            const command = actionArgs[actionArgs.length - 1]
            if (!(command instanceof Command)) throw new Error('commander did not pass the command object')
            const globals = command.optsWithGlobals<GlobalOptions>()

            let container: Container | null = null
            try {
                const cliFlags: Partial<Config> = {
                    dataDir: globals.dataDir,
                    logLevel: globals.debug ? 'debug' : undefined,
                    charts: globals.chart === false ? false : undefined,
                }
                const config = await loadConfig({ fs, cliFlags, env: deps.env, projectDir: deps.projectDir })
                container = deps.containerFactory ? deps.containerFactory(config) : createContainer(config)

                reconcile(container, printer)
                await handler(container, printer, command)
            } catch (error) {
                container?.logger.debug({ error }, 'command:failed')
                printer.err(formatError(errorMessage(error)))
                setExitCode(exitCodeFor(error))
            } finally {
                container?.shutdown()
            }
        }

    program
        .name(APP_NAME)
        .description('Pomodoro timer with streaks, heatmaps and goal tracking')
        .version('0.1.0')
        .option('-d, --data-dir <path>', 'Directory holding the session database')
        .option('--debug', 'Enable debug logging')
        .option('--no-chart', 'Skip chart image generation for reports')

    program
        .command('start')
        .description('Start a Pomodoro session')
        .option('-t, --task <name>', 'Task to attribute the session to')
        .option('--duration <minutes>', 'Planned minutes (default: the default_duration setting)', positiveInt('duration'))
        .action(
            run((container, out, command) => {
                const opts = command.opts<{ task?: string; duration?: number }>()
                return startCommand(container, out, { task: opts.task, duration: opts.duration })
            })
        )

    program
        .command('complete')
        .description('Complete the running session')
        .action(run((container, out) => completeCommand(container, out)))

    program
        .command('interrupt')
        .description('Interrupt the running session')
        .option('-r, --reason <text>', 'Why the session was interrupted')
        .action(run((container, out, command) => interruptCommand(container, out, command.opts<{ reason?: string }>().reason)))

    program
        .command('status')
        .description('Show the running session')
        .action(run((container, out) => statusCommand(container, out)))

    program
        .command('today')
        .description("Show today's summary")
        .action(run((container, out, command) => todayCommand(container, out, reportFlags(command))))

    program
        .command('week')
        .description('Show the Monday-start week summary')
        .option('--date <yyyy-mm-dd>', 'Any day of the week to show (default: today)')
        .action(
            run((container, out, command) =>
                weekCommand(container, out, reportFlags(command), command.opts<{ date?: string }>().date)
            )
        )

    program
        .command('heatmap')
        .description('Show a monthly calendar heatmap')
        .option('--year <year>', 'Year (default: current)', positiveInt('year'))
        .option('--month <month>', 'Month 1-12 (default: current)', positiveInt('month'))
        .action(
            run((container, out, command) =>
                heatmapCommand(container, out, reportFlags(command), command.opts<{ year?: number; month?: number }>())
            )
        )

    program
        .command('streak')
        .description('Show current and longest goal streaks')
        .action(run((container, out) => streakCommand(container, out)))

    const task = program.command('task').description('Manage tasks')
    task.command('add')
        .argument('[name]', 'Task name (prompted for when omitted)')
        .description('Add a task')
        .action(run((container, out, command) => taskAddCommand(container, out, command.args[0])))
    task.command('list')
        .description('List tasks with their pomodoro totals')
        .option('-a, --all', 'Include archived tasks')
        .action(run((container, out, command) => taskListCommand(container, out, command.opts<{ all?: boolean }>())))
    task.command('archive')
        .argument('<name>', 'Task to archive')
        .description('Archive a task so it can no longer be started')
        .action(run((container, out, command) => taskArchiveCommand(container, out, command.args[0] ?? '')))

    program
        .command('config')
        .argument('[key]', 'Setting to show or change')
        .argument('[value]', 'New value')
        .description('Show or change settings (daily_goal, default_duration, grace_period, zero_goal_days)')
        // a negative value such as -1 is an operand, validated by the settings store
        .allowUnknownOption()
        .action(run((container, out, command) => configCommand(container, out, command.args[0], command.args[1])))

    program
        .command('export')
        .description('Print all data')
        .addOption(new Option('-f, --format <format>', 'Output format').choices(EXPORT_FORMATS).default('json'))
        .action(
            run((container, out, command) => exportCommand(container, out, command.opts<{ format: ExportFormat }>().format))
        )

    program
        .command('import')
        .argument('<file>', 'Export file to load')
        .description('Load an export file, replacing rows with the same ids')
        .action(run((container, out, command) => importCommand(container, out, command.args[0] ?? '')))

    return program
}
