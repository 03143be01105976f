import type { Container } from '../../core/container.js'
import { InvalidArgumentError, errorMessage } from '../../core/errors.js'
import { type ExportFormat, exportData, formatExport, importData } from '../../transfer/transfer.js'
import { type Printer, colors, plural } from '../ui.js'

export function exportCommand(container: Container, printer: Printer, format: ExportFormat): void {
    printer.out(formatExport(exportData(container.storage), format))
}

export async function importCommand(container: Container, printer: Printer, file: string): Promise<void> {
    let raw: unknown
    try {
        raw = await container.fs.readJSON<unknown>(file)
    } catch (error) {
        throw new InvalidArgumentError(`Cannot read ${file}: ${errorMessage(error)}`)
    }

    const summary = importData(container.storage, raw, container.logger)
    printer.out(
        colors.success(
            `Imported ${plural(summary.sessions, 'session')}, ${plural(summary.tasks, 'task')} and ${plural(summary.config, 'config value')}.`
        )
    )
}
