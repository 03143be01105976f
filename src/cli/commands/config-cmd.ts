import type { Container } from '../../core/container.js'
import { InvalidConfigError } from '../../core/errors.js'
import { SETTING_KEYS, formatSettingValue, isSettingKey } from '../../settings/keys.js'
import { type Printer, colors } from '../ui.js'

export function configCommand(container: Container, printer: Printer, key?: string, value?: string): void {
    const { settings } = container

    if (!key) {
        for (const entry of settings.list()) {
            const marker = entry.isDefault ? colors.dim(' (default)') : ''
            printer.out(`${entry.key} = ${formatSettingValue(entry.value)}${marker}`)
            printer.out(colors.dim(`    ${entry.description}`))
        }
        return
    }

    if (value === undefined) {
        if (!isSettingKey(key)) {
            throw new InvalidConfigError(`Unknown config key "${key}". Known keys: ${SETTING_KEYS.join(', ')}`)
        }
        printer.out(`${key} = ${formatSettingValue(settings.get(key))}`)
        return
    }

    const stored = settings.set(key, value)
    printer.out(colors.success(`${key} set to ${formatSettingValue(stored)}`))
}
