import { InvalidConfigError } from '../core/errors.js'
import type { GoalSettings } from '../goals/evaluator.js'
import type { Logger } from '../logger/index.js'
import type { StorageGateway } from '../storage/types.js'
import {
    SETTING_KEYS,
    SETTINGS,
    type SettingKey,
    type SettingValue,
    formatSettingValue,
    isSettingKey,
} from './keys.js'

/** Grace before abandonment: a fixed number of minutes, or one more planned duration. */
export type GracePolicy = { kind: 'planned' } | { kind: 'fixed'; minutes: number }

export interface SettingEntry {
    key: SettingKey
    value: SettingValue
    isDefault: boolean
    description: string
}

/**
 * Typed access to the `config` table. Values are stored as text and
 * re-validated on every read, so a hand-edited row cannot leak through.
 */
export class SettingsStore {
    constructor(
        private storage: StorageGateway,
        private logger: Logger
    ) {}

    get(key: SettingKey): SettingValue {
        const row = this.storage.get('config', key)
        if (!row) return SETTINGS[key].defaultValue

        const parsed = SETTINGS[key].parse(row.value)
        if (!parsed.ok) {
            this.logger.warn({ key, value: row.value, reason: parsed.error }, 'settings:invalid-stored-value')
            return SETTINGS[key].defaultValue
        }
        return parsed.value
    }

    set(key: string, raw: string): SettingValue {
        if (!isSettingKey(key)) {
            throw new InvalidConfigError(`Unknown config key "${key}". Known keys: ${SETTING_KEYS.join(', ')}`)
        }
        const parsed = SETTINGS[key].parse(raw)
        if (!parsed.ok) {
            throw new InvalidConfigError(`Invalid value for ${key}: ${parsed.error}`)
        }

        const value = formatSettingValue(parsed.value)
        this.storage.put('config', key, { key, value })
        this.logger.debug({ key, value }, 'settings:set')
        return parsed.value
    }

    list(): SettingEntry[] {
        return SETTING_KEYS.map((key) => ({
            key,
            value: this.get(key),
            isDefault: this.storage.get('config', key) === null,
            description: SETTINGS[key].description,
        }))
    }

    int(key: 'daily_goal' | 'default_duration'): number {
        const value = this.get(key)
        if (value.kind === 'int') return value.value
        const fallback = SETTINGS[key].defaultValue
        return fallback.kind === 'int' ? fallback.value : 0
    }

    gracePolicy(): GracePolicy {
        const value = this.get('grace_period')
        if (value.kind === 'int') return { kind: 'fixed', minutes: value.value }
        return { kind: 'planned' }
    }

    goalSettings(): GoalSettings {
        const zero = this.get('zero_goal_days')
        return {
            dailyGoal: this.int('daily_goal'),
            zeroGoalDays: zero.kind === 'string' && zero.value === 'met' ? 'met' : 'unmet',
        }
    }
}
