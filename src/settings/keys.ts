import { type Result, err, ok } from '../core/result.js'

export type SettingValue = { kind: 'int'; value: number } | { kind: 'string'; value: string }

export const SETTING_KEYS = ['daily_goal', 'default_duration', 'grace_period', 'zero_goal_days'] as const
export type SettingKey = (typeof SETTING_KEYS)[number]

export const GRACE_PLANNED = 'planned'
export const ZERO_GOAL_POLICIES = ['met', 'unmet'] as const
export type ZeroGoalPolicy = (typeof ZERO_GOAL_POLICIES)[number]

interface SettingDefinition {
    description: string
    defaultValue: SettingValue
    parse(raw: string): Result<SettingValue>
}

function parseInteger(raw: string): number | null {
    const trimmed = raw.trim()
    if (!/^-?\d+$/.test(trimmed)) return null
    return Number.parseInt(trimmed, 10)
}

function intInRange(min: number, max: number) {
    return (raw: string): Result<SettingValue> => {
        const n = parseInteger(raw)
        if (n === null) return err(`expected an integer, got "${raw}"`)
        if (n < min) return err(`must be >= ${min}`)
        if (n > max) return err(`must be <= ${max}`)
        return ok({ kind: 'int', value: n })
    }
}

export const SETTINGS: Record<SettingKey, SettingDefinition> = {
    daily_goal: {
        description: 'Completed pomodoros needed for a day to count as met',
        defaultValue: { kind: 'int', value: 8 },
        parse: intInRange(0, 1000),
    },
    default_duration: {
        description: 'Planned minutes for `start` without --duration',
        defaultValue: { kind: 'int', value: 25 },
        parse: intInRange(1, 600),
    },
    grace_period: {
        description: `Minutes past the planned end before a forgotten session is abandoned, or "${GRACE_PLANNED}" to wait one more planned duration`,
        defaultValue: { kind: 'string', value: GRACE_PLANNED },
        parse(raw) {
            if (raw.trim() === GRACE_PLANNED) return ok({ kind: 'string', value: GRACE_PLANNED })
            return intInRange(0, 10_080)(raw)
        },
    },
    zero_goal_days: {
        description: 'Whether an empty day counts as met when daily_goal is 0 (met|unmet)',
        defaultValue: { kind: 'string', value: 'unmet' },
        parse(raw) {
            const value = raw.trim()
            if (value === 'met' || value === 'unmet') return ok({ kind: 'string', value })
            return err(`expected "met" or "unmet", got "${raw}"`)
        },
    },
}

export function isSettingKey(key: string): key is SettingKey {
    return SETTING_KEYS.some((known) => known === key)
}

export function formatSettingValue(value: SettingValue): string {
    return String(value.value)
}
