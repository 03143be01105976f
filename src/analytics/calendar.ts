import { addDays, format, getDaysInMonth, getISODay, isValid, parse, startOfISOWeek } from 'date-fns'
import { formatInTimeZone } from 'date-fns-tz'
import { InvalidArgumentError } from '../core/errors.js'

/** Calendar dates are passed around as `yyyy-MM-dd` keys, which sort lexically. */
export const DAY_FORMAT = 'yyyy-MM-dd'

export function dayKey(date: Date, timezone?: string): string {
    return timezone ? formatInTimeZone(date, timezone, DAY_FORMAT) : format(date, DAY_FORMAT)
}

export function parseDayKey(key: string): Date {
    const date = parse(key, DAY_FORMAT, new Date(0))
    if (!isValid(date) || format(date, DAY_FORMAT) !== key) {
        throw new InvalidArgumentError(`Invalid date "${key}", expected YYYY-MM-DD`)
    }
    return date
}

export function shiftDay(key: string, days: number): string {
    return format(addDays(parseDayKey(key), days), DAY_FORMAT)
}

/** Monday of the ISO week containing `key`. */
export function weekStartOf(key: string): string {
    return format(startOfISOWeek(parseDayKey(key)), DAY_FORMAT)
}

/** 1 = Monday ... 7 = Sunday */
export function isoWeekday(key: string): number {
    return getISODay(parseDayKey(key))
}

export function weekdayLabel(key: string): string {
    return format(parseDayKey(key), 'EEE')
}

export function assertYearMonth(year: number, month: number): void {
    if (!Number.isInteger(year) || year < 1970 || year > 9999) {
        throw new InvalidArgumentError(`Invalid year "${year}"`)
    }
    if (!Number.isInteger(month) || month < 1 || month > 12) {
        throw new InvalidArgumentError(`Invalid month "${month}", expected 1-12`)
    }
}

export function monthDays(year: number, month: number): string[] {
    assertYearMonth(year, month)
    const first = new Date(year, month - 1, 1)
    const count = getDaysInMonth(first)
    return Array.from({ length: count }, (_, i) => format(addDays(first, i), DAY_FORMAT))
}
