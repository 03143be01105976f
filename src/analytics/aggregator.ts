import { type GoalSettings, isGoalMet } from '../goals/evaluator.js'
import { type EndedSession, type Session, isEnded } from '../sessions/types.js'
import { dayKey, isoWeekday, monthDays, shiftDay, weekStartOf } from './calendar.js'

export interface AggregateOptions {
    goal: GoalSettings
    /** IANA zone for calendar days; the process' local zone when absent */
    timezone?: string
}

export interface DayBucket {
    date: string
    completedCount: number
    interruptedCount: number
    abandonedCount: number
    totalFocusMinutes: number
    goalMet: boolean
}

export interface WeekSummary {
    weekStart: string
    weekEnd: string
    days: DayBucket[]
    completedCount: number
    interruptedCount: number
    abandonedCount: number
    totalFocusMinutes: number
    daysGoalMet: number
    /** completed pomodoros per calendar day */
    dailyAverage: number
}

export type HeatLevel = 'met' | 'half' | 'started' | 'none'

export interface HeatmapBucket {
    date: string
    /** 1 = Monday ... 7 = Sunday */
    weekday: number
    completedCount: number
    totalFocusMinutes: number
    /** completedCount / max over the month, 0 when the month is empty */
    intensity: number
    level: HeatLevel
}

export interface MonthSummary {
    year: number
    month: number
    daysInMonth: number
    completedCount: number
    totalFocusMinutes: number
    activeDays: number
    daysGoalMet: number
    averageMinutesPerActiveDay: number
}

export interface StreakRun {
    length: number
    start: string | null
    end: string | null
}

/**
 * Derives day, week and month buckets from a fixed set of sessions.
 * Output depends only on the sessions and options given to the constructor.
 * Running sessions are ignored; a session belongs to the day it started on.
 */
export class TemporalAggregator {
    private byDay = new Map<string, EndedSession[]>()
    private firstDay: string | null = null
    private lastDay: string | null = null

    constructor(
        sessions: readonly Session[],
        private options: AggregateOptions
    ) {
        for (const session of sessions) {
            if (!isEnded(session)) continue
            const key = dayKey(session.startTime, options.timezone)
            const list = this.byDay.get(key)
            if (list) list.push(session)
            else this.byDay.set(key, [session])
        }
        const days = [...this.byDay.keys()].sort()
        this.firstDay = days[0] ?? null
        this.lastDay = days[days.length - 1] ?? null
    }

    /** Earliest and latest days that have any ended session. */
    range(): { first: string; last: string } | null {
        return this.firstDay && this.lastDay ? { first: this.firstDay, last: this.lastDay } : null
    }

    dailySummary(date: string): DayBucket {
        const sessions = this.byDay.get(date) ?? []
        let completedCount = 0
        let interruptedCount = 0
        let abandonedCount = 0
        let focusSeconds = 0

        for (const session of sessions) {
            switch (session.status) {
                case 'completed':
                    completedCount += 1
                    focusSeconds += session.actualDuration
                    break
                case 'interrupted':
                    interruptedCount += 1
                    break
                case 'abandoned':
                    abandonedCount += 1
                    break
            }
        }

        return {
            date,
            completedCount,
            interruptedCount,
            abandonedCount,
            totalFocusMinutes: Math.floor(focusSeconds / 60),
            goalMet: isGoalMet({ completedCount, sessionCount: sessions.length }, this.options.goal),
        }
    }

    /** The Monday-start week containing `date`. */
    weeklySummary(date: string): WeekSummary {
        const weekStart = weekStartOf(date)
        const days = Array.from({ length: 7 }, (_, i) => this.dailySummary(shiftDay(weekStart, i)))
        const completedCount = sum(days, (d) => d.completedCount)

        return {
            weekStart,
            weekEnd: shiftDay(weekStart, 6),
            days,
            completedCount,
            interruptedCount: sum(days, (d) => d.interruptedCount),
            abandonedCount: sum(days, (d) => d.abandonedCount),
            totalFocusMinutes: sum(days, (d) => d.totalFocusMinutes),
            daysGoalMet: days.filter((d) => d.goalMet).length,
            dailyAverage: completedCount / days.length,
        }
    }

    /** One bucket per in-month day, no padding. */
    heatmap(year: number, month: number): HeatmapBucket[] {
        const days = monthDays(year, month).map((date) => this.dailySummary(date))
        const max = Math.max(0, ...days.map((d) => d.completedCount))
        const { dailyGoal } = this.options.goal

        return days.map((day) => ({
            date: day.date,
            weekday: isoWeekday(day.date),
            completedCount: day.completedCount,
            totalFocusMinutes: day.totalFocusMinutes,
            intensity: max === 0 ? 0 : day.completedCount / max,
            level: heatLevel(day, dailyGoal),
        }))
    }

    monthSummary(year: number, month: number): MonthSummary {
        const days = monthDays(year, month).map((date) => this.dailySummary(date))
        const totalFocusMinutes = sum(days, (d) => d.totalFocusMinutes)
        const activeDays = days.filter((d) => d.completedCount > 0).length

        return {
            year,
            month,
            daysInMonth: days.length,
            completedCount: sum(days, (d) => d.completedCount),
            totalFocusMinutes,
            activeDays,
            daysGoalMet: days.filter((d) => d.goalMet).length,
            averageMinutesPerActiveDay: activeDays === 0 ? 0 : Math.round(totalFocusMinutes / activeDays),
        }
    }

    /**
     * Consecutive goal-met days ending at `asOf`, walking backwards until a
     * day misses the goal or the walk passes the first recorded day.
     */
    streak(asOf: string): number {
        if (this.firstDay === null) return 0

        let count = 0
        let day = asOf
        while (day >= this.firstDay && this.dailySummary(day).goalMet) {
            count += 1
            day = shiftDay(day, -1)
        }
        return count
    }

    longestStreak(): StreakRun {
        const best: StreakRun = { length: 0, start: null, end: null }
        if (this.firstDay === null || this.lastDay === null) return best

        let runStart: string | null = null
        let runLength = 0
        for (let day = this.firstDay; day <= this.lastDay; day = shiftDay(day, 1)) {
            if (!this.dailySummary(day).goalMet) {
                runStart = null
                runLength = 0
                continue
            }
            if (runStart === null) runStart = day
            runLength += 1
            if (runLength > best.length) {
                best.length = runLength
                best.start = runStart
                best.end = day
            }
        }
        return best
    }
}

function heatLevel(day: DayBucket, dailyGoal: number): HeatLevel {
    if (day.goalMet) return 'met'
    if (day.completedCount > 0 && day.completedCount >= dailyGoal / 2) return 'half'
    if (day.completedCount > 0) return 'started'
    return 'none'
}

function sum<T>(items: readonly T[], pick: (item: T) => number): number {
    return items.reduce((total, item) => total + pick(item), 0)
}
