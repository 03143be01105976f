import type { Clock } from '../core/clock.js'
import { type GoalProgress, type GoalSettings, goalProgress } from '../goals/evaluator.js'
import { toDomain } from '../sessions/types.js'
import type { SettingsStore } from '../settings/store.js'
import type { StorageGateway } from '../storage/types.js'
import {
    type DayBucket,
    type HeatmapBucket,
    type MonthSummary,
    type StreakRun,
    TemporalAggregator,
    type WeekSummary,
} from './aggregator.js'
import { assertYearMonth, dayKey, parseDayKey } from './calendar.js'

export interface DayReport {
    day: DayBucket
    progress: GoalProgress
    streak: number
}

export interface HeatmapReport {
    year: number
    month: number
    goal: GoalSettings
    buckets: HeatmapBucket[]
    summary: MonthSummary
}

export interface StreakReport {
    asOf: string
    current: number
    longest: StreakRun
    goal: GoalSettings
}

/**
 * Loads the session set and current goal settings, then answers report
 * queries through a TemporalAggregator.
 */
export class ReportService {
    constructor(
        private storage: StorageGateway,
        private settings: SettingsStore,
        private clock: Clock,
        private timezone?: string
    ) {}

    today(): string {
        return dayKey(this.clock.now(), this.timezone)
    }

    day(date: string = this.today()): DayReport {
        parseDayKey(date)
        const { aggregator, goal } = this.load()
        const day = aggregator.dailySummary(date)
        return {
            day,
            progress: goalProgress(
                {
                    completedCount: day.completedCount,
                    sessionCount: day.completedCount + day.interruptedCount + day.abandonedCount,
                },
                goal
            ),
            streak: aggregator.streak(date),
        }
    }

    week(date: string = this.today()): WeekSummary {
        parseDayKey(date)
        return this.load().aggregator.weeklySummary(date)
    }

    heatmap(year?: number, month?: number): HeatmapReport {
        const [todayYear, todayMonth] = this.today().split('-').map(Number)
        const y = year ?? todayYear ?? 1970
        const m = month ?? todayMonth ?? 1
        assertYearMonth(y, m)

        const { aggregator, goal } = this.load()
        return {
            year: y,
            month: m,
            goal,
            buckets: aggregator.heatmap(y, m),
            summary: aggregator.monthSummary(y, m),
        }
    }

    streaks(asOf: string = this.today()): StreakReport {
        parseDayKey(asOf)
        const { aggregator, goal } = this.load()
        return { asOf, current: aggregator.streak(asOf), longest: aggregator.longestStreak(), goal }
    }

    private load(): { aggregator: TemporalAggregator; goal: GoalSettings } {
        const goal = this.settings.goalSettings()
        const sessions = this.storage.scan('sessions', (row) => row.status !== 'running').map(toDomain)
        return { aggregator: new TemporalAggregator(sessions, { goal, timezone: this.timezone }), goal }
    }
}
