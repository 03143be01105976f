import type { ZeroGoalPolicy } from '../settings/keys.js'

export interface GoalSettings {
    dailyGoal: number
    zeroGoalDays: ZeroGoalPolicy
}

export interface DayTally {
    completedCount: number
    /** Ended sessions of any status that day */
    sessionCount: number
}

export interface GoalProgress {
    goal: number
    completed: number
    remaining: number
    /** 0..1, capped */
    ratio: number
    met: boolean
}

/**
 * A day meets the goal when its completed count reaches `dailyGoal`.
 * With a goal of 0, an empty day only counts under the `met` policy.
 */
export function isGoalMet(day: DayTally, settings: GoalSettings): boolean {
    if (settings.dailyGoal === 0 && day.sessionCount === 0) {
        return settings.zeroGoalDays === 'met'
    }
    return day.completedCount >= settings.dailyGoal
}

export function goalProgress(day: DayTally, settings: GoalSettings): GoalProgress {
    const { dailyGoal } = settings
    return {
        goal: dailyGoal,
        completed: day.completedCount,
        remaining: Math.max(0, dailyGoal - day.completedCount),
        ratio: dailyGoal === 0 ? 1 : Math.min(1, day.completedCount / dailyGoal),
        met: isGoalMet(day, settings),
    }
}
