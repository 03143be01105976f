import { beforeEach, describe, expect, it } from 'vitest'
import { ReportService } from '../../../src/analytics/report-service.js'
import { FakeClock } from '../../../src/core/clock.js'
import { InvalidArgumentError } from '../../../src/core/errors.js'
import { SettingsStore } from '../../../src/settings/store.js'
import { InMemoryStorageGateway } from '../../../src/storage/memory-gateway.js'
import { sessionRow, silentLogger } from '../../helpers/fixtures.js'

describe('ReportService', () => {
    let reports: ReportService

    beforeEach(() => {
        const storage = new InMemoryStorageGateway()
        const settings = new SettingsStore(storage, silentLogger())
        settings.set('daily_goal', '2')
        for (const row of [
            sessionRow('2026-02-02T09:00:00Z', 'completed'),
            sessionRow('2026-02-02T10:00:00Z', 'completed'),
            sessionRow('2026-02-03T09:00:00Z', 'completed'),
            sessionRow('2026-02-03T10:00:00Z', 'interrupted', 25, { actual_duration: 300 }),
            sessionRow('2026-02-03T11:00:00Z', 'completed'),
            sessionRow('2026-02-03T17:50:00Z', 'running'),
        ]) {
            storage.put('sessions', row.id, row)
        }
        reports = new ReportService(storage, settings, new FakeClock('2026-02-03T18:00:00Z'))
    })

    it('reports today with goal progress and streak', () => {
        expect(reports.today()).toBe('2026-02-03')
        const { day, progress, streak } = reports.day()

        expect(day).toMatchObject({ date: '2026-02-03', completedCount: 2, interruptedCount: 1, totalFocusMinutes: 50 })
        expect(progress).toEqual({ goal: 2, completed: 2, remaining: 0, ratio: 1, met: true })
        expect(streak).toBe(2)
    })

    it('reports an earlier day', () => {
        const { day, streak } = reports.day('2026-02-01')
        expect(day.completedCount).toBe(0)
        expect(streak).toBe(0)
    })

    it('reports the current week', () => {
        const week = reports.week()
        expect(week.weekStart).toBe('2026-02-02')
        expect(week.completedCount).toBe(4)
        expect(week.daysGoalMet).toBe(2)
    })

    it('defaults the heatmap to the current month', () => {
        const report = reports.heatmap()
        expect(report.year).toBe(2026)
        expect(report.month).toBe(2)
        expect(report.buckets).toHaveLength(28)
        expect(report.summary.completedCount).toBe(4)
        expect(report.goal.dailyGoal).toBe(2)
    })

    it('reports current and longest streaks', () => {
        expect(reports.streaks()).toEqual({
            asOf: '2026-02-03',
            current: 2,
            longest: { length: 2, start: '2026-02-02', end: '2026-02-03' },
            goal: { dailyGoal: 2, zeroGoalDays: 'unmet' },
        })
    })

    it('rejects invalid dates and months', () => {
        expect(() => reports.day('2026-02-31')).toThrow(InvalidArgumentError)
        expect(() => reports.week('next week')).toThrow(InvalidArgumentError)
        expect(() => reports.heatmap(2026, 13)).toThrow(InvalidArgumentError)
    })
})
