import { weekdayLabel } from '../../analytics/calendar.js'
import type { Container } from '../../core/container.js'
import { RenderError, errorMessage } from '../../core/errors.js'
import type { ChartBucket, ChartKind, RenderOptions } from '../../render/types.js'
import { REPORT_IMAGE_PREFIX, type Printer, banner, colors, heatCell, plural, progressBar, rule } from '../ui.js'

export interface ReportFlags {
    chart: boolean
}

/**
 * Renders a chart and prints the `REPORT_IMAGE:` line. A RenderError only
 * costs the image; the text report has already been printed.
 */
async function emitChart(
    container: Container,
    printer: Printer,
    flags: ReportFlags,
    kind: ChartKind,
    buckets: ChartBucket[],
    options: RenderOptions
): Promise<void> {
    if (!flags.chart || !container.config.charts) return
    try {
        const filePath = await container.renderer.render(kind, buckets, options)
        printer.out(`${REPORT_IMAGE_PREFIX}${filePath}`)
    } catch (error) {
        if (!(error instanceof RenderError)) throw error
        container.logger.warn({ error: errorMessage(error) }, 'render:failed')
        printer.err(colors.warn(`Chart not generated: ${error.message}`))
    }
}

export async function todayCommand(container: Container, printer: Printer, flags: ReportFlags): Promise<void> {
    const date = container.reports.today()
    const { day, progress, streak } = container.reports.day(date)

    printer.out(banner(`Today - ${date}`))
    printer.out(rule())
    printer.out(`Completed:   ${plural(day.completedCount, 'pomodoro')} (${day.totalFocusMinutes} min)`)
    printer.out(`Interrupted: ${day.interruptedCount}`)
    printer.out(`Abandoned:   ${day.abandonedCount}`)
    printer.out(`Daily goal:  ${day.completedCount}/${progress.goal}`)
    printer.out(`Streak:      ${plural(streak, 'day')}`)
    printer.out('')
    printer.out(`[${progressBar(progress.ratio)}] ${day.completedCount}/${progress.goal}`)
    printer.out(
        progress.met
            ? colors.success('Daily goal achieved!')
            : `${plural(progress.remaining, 'more pomodoro')} to reach your daily goal.`
    )

    await emitChart(
        container,
        printer,
        flags,
        'bar',
        [
            { label: 'completed', value: day.completedCount },
            { label: 'interrupted', value: day.interruptedCount },
            { label: 'abandoned', value: day.abandonedCount },
            { label: 'goal', value: progress.goal },
        ],
        { title: `Pomodoros on ${date}`, fileStem: `today-${date}` }
    )
}

export async function weekCommand(
    container: Container,
    printer: Printer,
    flags: ReportFlags,
    date?: string
): Promise<void> {
    const week = container.reports.week(date)
    const goal = container.settings.goalSettings().dailyGoal

    printer.out(banner(`Week ${week.weekStart} to ${week.weekEnd}`))
    printer.out(rule())
    for (const day of week.days) {
        const ratio = goal === 0 ? 1 : day.completedCount / goal
        const mark = day.goalMet ? colors.success('✓') : ' '
        printer.out(
            `${weekdayLabel(day.date)} ${day.date}: ${String(day.completedCount).padStart(2)} (${day.totalFocusMinutes} min) [${progressBar(ratio, 10)}] ${mark}`
        )
    }
    printer.out('')
    printer.out(`Total: ${plural(week.completedCount, 'pomodoro')}, ${week.totalFocusMinutes} min`)
    printer.out(`Interrupted: ${week.interruptedCount}, abandoned: ${week.abandonedCount}`)
    printer.out(`Goal met on ${week.daysGoalMet}/7 days, ${week.dailyAverage.toFixed(1)} pomodoros/day on average`)

    await emitChart(
        container,
        printer,
        flags,
        'bar',
        week.days.map((day) => ({ label: weekdayLabel(day.date), value: day.completedCount })),
        { title: `Week of ${week.weekStart}`, fileStem: `week-${week.weekStart}` }
    )
}

export interface HeatmapArgs {
    year?: number
    month?: number
}

export async function heatmapCommand(
    container: Container,
    printer: Printer,
    flags: ReportFlags,
    args: HeatmapArgs
): Promise<void> {
    const report = container.reports.heatmap(args.year, args.month)
    const label = `${report.year}-${String(report.month).padStart(2, '0')}`
    const leadingBlanks = (report.buckets[0]?.weekday ?? 1) - 1

    printer.out(banner(`Heatmap - ${label}`))
    printer.out(rule(27))
    printer.out('Mo Tu We Th Fr Sa Su')

    const cells: string[] = Array.from({ length: leadingBlanks }, () => '  ')
    report.buckets.forEach((bucket, i) => cells.push(heatCell(i + 1, bucket.level)))
    for (let row = 0; row < cells.length; row += 7) {
        printer.out(cells.slice(row, row + 7).join(' '))
    }

    const { dailyGoal } = report.goal
    const { summary } = report
    printer.out('')
    printer.out(
        `Legend: ${colors.success(`met (${dailyGoal}+)`)}  ${colors.warn('halfway')}  ${colors.error('started')}  ${colors.dim('none')}`
    )
    printer.out(`Total: ${plural(summary.completedCount, 'pomodoro')} (${summary.totalFocusMinutes} min)`)
    printer.out(`Active days: ${summary.activeDays}/${summary.daysInMonth}, goal met on ${summary.daysGoalMet}`)
    if (summary.activeDays > 0) {
        printer.out(`Daily average: ${summary.averageMinutesPerActiveDay} min on active days`)
    }

    await emitChart(
        container,
        printer,
        flags,
        'heatmap',
        report.buckets.map((bucket) => ({ label: bucket.date, value: bucket.intensity })),
        { title: `Pomodoro heatmap ${label}`, fileStem: `heatmap-${label}`, leadingBlanks }
    )
}

export function streakCommand(container: Container, printer: Printer): void {
    const report = container.reports.streaks()
    printer.out(`Current streak: ${plural(report.current, 'day')} (goal: ${report.goal.dailyGoal}/day)`)
    if (report.longest.length > 0) {
        printer.out(
            `Longest streak: ${plural(report.longest.length, 'day')} (${report.longest.start} to ${report.longest.end})`
        )
    } else {
        printer.out('Longest streak: 0 days')
    }
}
