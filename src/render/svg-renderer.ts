import path from 'node:path'
import { RenderError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import type { ChartBucket, ChartKind, RenderOptions, Renderer } from './types.js'

const BAR_WIDTH = 40
const BAR_GAP = 12
const PLOT_HEIGHT = 160
const CELL = 28
const CELL_GAP = 4
const WEEKDAYS = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun']

export function escapeXml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;')
}

export function slugify(text: string): string {
    return (
        text
            .toLowerCase()
            .replace(/[^a-z0-9]+/g, '-')
            .replace(/^-+|-+$/g, '') || 'chart'
    )
}

function formatValue(value: number): string {
    return Number.isInteger(value) ? String(value) : value.toFixed(2)
}

export function barChartSvg(buckets: readonly ChartBucket[], title: string): string {
    const max = Math.max(0, ...buckets.map((b) => b.value))
    const width = 40 + buckets.length * (BAR_WIDTH + BAR_GAP)
    const height = PLOT_HEIGHT + 80
    const baseline = 40 + PLOT_HEIGHT

    const bars = buckets.map((bucket, i) => {
        const x = 30 + i * (BAR_WIDTH + BAR_GAP)
        const h = max === 0 ? 0 : Math.round((bucket.value / max) * PLOT_HEIGHT)
        const label = escapeXml(bucket.label)
        return [
            `<rect x="${x}" y="${baseline - h}" width="${BAR_WIDTH}" height="${h}" fill="#e4572e"/>`,
            `<text x="${x + BAR_WIDTH / 2}" y="${baseline - h - 4}" text-anchor="middle" font-size="11">${formatValue(bucket.value)}</text>`,
            `<text x="${x + BAR_WIDTH / 2}" y="${baseline + 16}" text-anchor="middle" font-size="11">${label}</text>`,
        ].join('')
    })

    return [
        `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="sans-serif">`,
        `<rect width="100%" height="100%" fill="#ffffff"/>`,
        `<text x="20" y="24" font-size="15" font-weight="bold">${escapeXml(title)}</text>`,
        `<line x1="20" y1="${baseline}" x2="${width - 10}" y2="${baseline}" stroke="#888888"/>`,
        ...bars,
        `</svg>`,
    ].join('\n')
}

/** Values are intensities in 0..1; cells run Monday to Sunday, one row per week. */
export function heatmapSvg(buckets: readonly ChartBucket[], title: string, leadingBlanks = 0): string {
    const rows = Math.ceil((leadingBlanks + buckets.length) / 7)
    const width = 20 + 7 * (CELL + CELL_GAP)
    const height = 60 + rows * (CELL + CELL_GAP)

    const header = WEEKDAYS.map(
        (day, col) =>
            `<text x="${10 + col * (CELL + CELL_GAP) + CELL / 2}" y="48" text-anchor="middle" font-size="10">${day}</text>`
    )
    const cells = buckets.map((bucket, i) => {
        const slot = leadingBlanks + i
        const x = 10 + (slot % 7) * (CELL + CELL_GAP)
        const y = 56 + Math.floor(slot / 7) * (CELL + CELL_GAP)
        const intensity = Math.min(1, Math.max(0, bucket.value))
        const fill = intensity === 0 ? '#ebedf0' : '#216e39'
        const opacity = intensity === 0 ? 1 : 0.25 + 0.75 * intensity
        return (
            `<rect x="${x}" y="${y}" width="${CELL}" height="${CELL}" rx="4" fill="${fill}" fill-opacity="${opacity.toFixed(2)}">` +
            `<title>${escapeXml(bucket.label)}: ${formatValue(bucket.value)}</title></rect>`
        )
    })

    return [
        `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="sans-serif">`,
        `<rect width="100%" height="100%" fill="#ffffff"/>`,
        `<text x="10" y="24" font-size="15" font-weight="bold">${escapeXml(title)}</text>`,
        ...header,
        ...cells,
        `</svg>`,
    ].join('\n')
}

export class SvgRenderer implements Renderer {
    constructor(
        private fs: FileSystem,
        private outputDir: string,
        private logger: Logger
    ) {}

    async render(kind: ChartKind, buckets: readonly ChartBucket[], options: RenderOptions): Promise<string> {
        if (buckets.length === 0) throw new RenderError(`Nothing to render for "${options.title}"`)
        const bad = buckets.find((b) => !Number.isFinite(b.value))
        if (bad) throw new RenderError(`Bucket "${bad.label}" has a non-numeric value`)

        const svg =
            kind === 'bar'
                ? barChartSvg(buckets, options.title)
                : heatmapSvg(buckets, options.title, options.leadingBlanks ?? 0)
        const filePath = path.join(this.outputDir, `${options.fileStem ?? slugify(options.title)}.svg`)

        try {
            await this.fs.mkdir(this.outputDir)
            await this.fs.writeText(filePath, svg)
        } catch (error) {
            throw new RenderError(`Could not write ${filePath}: ${errorMessage(error)}`, { cause: error })
        }

        this.logger.debug({ kind, filePath, buckets: buckets.length }, 'render:written')
        return filePath
    }
}
