import pc from 'picocolors'
import type { HeatLevel } from '../analytics/aggregator.js'
import { APP_NAME } from '../config/defaults.js'

export const colors = {
    brand: (text: string) => pc.red(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
}

export interface Printer {
    out(line: string): void
    err(line: string): void
}

export const consolePrinter: Printer = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
}

export const REPORT_IMAGE_PREFIX = 'REPORT_IMAGE:'

export function banner(title: string): string {
    return `${colors.brand(APP_NAME)} ${colors.bold(title)}`
}

export function rule(width = 40): string {
    return '='.repeat(width)
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function progressBar(ratio: number, width = 20): string {
    const filled = Math.floor(width * Math.min(1, Math.max(0, ratio)))
    return '█'.repeat(filled) + '░'.repeat(width - filled)
}

export function formatMinutes(seconds: number): string {
    return `${Math.floor(seconds / 60)} min`
}

/** mm:ss, or h:mm:ss past an hour */
export function formatClock(seconds: number): string {
    const s = Math.max(0, Math.floor(seconds))
    const hours = Math.floor(s / 3600)
    const minutes = Math.floor((s % 3600) / 60)
    const secs = s % 60
    const mmss = `${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`
    return hours > 0 ? `${hours}:${mmss}` : mmss
}

export function plural(count: number, word: string): string {
    return `${count} ${word}${count === 1 ? '' : 's'}`
}

export function heatCell(day: number, level: HeatLevel): string {
    const text = String(day).padStart(2, ' ')
    switch (level) {
        case 'met':
            return pc.green(pc.bold(text))
        case 'half':
            return pc.yellow(text)
        case 'started':
            return pc.red(text)
        case 'none':
            return pc.dim(text)
    }
}
