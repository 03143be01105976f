import pino from 'pino'
import { APP_NAME } from '../config/defaults.js'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

/**
 * Logs go to stderr: stdout carries command output and the
 * `REPORT_IMAGE:` line that callers parse.
 */
export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    if (config.logLevel === 'debug' || config.logLevel === 'trace') {
        return pino({
            name: APP_NAME,
            level: config.logLevel,
            transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
        })
    }
    return pino({ name: APP_NAME, level: config.logLevel }, pino.destination(2))
}
