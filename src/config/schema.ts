import { z } from 'zod'

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const

export const ConfigSchema = z
    .object({
        dataDir: z.string().min(1).optional(),
        reportDir: z.string().min(1).optional(),
        logLevel: z.enum(LOG_LEVELS).optional(),
        timezone: z
            .string()
            .refine(isValidTimezone, { message: 'must be an IANA timezone such as "Europe/Paris"' })
            .optional(),
        notifyCommand: z.string().min(1).optional(),
        charts: z.boolean().optional(),
    })
    .strict()

export type Config = z.infer<typeof ConfigSchema>

export interface ResolvedConfig {
    dataDir: string
    /** SQLite file inside dataDir */
    databaseFile: string
    reportDir: string
    logLevel: (typeof LOG_LEVELS)[number]
    /** undefined means the process' local timezone */
    timezone?: string
    notifyCommand?: string
    charts: boolean
    projectDir: string
    configDir: string
}

function isValidTimezone(timezone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: timezone })
        return true
    } catch {
        return false
    }
}
