import { z } from 'zod'
import { InvalidArgumentError, InvalidConfigError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { SETTINGS, isSettingKey } from '../settings/keys.js'
import { ConfigRowSchema, SessionRowSchema, type StorageGateway, TaskRowSchema } from '../storage/types.js'

export const EXPORT_FORMATS = ['json'] as const
export type ExportFormat = (typeof EXPORT_FORMATS)[number]

export const ExportDocumentSchema = z.object({
    version: z.literal(1),
    sessions: z.array(SessionRowSchema),
    tasks: z.array(TaskRowSchema),
    config: z.array(ConfigRowSchema),
})

export type ExportDocument = z.infer<typeof ExportDocumentSchema>

export interface ImportSummary {
    sessions: number
    tasks: number
    config: number
}

/** Persisted rows exactly as stored, in storage order. */
export function exportData(storage: StorageGateway): ExportDocument {
    return {
        version: 1,
        sessions: storage.scan('sessions'),
        tasks: storage.scan('tasks'),
        config: storage.scan('config'),
    }
}

export function formatExport(document: ExportDocument, format: ExportFormat): string {
    switch (format) {
        case 'json':
            return JSON.stringify(document, null, 2)
    }
}

export function parseExport(raw: unknown): ExportDocument {
    const parsed = ExportDocumentSchema.safeParse(raw)
    if (!parsed.success) {
        const issue = parsed.error.issues[0]
        throw new InvalidArgumentError(`Not a valid export file at ${issue?.path.join('.') || '(root)'}: ${issue?.message}`)
    }

    const running = parsed.data.sessions.filter((s) => s.status === 'running')
    if (running.length > 1) {
        throw new InvalidArgumentError(`Export file has ${running.length} running sessions; at most one is allowed`)
    }
    for (const row of parsed.data.config) {
        if (!isSettingKey(row.key)) throw new InvalidConfigError(`Unknown config key "${row.key}" in export file`)
        const value = SETTINGS[row.key].parse(row.value)
        if (!value.ok) throw new InvalidConfigError(`Invalid value for ${row.key} in export file: ${value.error}`)
    }
    return parsed.data
}

/**
 * Upserts every row of an export document in one transaction. Rows keep
 * their ids and field values, so exporting afterwards yields the same rows.
 */
export function importData(storage: StorageGateway, raw: unknown, logger: Logger): ImportSummary {
    const document = parseExport(raw)

    storage.transact(() => {
        for (const task of document.tasks) {
            const clash = storage.scan('tasks', (row) => row.name === task.name && row.id !== task.id)[0]
            if (clash) throw new InvalidArgumentError(`Task "${task.name}" already exists with a different id`)
            storage.put('tasks', task.id, task)
        }
        for (const row of document.config) storage.put('config', row.key, row)
        for (const session of document.sessions) storage.put('sessions', session.id, session)
    })

    const summary = {
        sessions: document.sessions.length,
        tasks: document.tasks.length,
        config: document.config.length,
    }
    logger.info(summary, 'transfer:imported')
    return summary
}
