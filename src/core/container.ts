import { ReportService } from '../analytics/report-service.js'
import type { ResolvedConfig } from '../config/schema.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { CommandNotifier, type Notifier } from '../notify/notifier.js'
import { SvgRenderer } from '../render/svg-renderer.js'
import type { Renderer } from '../render/types.js'
import { SessionLifecycleManager } from '../sessions/lifecycle.js'
import { SettingsStore } from '../settings/store.js'
import { SqliteStorageGateway } from '../storage/sqlite-gateway.js'
import type { StorageGateway } from '../storage/types.js'
import { TaskService } from '../tasks/service.js'
import { type Clock, SystemClock } from './clock.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    clock: Clock
    fs: FileSystem
    storage: StorageGateway
    settings: SettingsStore
    tasks: TaskService
    lifecycle: SessionLifecycleManager
    reports: ReportService
    renderer: Renderer
    shutdown(): void
}

export type ContainerOverrides = Partial<
    Pick<Container, 'logger' | 'clock' | 'fs' | 'storage' | 'renderer'> & { notifier: Notifier | null }
>

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const clock = overrides.clock ?? new SystemClock()
    const fs = overrides.fs ?? new NodeFileSystem()
    const storage = overrides.storage ?? new SqliteStorageGateway({ filename: config.databaseFile, logger })
    const settings = new SettingsStore(storage, logger)
    const notifier =
        overrides.notifier !== undefined
            ? overrides.notifier
            : config.notifyCommand
              ? new CommandNotifier(config.notifyCommand, logger)
              : null
    const tasks = new TaskService(storage, clock, logger)
    const lifecycle = new SessionLifecycleManager({
        storage,
        settings,
        clock,
        logger,
        notifier: notifier ?? undefined,
    })
    const reports = new ReportService(storage, settings, clock, config.timezone)
    const renderer = overrides.renderer ?? new SvgRenderer(fs, config.reportDir, logger)

    return {
        config,
        logger,
        clock,
        fs,
        storage,
        settings,
        tasks,
        lifecycle,
        reports,
        renderer,

        shutdown() {
            try {
                storage.close()
            } catch (error) {
                logger.warn({ error }, 'Error closing storage')
            }
        },
    }
}
