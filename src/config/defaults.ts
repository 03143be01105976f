import os from 'node:os'
import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

export const APP_NAME = 'pomotrack'

export const CONFIG_DIR = path.join(os.homedir(), '.config', APP_NAME)
export const GLOBAL_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')
export const LOCAL_CONFIG_DIR = `.${APP_NAME}`
export const LOCAL_CONFIG_FILE = path.join(LOCAL_CONFIG_DIR, 'config.json')

export const DEFAULT_DATA_DIR = path.join(os.homedir(), '.local', 'share', APP_NAME)
export const DATABASE_FILENAME = 'pomodoro.db'
export const REPORTS_DIRNAME = 'reports'

export const DEFAULT_CONFIG: Pick<ResolvedConfig, 'logLevel' | 'charts'> = {
    logLevel: 'warn',
    charts: true,
}
