import path from 'node:path'
import { InvalidConfigError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import {
    CONFIG_DIR,
    DATABASE_FILENAME,
    DEFAULT_CONFIG,
    DEFAULT_DATA_DIR,
    GLOBAL_CONFIG_FILE,
    LOCAL_CONFIG_FILE,
    REPORTS_DIRNAME,
} from './defaults.js'
import { type Config, ConfigSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
    globalConfigFile?: string
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}

    let raw: unknown
    try {
        raw = await fs.readJSON<unknown>(filePath)
    } catch (error) {
        throw new InvalidConfigError(`Cannot read ${filePath}: ${errorMessage(error)}`, { cause: error })
    }

    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) {
        const issue = parsed.error.issues[0]
        const where = issue?.path.join('.') || '(root)'
        throw new InvalidConfigError(`Invalid config in ${filePath} at ${where}: ${issue?.message}`)
    }
    return parsed.data
}

function envConfig(env: NodeJS.ProcessEnv): Config {
    const fromEnv: Record<string, unknown> = {}
    if (env.POMOTRACK_DATA_DIR) fromEnv.dataDir = env.POMOTRACK_DATA_DIR
    if (env.POMOTRACK_REPORT_DIR) fromEnv.reportDir = env.POMOTRACK_REPORT_DIR
    if (env.POMOTRACK_LOG_LEVEL) fromEnv.logLevel = env.POMOTRACK_LOG_LEVEL
    if (env.POMOTRACK_TZ) fromEnv.timezone = env.POMOTRACK_TZ
    if (env.POMOTRACK_NOTIFY_COMMAND) fromEnv.notifyCommand = env.POMOTRACK_NOTIFY_COMMAND

    const parsed = ConfigSchema.safeParse(fromEnv)
    if (!parsed.success) {
        const issue = parsed.error.issues[0]
        throw new InvalidConfigError(`Invalid environment variable for ${issue?.path.join('.')}: ${issue?.message}`)
    }
    return parsed.data
}

function mergeConfigs(...configs: Config[]): Config {
    const entries = configs.flatMap((cfg) => Object.entries(cfg).filter(([, value]) => value !== undefined))
    return ConfigSchema.parse(Object.fromEntries(entries))
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const {
        fs,
        cliFlags = {},
        projectDir = process.cwd(),
        env = process.env,
        globalConfigFile = GLOBAL_CONFIG_FILE,
    } = options

    const globalConfig = await loadJsonConfig(fs, globalConfigFile)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, envConfig(env), cliFlags)

    const dataDir = path.resolve(projectDir, merged.dataDir ?? DEFAULT_DATA_DIR)

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        dataDir,
        databaseFile: path.join(dataDir, DATABASE_FILENAME),
        reportDir: path.resolve(projectDir, merged.reportDir ?? path.join(dataDir, REPORTS_DIRNAME)),
        projectDir,
        configDir: CONFIG_DIR,
    }
}
