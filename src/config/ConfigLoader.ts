import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { MonitorConfig, PushTransport } from '../contracts/types'
import { MonitorConfigFile, MonitorConfigFileSchema, isPushTransport } from '../contracts/schemas'

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/** Values given on the command line; they win over everything else. */
export interface ConfigOverrides {
  accountId?: string
  appId?: number
  contextId?: number
  dataFile?: string
  intervalSeconds?: number
  transport?: PushTransport
}

type Env = Record<string, string | undefined>

export class ConfigLoader {
  static readonly CONFIG_FILE_NAMES = ['.inventory-watch.config.json', 'inventory-watch.config.json']

  static readonly DEFAULT_CONFIG: Omit<MonitorConfig, 'accountId'> = {
    appId: 730,
    contextId: 2,
    dataFile: 'inventory_data.json',
    intervalSeconds: 60,
    fetch: {
      host: 'steamcommunity.com',
      userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
      timeoutMs: 30_000,
    },
    push: {
      transport: 'pushplus',
      title: 'Steam inventory changed',
      timeoutMs: 10_000,
    },
  }

  private readonly fileConfig: MonitorConfigFile
  private loadedPath: string | null = null

  constructor(
    private configPath?: string,
    private env: Env = process.env
  ) {
    this.fileConfig = this.loadConfig()
  }

  private findConfigFile(): string | null {
    // Start from current directory and walk up
    let currentDir = process.cwd()

    while (currentDir !== path.parse(currentDir).root) {
      for (const configName of ConfigLoader.CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, configName)
        if (fs.existsSync(configPath)) {
          return configPath
        }
      }
      currentDir = path.dirname(currentDir)
    }

    return null
  }

  private loadConfig(): MonitorConfigFile {
    const configPath = this.configPath ?? this.findConfigFile()
    this.loadedPath = null

    if (!configPath || !fs.existsSync(configPath)) {
      return {}
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      const parsedConfig: unknown = JSON.parse(rawConfig)

      const validated = MonitorConfigFileSchema.parse(parsedConfig)
      this.loadedPath = configPath
      return validated
    } catch (error) {
      if (error instanceof z.ZodError) {
        console.error(`Invalid config at ${configPath}:`, error.errors)
      } else if (error instanceof SyntaxError) {
        console.error(`Invalid JSON in config file ${configPath}`)
      } else {
        console.error(`Error loading config from ${configPath}:`, error)
      }

      return {}
    }
  }

  /** Path of the config file in use, or null when running on defaults. */
  getConfigPath(): string | null {
    return this.loadedPath
  }

  private envValue(name: string): string | undefined {
    const value = this.env[name]
    return value && value.trim().length > 0 ? value.trim() : undefined
  }

  private envInteger(name: string): number | undefined {
    const value = this.envValue(name)
    if (value === undefined) return undefined

    const parsed = Number(value)
    if (!Number.isInteger(parsed) || parsed < 0) {
      throw new ConfigurationError(`${name} must be a non-negative integer, got "${value}"`)
    }
    return parsed
  }

  private envTransport(): PushTransport | undefined {
    const value = this.envValue('PUSH_TRANSPORT')
    if (value === undefined) return undefined

    const transport = value.toLowerCase()
    if (!isPushTransport(transport)) {
      throw new ConfigurationError(
        `PUSH_TRANSPORT must be one of pushplus, serverchan, bark; got "${value}"`
      )
    }
    return transport
  }

  /**
   * Merge defaults, config file, environment and overrides, in that order.
   * @throws ConfigurationError when no account id is set anywhere or a value is malformed
   */
  getConfig(overrides: ConfigOverrides = {}): MonitorConfig {
    const defaults = ConfigLoader.DEFAULT_CONFIG
    const file = this.fileConfig

    const accountId = overrides.accountId ?? this.envValue('STEAM_ID') ?? file.accountId
    if (!accountId) {
      throw new ConfigurationError(
        'No account id configured. Set the STEAM_ID environment variable, pass --account <id>, ' +
          'or add "accountId" to inventory-watch.config.json.'
      )
    }

    return {
      accountId,
      appId: overrides.appId ?? this.envInteger('STEAM_APP_ID') ?? file.appId ?? defaults.appId,
      contextId:
        overrides.contextId ?? this.envInteger('STEAM_CONTEXT_ID') ?? file.contextId ?? defaults.contextId,
      dataFile:
        overrides.dataFile ?? this.envValue('INVENTORY_DATA_FILE') ?? file.dataFile ?? defaults.dataFile,
      intervalSeconds: overrides.intervalSeconds ?? file.intervalSeconds ?? defaults.intervalSeconds,
      fetch: {
        ...defaults.fetch,
        ...file.fetch,
      },
      push: {
        transport:
          overrides.transport ?? this.envTransport() ?? file.push?.transport ?? defaults.push.transport,
        token: this.envValue('PUSH_TOKEN') ?? file.push?.token,
        title: file.push?.title ?? defaults.push.title,
        timeoutMs: file.push?.timeoutMs ?? defaults.push.timeoutMs,
      },
    }
  }
}
