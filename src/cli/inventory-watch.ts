#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from 'commander'
import { ConfigLoader, ConfigOverrides, ConfigurationError } from '../config/ConfigLoader'
import { isPushTransport } from '../contracts'
import { InventoryFetcher } from '../inventory/InventoryFetcher'
import { FileSnapshotStore } from '../storage/FileSnapshotStore'
import { NotifierFactory } from '../notification'
import { InventoryMonitor, runMonitor, RunPolicy, EXIT_ERROR } from '../monitor'
import { debugLog, errorMessage } from '../debug/debugLog'

export interface CliOptions {
  once?: boolean
  strict?: boolean
  account?: string
  config?: string
  dataFile?: string
  appId?: number
  contextId?: number
  interval?: number
  transport?: string
}

function parseInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.')
  }
  return parsed
}

function parseSeconds(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number of seconds.')
  }
  return parsed
}

export function createProgram(): Command {
  return new Command()
    .name('inventory-watch')
    .description('Watch a public Steam inventory and push a report when it changes')
    .option('--once', 'run a single check and exit')
    .option('--strict', 'with --once, exit with code 2 when the inventory cannot be fetched')
    .option('-a, --account <id>', 'account id to watch (overrides STEAM_ID)')
    .option('-c, --config <path>', 'config file (default: nearest inventory-watch.config.json)')
    .option('-d, --data-file <path>', 'snapshot file (overrides INVENTORY_DATA_FILE)')
    .option('--app-id <n>', 'inventory app id', parseInteger)
    .option('--context-id <n>', 'inventory context id', parseInteger)
    .option('-i, --interval <seconds>', 'seconds between checks in continuous mode', parseSeconds)
    .option('-t, --transport <name>', 'push transport: pushplus, serverchan or bark')
    .exitOverride()
}

export function toOverrides(options: CliOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {
    accountId: options.account,
    appId: options.appId,
    contextId: options.contextId,
    dataFile: options.dataFile,
    intervalSeconds: options.interval,
  }

  if (options.transport !== undefined) {
    const transport = options.transport.toLowerCase()
    if (!isPushTransport(transport)) {
      throw new ConfigurationError(
        `--transport must be one of pushplus, serverchan, bark; got "${options.transport}"`
      )
    }
    overrides.transport = transport
  }

  return overrides
}

/**
 * Parse arguments, resolve configuration and run the monitor.
 * @returns Process exit code
 */
export async function run(argv: string[], signal?: AbortSignal): Promise<number> {
  const program = createProgram()
  try {
    program.parse(argv)
  } catch (error) {
    // Commander has already printed the usage error or help text
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    throw error
  }
  const options = program.opts<CliOptions>()

  try {
    if (options.strict && !options.once) {
      throw new ConfigurationError('--strict only applies to a single check; pass --once as well')
    }

    const loader = new ConfigLoader(options.config)
    const config = loader.getConfig(toOverrides(options))

    const store = new FileSnapshotStore(config.dataFile)
    const fetcher = new InventoryFetcher({
      ...config.fetch,
      appId: config.appId,
      contextId: config.contextId,
    })
    const notifier = NotifierFactory.createNotifier(config.push)
    const monitor = new InventoryMonitor({
      accountId: config.accountId,
      fetcher,
      store,
      notifier,
    })

    console.log('='.repeat(60))
    console.log('Inventory watch started')
    console.log(`Account: ${config.accountId}`)
    console.log(`Inventory: ${fetcher.buildUrl(config.accountId)}`)
    console.log(`Snapshot file: ${store.getFilePath()}`)
    console.log(options.once ? 'Mode: single check' : `Mode: every ${config.intervalSeconds}s`)
    console.log(`Push: ${config.push.token ? config.push.transport : 'not configured'}`)
    console.log('='.repeat(60))
    debugLog({ event: 'cli_start', configPath: loader.getConfigPath(), once: options.once === true })

    const policy: RunPolicy = options.once
      ? { mode: 'once', failOnFetchError: options.strict === true }
      : { mode: 'forever', intervalMs: config.intervalSeconds * 1000 }

    return await runMonitor(monitor, policy, { signal })
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Error: ${error.message}`)
      return EXIT_ERROR
    }
    throw error
  }
}

// Only run if this is the main module
if (require.main === module) {
  const controller = new AbortController()
  const shutdown = () => {
    console.log('\nStopping after the current check...')
    controller.abort()
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)

  run(process.argv, controller.signal).then(
    (code) => {
      process.removeListener('SIGINT', shutdown)
      process.removeListener('SIGTERM', shutdown)
      process.exitCode = code
    },
    (error: unknown) => {
      console.error(`Unexpected error: ${errorMessage(error)}`)
      process.exit(EXIT_ERROR)
    }
  )
}
