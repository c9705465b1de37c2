#!/usr/bin/env node
import fs from 'node:fs'
import path from 'node:path'
import { HttpServer } from './http/server.js'
import { FastTransferServer } from './stream/server.js'
import { TransferRegistry } from './transfer/registry.js'
import type { TransferRecord } from './transfer/types.js'
import { SharedRoots } from './roots.js'
import { getLocalIp } from './network.js'
import { formatSize } from './media.js'
import { errorMessage } from './utils.js'
import { loadConfig, saveConfig, getConfigPath, resolveConfig, validateConfig, type Config } from './config.js'

const config = loadConfig()

function printUsage(): void {
  console.log(`
lanshare - share files with phones on the same Wi-Fi network

Usage:
  lanshare <command> [options]

Commands:
  start [directory] [--port N]   Start the servers (web API on N, fast transfers on N+1)
  set-dir <directory>            Set the default shared directory
  config                         Show current configuration
  help                           Show this help message

Environment Variables:
  LANSHARE_PORT   Web API port (default: 5000)
  LANSHARE_HOST   Address to bind (default: 0.0.0.0)
  LANSHARE_DIR    Shared directory (default: ~/Downloads, else the current directory)
  LANSHARE_HOME   Config directory (default: ~/.lanshare)

Config: ${getConfigPath()}
`)
}

function showConfig(): void {
  const effective = resolveConfig(config)
  console.log('Current configuration:')
  console.log(`  Config file: ${getConfigPath()}`)
  console.log(`  Shared directory: ${config.sharedDir ?? '(not set)'}`)
  console.log(`  Port: ${config.port ?? '(not set, using env or default)'}`)
  console.log('')
  console.log('Effective settings:')
  console.log(`  Web API: ${effective.host}:${effective.port}`)
  console.log(`  Fast transfers: ${effective.host}:${effective.fastPort}`)
  console.log(`  Shared directory: ${effective.sharedDir}`)
  console.log(`  Chunk size: ${formatSize(effective.chunkSize)}`)
  console.log(`  Stream mode: ${effective.streamMode}`)
}

function setSharedDir(dir: string): void {
  const resolved = path.resolve(dir)
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
    console.error(`Error: ${resolved} is not a directory`)
    process.exit(1)
  }
  if (!saveConfig({ ...config, sharedDir: resolved })) process.exit(1)
  console.log(`Shared directory set to: ${resolved}`)
}

function describe(record: TransferRecord): string {
  return `${record.name} → ${record.origin} [${record.id}]`
}

async function startServers(overrides: Config): Promise<void> {
  const settings = resolveConfig(config, process.env, overrides)
  const errors = validateConfig(settings)
  if (errors.length > 0) {
    console.error('Error: invalid settings after applying overrides:')
    for (const err of errors) {
      console.error(`  - ${err.field}: ${err.message}`)
    }
    process.exit(1)
  }
  if (!fs.existsSync(settings.sharedDir)) {
    console.error(`Error: shared directory ${settings.sharedDir} does not exist`)
    process.exit(1)
  }

  const roots = new SharedRoots(settings.sharedDir)
  const registry = new TransferRegistry()
  const address = getLocalIp()

  registry.on('transfer-paused', (r: TransferRecord) => console.log(`Paused ${describe(r)}`))
  registry.on('transfer-resumed', (r: TransferRecord) => console.log(`Resumed ${describe(r)}`))
  registry.on('transfer-cancelled', (r: TransferRecord) => {
    console.log(`Stopped ${describe(r)} after ${formatSize(r.bytesSent)}`)
  })
  registry.on('transfer-complete', (r: TransferRecord) => {
    console.log(`Finished ${describe(r)} (${formatSize(r.size)})`)
  })

  console.log('Starting lanshare...')
  console.log(`  Shared directory: ${settings.sharedDir}`)

  const fastServer = new FastTransferServer({
    port: settings.fastPort,
    host: settings.host,
    roots,
    registry,
    chunkSize: settings.chunkSize,
    sendBufferSize: settings.sendBufferSize,
    pollIntervalMs: settings.pollIntervalMs,
    streamMode: settings.streamMode
  })

  let fastPort: number | null = null
  try {
    fastPort = await fastServer.start()
  } catch (err) {
    console.error(`Warning: could not start fast transfer server: ${errorMessage(err)}`)
  }

  const httpServer = new HttpServer({
    port: settings.port,
    host: settings.host,
    context: {
      roots,
      registry,
      address,
      port: settings.port,
      fastPort,
      onDirectoryChange: dir => {
        console.log(`Shared directory changed to ${dir}`)
      },
      onUpload: (filename, size) => {
        console.log(`Received ${filename} (${formatSize(size)})`)
      }
    }
  })

  try {
    await httpServer.start()
  } catch (err) {
    console.error('Failed to start HTTP API:', err)
    await fastServer.stop()
    process.exit(1)
  }

  let isShuttingDown = false
  const shutdown = async (): Promise<void> => {
    if (isShuttingDown) return
    isShuttingDown = true

    console.log('')
    console.log('Shutting down...')

    try {
      await httpServer.stop()
      console.log('  HTTP API stopped')
    } catch (err) {
      console.error('  Error stopping HTTP API:', err)
    }

    try {
      await fastServer.stop()
      console.log('  Fast transfer server stopped')
    } catch (err) {
      console.error('  Error stopping fast transfer server:', err)
    }

    console.log('Goodbye!')
    process.exit(0)
  }

  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      console.error('Shutdown failed:', err)
      process.exit(1)
    })
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  console.log('')
  console.log(`Web API:        http://${address}:${settings.port}`)
  if (fastPort !== null) {
    console.log(`Fast transfers: http://${address}:${fastPort}`)
  }
  console.log('Ready. Press Ctrl+C to stop.')
  console.log('')
}

function parseStartArgs(args: string[]): Config {
  const overrides: Config = {}
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--port') {
      const port = Number(args[++i])
      if (!Number.isInteger(port) || port < 1 || port > 65534) {
        console.error('Error: --port needs a number between 1 and 65534')
        process.exit(1)
      }
      overrides.port = port
    } else if (arg !== undefined) {
      overrides.sharedDir = path.resolve(arg)
    }
  }
  return overrides
}

async function main(): Promise<void> {
  const args = process.argv.slice(2)
  const command = args[0] ?? 'help'

  switch (command) {
    case 'start':
      await startServers(parseStartArgs(args.slice(1)))
      break

    case 'set-dir': {
      const dir = args[1]
      if (!dir) {
        console.error('Error: directory is required')
        console.error('Usage: lanshare set-dir <directory>')
        process.exit(1)
      }
      setSharedDir(dir)
      break
    }

    case 'config':
      showConfig()
      break

    case 'help':
    case '--help':
    case '-h':
      printUsage()
      break

    default:
      console.error(`Unknown command: ${command}`)
      console.error('Run "lanshare help" for usage.')
      process.exit(1)
  }
}

main().catch((err) => {
  console.error('Fatal error:', err)
  process.exit(1)
})
