import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'

export type StreamMode = 'auto' | 'buffered'

export interface Config {
  port?: number
  fastPort?: number
  host?: string
  sharedDir?: string
  chunkSize?: number           // bytes per streamed chunk
  sendBufferSize?: number      // socket high-water mark, bytes
  pollIntervalMs?: number      // pause re-check interval
  streamMode?: StreamMode
}

export type ResolvedConfig = Required<Config>

export interface ConfigValidationError {
  field: string
  message: string
}

export const DEFAULT_PORT = 5000
export const DEFAULT_HOST = '0.0.0.0'
export const DEFAULT_CHUNK_SIZE = 8 * 1024 * 1024
export const DEFAULT_SEND_BUFFER_SIZE = 8 * 1024 * 1024
export const DEFAULT_POLL_INTERVAL_MS = 200

const MAX_CHUNK_SIZE = 64 * 1024 * 1024

export function getConfigDir(): string {
  return process.env['LANSHARE_HOME'] ?? path.join(os.homedir(), '.lanshare')
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function portError(label: string, value: unknown): string | null {
  if (typeof value !== 'number') return `${label} must be a number`
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    return `${label} must be an integer between 1 and 65535`
  }
  return null
}

function sizeError(label: string, value: unknown, max: number): string | null {
  if (typeof value !== 'number') return `${label} must be a number`
  if (!Number.isInteger(value) || value < 1 || value > max) {
    return `${label} must be an integer between 1 and ${max}`
  }
  return null
}

function hostError(value: unknown): string | null {
  if (typeof value !== 'string') return 'Host must be a string'
  if (value.length === 0) return 'Host cannot be empty'
  return null
}

function sharedDirError(value: unknown): string | null {
  if (typeof value !== 'string') return 'Shared directory must be a string'
  if (value.length === 0) return 'Shared directory cannot be empty'
  return null
}

function streamModeError(value: unknown): string | null {
  if (value !== 'auto' && value !== 'buffered') return "Stream mode must be 'auto' or 'buffered'"
  return null
}

const FIELD_CHECKS: Record<keyof Config, (value: unknown) => string | null> = {
  port: v => portError('Port', v),
  fastPort: v => portError('Fast transfer port', v),
  host: hostError,
  sharedDir: sharedDirError,
  chunkSize: v => sizeError('Chunk size', v, MAX_CHUNK_SIZE),
  sendBufferSize: v => sizeError('Send buffer size', v, MAX_CHUNK_SIZE),
  pollIntervalMs: v => sizeError('Poll interval', v, 60_000),
  streamMode: streamModeError
}

export function validateConfig(config: unknown): ConfigValidationError[] {
  const errors: ConfigValidationError[] = []

  if (!isRecord(config)) {
    errors.push({ field: 'config', message: 'Config must be an object' })
    return errors
  }

  for (const [field, check] of Object.entries(FIELD_CHECKS)) {
    const value = config[field]
    if (value === undefined) continue
    const message = check(value)
    if (message) errors.push({ field, message })
  }

  if (typeof config['port'] === 'number' && config['port'] === config['fastPort']) {
    errors.push({ field: 'fastPort', message: 'Fast transfer port must differ from the web port' })
  }

  return errors
}

// Copies the individually valid fields of a parsed config file.
function pickValidFields(raw: Record<string, unknown>): Config {
  const config: Config = {}
  const { port, fastPort, host, sharedDir, chunkSize, sendBufferSize, pollIntervalMs, streamMode } = raw

  if (typeof port === 'number' && !FIELD_CHECKS.port(port)) config.port = port
  if (typeof fastPort === 'number' && !FIELD_CHECKS.fastPort(fastPort) && fastPort !== config.port) {
    config.fastPort = fastPort
  }
  if (typeof host === 'string' && !FIELD_CHECKS.host(host)) config.host = host
  if (typeof sharedDir === 'string' && !FIELD_CHECKS.sharedDir(sharedDir)) config.sharedDir = sharedDir
  if (typeof chunkSize === 'number' && !FIELD_CHECKS.chunkSize(chunkSize)) config.chunkSize = chunkSize
  if (typeof sendBufferSize === 'number' && !FIELD_CHECKS.sendBufferSize(sendBufferSize)) {
    config.sendBufferSize = sendBufferSize
  }
  if (typeof pollIntervalMs === 'number' && !FIELD_CHECKS.pollIntervalMs(pollIntervalMs)) {
    config.pollIntervalMs = pollIntervalMs
  }
  if (streamMode === 'auto' || streamMode === 'buffered') config.streamMode = streamMode

  return config
}

export function loadConfig(): Config {
  const configFile = getConfigPath()
  try {
    if (!fs.existsSync(configFile)) return {}

    const parsed: unknown = JSON.parse(fs.readFileSync(configFile, 'utf8'))
    const errors = validateConfig(parsed)
    if (errors.length > 0) {
      console.error(`Config validation errors in ${configFile}:`)
      for (const err of errors) {
        console.error(`  - ${err.field}: ${err.message}`)
      }
      console.error('Using default values for invalid fields.')
    }

    return isRecord(parsed) ? pickValidFields(parsed) : {}
  } catch (err) {
    if (err instanceof SyntaxError) {
      console.error(`Invalid JSON in config file ${configFile}:`, err.message)
    } else {
      console.error('Failed to load config:', err)
    }
  }
  return {}
}

export function saveConfig(config: Config): boolean {
  const errors = validateConfig(config)
  if (errors.length > 0) {
    console.error('Cannot save invalid config:')
    for (const err of errors) {
      console.error(`  - ${err.field}: ${err.message}`)
    }
    return false
  }

  try {
    ensureConfigDir()
    fs.writeFileSync(getConfigPath(), JSON.stringify(config, null, 2))
    return true
  } catch (err) {
    console.error('Failed to save config:', err)
    return false
  }
}

export function ensureConfigDir(): void {
  const dir = getConfigDir()
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true })
  }
}

export function defaultSharedDir(): string {
  const downloads = path.join(os.homedir(), 'Downloads')
  return fs.existsSync(downloads) ? downloads : process.cwd()
}

function envPort(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined
  const port = Number(raw)
  return portError('Port', port) ? undefined : port
}

/**
 * Merges command-line overrides, environment overrides, the config file and
 * defaults, in that order of precedence, into a complete configuration. The
 * fast transfer port follows the web port unless set explicitly. The result is
 * not validated; run it through `validateConfig` before binding.
 */
export function resolveConfig(
  config: Config,
  env: NodeJS.ProcessEnv = process.env,
  overrides: Config = {}
): ResolvedConfig {
  const port = overrides.port ?? envPort(env['LANSHARE_PORT']) ?? config.port ?? DEFAULT_PORT
  const sharedDir = overrides.sharedDir || env['LANSHARE_DIR'] || config.sharedDir || defaultSharedDir()

  return {
    port,
    fastPort: overrides.fastPort ?? config.fastPort ?? port + 1,
    host: overrides.host || env['LANSHARE_HOST'] || config.host || DEFAULT_HOST,
    sharedDir: path.resolve(sharedDir),
    chunkSize: config.chunkSize ?? DEFAULT_CHUNK_SIZE,
    sendBufferSize: config.sendBufferSize ?? DEFAULT_SEND_BUFFER_SIZE,
    pollIntervalMs: config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
    streamMode: config.streamMode ?? 'auto'
  }
}
