import crypto from 'hypercore-crypto'
import b4a from 'b4a'

export function generateId(bytes = 16): string {
  return b4a.toString(crypto.randomBytes(bytes), 'hex')
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export interface Logger {
  log(...args: unknown[]): void
  error(...args: unknown[]): void
}

export const silentLogger: Logger = {
  log: () => {},
  error: () => {}
}
