const TRANSPORT_CODES = new Set([
  'ECONNRESET',
  'EPIPE',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ERR_STREAM_DESTROYED',
  'ERR_STREAM_WRITE_AFTER_END',
  'ERR_SOCKET_CLOSED'
])

/** A write to the client failed; the response cannot be completed. */
export class TransportError extends Error {
  readonly code: string | undefined

  constructor(message: string, code?: string) {
    super(message)
    this.name = 'TransportError'
    this.code = code
  }
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined
  return typeof err.code === 'string' ? err.code : undefined
}

export function isTransportError(err: unknown): boolean {
  if (err instanceof TransportError) return true
  const code = errorCode(err)
  return code !== undefined && TRANSPORT_CODES.has(code)
}

/** Reading the file failed on both paths; the connection is dropped. */
export class TransferError extends Error {
  readonly code: string | undefined

  constructor(message: string, code?: string) {
    super(message)
    this.name = 'TransferError'
    this.code = code
  }
}
