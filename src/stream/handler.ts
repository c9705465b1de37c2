import type { Socket } from 'node:net'
import { lookupFile } from '../access.js'
import type { StreamMode } from '../config.js'
import { isTransportError } from '../errors.js'
import { formatHead, parseRequestHead, statusText } from '../http/parser.js'
import { attachmentName, formatSize, guessContentType } from '../media.js'
import type { SharedRoots } from '../roots.js'
import type { TransferRegistry } from '../transfer/registry.js'
import { errorMessage, type Logger } from '../utils.js'
import { negotiateRange } from './range.js'
import { readRequestHead } from './reader.js'
import { streamFile, writeChunk } from './streamer.js'

export interface FastTransferContext {
  roots: SharedRoots
  registry: TransferRegistry
  chunkSize: number
  pollIntervalMs: number
  streamMode: StreamMode
  logger: Logger
}

const ALLOWED_METHODS = 'GET, HEAD, OPTIONS'

const PREFLIGHT = formatHead(204, {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': ALLOWED_METHODS,
  'Access-Control-Allow-Headers': 'Range',
  'Connection': 'close'
})

function errorHead(status: number): Buffer {
  const body = Buffer.from(statusText(status))
  const head = formatHead(status, {
    'Content-Type': 'text/plain; charset=utf-8',
    'Content-Length': String(body.length),
    'Access-Control-Allow-Origin': '*',
    'Connection': 'close'
  })
  return Buffer.concat([Buffer.from(head), body])
}

async function reply(socket: Socket, data: string | Buffer): Promise<void> {
  await writeChunk(socket, typeof data === 'string' ? Buffer.from(data) : data)
  socket.end()
}

/**
 * Serves one request on a freshly accepted connection: read the head, check
 * the path, negotiate the range, then stream. Every failure stays inside this
 * connection; transport errors are dropped without a word.
 */
export async function handleConnection(socket: Socket, ctx: FastTransferContext): Promise<void> {
  try {
    await serve(socket, ctx)
  } catch (err) {
    if (!isTransportError(err)) {
      ctx.logger.error(`Fast transfer error: ${errorMessage(err)}`)
    }
    socket.destroy()
  }
}

async function serve(socket: Socket, ctx: FastTransferContext): Promise<void> {
  const head = await readRequestHead(socket)
  const req = head === null ? null : parseRequestHead(head)
  if (!req) {
    socket.destroy()
    return
  }

  if (req.method === 'OPTIONS') {
    await reply(socket, PREFLIGHT)
    return
  }
  if (req.method !== 'GET' && req.method !== 'HEAD') {
    await reply(socket, errorHead(405))
    return
  }

  // One view of the roots for the whole request
  const roots = ctx.roots.snapshot()
  const found = await lookupFile(req.path, req.query['path'], roots)
  if (!found.ok) {
    await reply(socket, errorHead(found.status))
    return
  }

  const range = negotiateRange(found.size, req.headers['range'])
  const headers: Record<string, string> = {
    'Content-Type': guessContentType(found.filePath),
    'Content-Length': String(range.length),
    'Content-Disposition': `attachment; filename="${attachmentName(found.name)}"`,
    'Accept-Ranges': 'bytes',
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': ALLOWED_METHODS,
    'Access-Control-Expose-Headers': 'Content-Length, Content-Range, X-Transfer-Id',
    'Cache-Control': 'no-cache',
    'Connection': 'close'
  }
  if (range.partial) {
    headers['Content-Range'] = `bytes ${range.start}-${range.end}/${found.size}`
  }
  const status = range.partial ? 206 : 200

  if (req.method === 'HEAD') {
    await reply(socket, formatHead(status, headers))
    return
  }

  const origin = socket.remoteAddress ?? 'unknown'
  const transferId = ctx.registry.start(found.name, range.length, origin)
  headers['X-Transfer-Id'] = transferId

  try {
    await writeChunk(socket, Buffer.from(formatHead(status, headers)))
  } catch (err) {
    ctx.registry.cancel(transferId)
    throw err
  }

  ctx.logger.log(`Sending ${found.name} (${formatSize(range.length)}) to ${origin} [${transferId}]`)

  const outcome = await streamFile({
    socket,
    filePath: found.filePath,
    start: range.start,
    length: range.length,
    transferId,
    registry: ctx.registry,
    chunkSize: ctx.chunkSize,
    pollIntervalMs: ctx.pollIntervalMs,
    mode: ctx.streamMode,
    onFallback: err => ctx.logger.error(`Piped read failed for ${found.name}, using buffered reads: ${errorMessage(err)}`)
  })

  ctx.logger.log(`Transfer ${transferId} ${outcome}`)
  if (outcome === 'aborted') {
    socket.destroy()
  } else {
    socket.end()
  }
}
