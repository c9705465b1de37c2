import fs from 'node:fs'
import fsp from 'node:fs/promises'
import type { Socket } from 'node:net'
import type { Readable } from 'node:stream'
import type { StreamMode } from '../config.js'
import { TransferError, TransportError, errorCode, isTransportError } from '../errors.js'
import type { TransferRegistry } from '../transfer/registry.js'
import { errorMessage, sleep } from '../utils.js'

/** Opens a read stream over bytes `start..end` (inclusive) of a file. */
export type SourceFactory = (filePath: string, start: number, end: number, chunkSize: number) => Readable

export interface StreamOptions {
  socket: Socket
  filePath: string
  start: number
  length: number
  transferId: string
  registry: TransferRegistry
  chunkSize: number
  pollIntervalMs: number
  mode: StreamMode
  openSource?: SourceFactory
  onFallback?: (err: unknown) => void
}

export type StreamOutcome = 'complete' | 'cancelled' | 'aborted'

type Gate = 'go' | 'stop'

interface Progress {
  sent: number
}

const openFileSource: SourceFactory = (filePath, start, end, chunkSize) =>
  fs.createReadStream(filePath, { start, end, highWaterMark: chunkSize })

/**
 * Sends `length` bytes of the file from offset `start` to the socket, after
 * the response head has been written.
 *
 * The piped path reads the file through its own read stream and hands each
 * chunk to the socket. If a read fails on the file side, the rest of the range
 * goes through the buffered path: a fresh handle, one reused buffer,
 * positional reads, write, repeat. Before every chunk the transfer's status is
 * checked, waiting out a pause and stopping on cancel.
 *
 * Client disconnects end the stream quietly with outcome 'aborted'. Every file
 * descriptor is closed on every path.
 */
export async function streamFile(opts: StreamOptions): Promise<StreamOutcome> {
  const { registry, transferId } = opts
  const progress: Progress = { sent: 0 }

  try {
    let gate: Gate = 'go'
    if (opts.mode === 'auto') {
      try {
        gate = await pipeRange(opts, progress)
      } catch (err) {
        if (isTransportError(err)) throw err
        opts.onFallback?.(err)
        gate = await bufferedRange(opts, progress)
      }
    } else {
      gate = await bufferedRange(opts, progress)
    }

    if (gate === 'stop') return 'cancelled'
    registry.complete(transferId)
    return 'complete'
  } catch (err) {
    registry.cancel(transferId)
    if (!isTransportError(err)) {
      throw new TransferError(`Streaming ${transferId} failed: ${errorMessage(err)}`, errorCode(err))
    }
    return 'aborted'
  }
}

async function pipeRange(opts: StreamOptions, progress: Progress): Promise<Gate> {
  const remaining = opts.length - progress.sent
  if (remaining <= 0) return 'go'

  const position = opts.start + progress.sent
  const open = opts.openSource ?? openFileSource
  const source = open(opts.filePath, position, position + remaining - 1, opts.chunkSize)

  try {
    for await (const chunk of source) {
      if (!Buffer.isBuffer(chunk)) continue
      if (await awaitTurn(opts) === 'stop') return 'stop'
      await writeChunk(opts.socket, chunk)
      progress.sent += chunk.length
      opts.registry.update(opts.transferId, progress.sent)
    }
  } finally {
    source.destroy()
  }
  return 'go'
}

async function bufferedRange(opts: StreamOptions, progress: Progress): Promise<Gate> {
  const remaining = opts.length - progress.sent
  if (remaining <= 0) return 'go'

  const handle = await fsp.open(opts.filePath, 'r')
  try {
    const buffer = Buffer.allocUnsafe(Math.min(opts.chunkSize, remaining))
    while (progress.sent < opts.length) {
      if (await awaitTurn(opts) === 'stop') return 'stop'

      const want = Math.min(buffer.length, opts.length - progress.sent)
      const { bytesRead } = await handle.read(buffer, 0, want, opts.start + progress.sent)
      if (bytesRead === 0) break   // file shrank

      await writeChunk(opts.socket, buffer.subarray(0, bytesRead))
      progress.sent += bytesRead
      opts.registry.update(opts.transferId, progress.sent)
    }
  } finally {
    await handle.close()
  }
  return 'go'
}

// Blocks while the transfer is paused. 'stop' once it is cancelled or gone.
// A half-open socket stays alive after the peer's FIN, so an ended read side
// counts as a departed client here.
async function awaitTurn(opts: StreamOptions): Promise<Gate> {
  const { registry, transferId, socket } = opts
  for (;;) {
    const status = registry.status(transferId)
    if (status === undefined || status === 'done') return 'stop'
    if (status === 'active') return 'go'
    if (socket.destroyed || socket.readableEnded) {
      throw new TransportError('Client went away while paused', 'ECONNRESET')
    }
    await sleep(opts.pollIntervalMs)
  }
}

// Resolves once the socket has taken the chunk, so the buffer may be reused.
export function writeChunk(socket: Socket, chunk: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    if (socket.destroyed || !socket.writable) {
      reject(new TransportError('Socket is closed', 'ERR_STREAM_DESTROYED'))
      return
    }
    socket.write(chunk, err => {
      if (err) reject(new TransportError(err.message, errorCode(err)))
      else resolve()
    })
  })
}
