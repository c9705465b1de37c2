import type { Socket } from 'node:net'
import b4a from 'b4a'
import { HEADER_TERMINATOR, MAX_HEAD_BYTES } from '../http/parser.js'

/**
 * Collects bytes from the socket until the blank line that ends the request
 * head. Resolves with the head text (terminator excluded), or null when the
 * peer goes away first or sends more than `maxBytes` without finishing it.
 * Anything after the terminator is discarded.
 */
export function readRequestHead(socket: Socket, maxBytes = MAX_HEAD_BYTES): Promise<string | null> {
  return new Promise(resolve => {
    let buffer = b4a.alloc(0)
    let settled = false

    const finish = (head: string | null): void => {
      if (settled) return
      settled = true
      socket.off('data', onData)
      socket.off('end', onGone)
      socket.off('close', onGone)
      socket.off('error', onGone)
      resolve(head)
    }

    const onData = (chunk: Buffer): void => {
      // The terminator may straddle two chunks
      const searchFrom = Math.max(0, buffer.length - (HEADER_TERMINATOR.length - 1))
      buffer = b4a.concat([buffer, chunk])

      const headEnd = b4a.indexOf(buffer, HEADER_TERMINATOR, searchFrom)
      if (headEnd >= 0) {
        finish(b4a.toString(buffer.subarray(0, headEnd), 'utf8'))
      } else if (buffer.length > maxBytes) {
        finish(null)
      }
    }

    const onGone = (): void => finish(null)

    socket.on('data', onData)
    socket.on('end', onGone)
    socket.on('close', onGone)
    socket.on('error', onGone)
  })
}
