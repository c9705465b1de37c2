import net from 'node:net'
import { PassThrough } from 'node:stream'
import b4a from 'b4a'
import { parseRequestHead, formatResponse, errorResponse, HEADER_TERMINATOR, MAX_HEAD_BYTES, type HttpRequest, type HttpResponse } from './parser.js'
import { Router, type RouteParams } from './router.js'
import type { HttpContext } from './handlers.js'
import {
  handleInfo,
  handleTransfers,
  handlePauseTransfer,
  handleResumeTransfer,
  handleCancelTransfer,
  handleSetDirectory,
  handleBrowse,
  handleUpload
} from './handlers.js'
import { isTransportError, TransportError } from '../errors.js'
import { errorMessage, type Logger } from '../utils.js'

export interface HttpServerConfig {
  port: number
  host?: string
  context: HttpContext
  logger?: Logger
}

type ContextHandler = (req: HttpRequest, params: RouteParams, ctx: HttpContext) => HttpResponse | Promise<HttpResponse>

const MAX_BODY_BYTES = 64 * 1024

const CORS_HEADERS: Record<string, string> = {
  'access-control-allow-origin': '*',
  'access-control-allow-headers': 'Content-Type'
}

/** JSON control API: server info, transfer control, directory browsing. */
export class HttpServer {
  private server: net.Server | null = null
  private sockets: Set<net.Socket> = new Set()
  private config: HttpServerConfig
  private router: Router
  private logger: Logger

  constructor(config: HttpServerConfig) {
    this.config = config
    this.router = new Router()
    this.logger = config.logger ?? console
    this.setupRoutes()
  }

  private setupRoutes(): void {
    const ctx = this.config.context

    // Wrap handlers to inject context
    const wrap = (handler: ContextHandler) => {
      return (req: HttpRequest, params: RouteParams) => handler(req, params, ctx)
    }

    this.router.add('GET', '/api/info', wrap(handleInfo))
    this.router.add('GET', '/api/transfers', wrap(handleTransfers))
    this.router.add('POST', '/api/transfers/:id/pause', wrap(handlePauseTransfer))
    this.router.add('POST', '/api/transfers/:id/resume', wrap(handleResumeTransfer))
    this.router.add('POST', '/api/transfers/:id/cancel', wrap(handleCancelTransfer))
    this.router.add('DELETE', '/api/transfers/:id', wrap(handleCancelTransfer))
    this.router.add('POST', '/api/directory', wrap(handleSetDirectory))
    this.router.add('GET', '/api/browse', wrap(handleBrowse))
    this.router.add('POST', '/api/upload', wrap(handleUpload), { streamBody: true })
  }

  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = net.createServer()
      this.server = server

      server.on('connection', (socket: net.Socket) => {
        this.sockets.add(socket)
        socket.on('close', () => this.sockets.delete(socket))
        this.handleConnection(socket)
      })

      server.once('error', (err: Error) => {
        reject(err)
      })

      server.listen(this.config.port, this.config.host ?? '0.0.0.0', () => {
        const addr = server.address()
        const port = (addr && typeof addr === 'object') ? addr.port : this.config.port
        this.logger.log(`HTTP API listening on port ${port}`)
        resolve(port)
      })
    })
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.server
      if (!server) {
        resolve()
        return
      }
      for (const socket of this.sockets) socket.destroy()
      this.sockets.clear()
      server.close(() => {
        this.server = null
        resolve()
      })
    })
  }

  async dispatch(req: HttpRequest): Promise<HttpResponse> {
    if (req.method === 'OPTIONS') {
      const methods = this.router.allowedMethods(req.path)
      return {
        status: 204,
        statusText: 'No Content',
        headers: { 'access-control-allow-methods': [...methods, 'OPTIONS'].join(', ') },
        body: ''
      }
    }

    const match = this.router.match(req.method, req.path)
    if (!match) {
      return this.router.allowedMethods(req.path).length > 0
        ? errorResponse(405, 'Method not allowed')
        : errorResponse(404, 'Not found')
    }

    try {
      return await match.handler(req, match.params)
    } catch (err) {
      this.logger.error(`HTTP handler error: ${errorMessage(err)}`)
      return errorResponse(500, 'Internal server error')
    }
  }

  private handleConnection(socket: net.Socket): void {
    let buffer = b4a.alloc(0)
    let handled = false
    let upload: BodyStream | null = null

    const send = (res: HttpResponse): void => {
      res.headers = { ...CORS_HEADERS, ...res.headers }
      socket.end(formatResponse(res))
      // Whatever the handler left unread is drained so the client can finish sending
      if (upload && !upload.finished) upload.discard()
    }

    const respond = (req: HttpRequest): void => {
      this.dispatch(req).then(send, (err: unknown) => {
        this.logger.error(`HTTP dispatch failed: ${errorMessage(err)}`)
        socket.destroy()
      })
    }

    socket.on('data', (chunk: Buffer) => {
      if (upload) {
        upload.push(chunk)
        return
      }
      if (handled) return
      buffer = b4a.concat([buffer, chunk])

      // Wait for complete headers
      const headEnd = b4a.indexOf(buffer, HEADER_TERMINATOR)
      if (headEnd < 0) {
        if (buffer.length > MAX_HEAD_BYTES) socket.destroy()
        return
      }

      const req = parseRequestHead(b4a.toString(buffer.subarray(0, headEnd), 'utf8'))
      if (!req) {
        handled = true
        send(errorResponse(400, 'Bad Request'))
        return
      }

      const bodyStart = headEnd + HEADER_TERMINATOR.length
      const lengthHeader = req.headers['content-length']

      if (this.router.match(req.method, req.path)?.streamBody) {
        handled = true
        const contentLength = lengthHeader === undefined ? NaN : Number(lengthHeader)
        if (!Number.isSafeInteger(contentLength) || contentLength < 0) {
          send(errorResponse(411, 'Content-Length required'))
          return
        }
        upload = new BodyStream(socket, contentLength)
        req.stream = upload.stream
        upload.push(buffer.subarray(bodyStart))
        respond(req)
        return
      }

      // Check if there's a body to read
      const contentLength = parseInt(lengthHeader ?? '0', 10) || 0
      if (contentLength > MAX_BODY_BYTES) {
        handled = true
        send(errorResponse(400, 'Body too large'))
        return
      }
      if (buffer.length - bodyStart < contentLength) {
        // Body still arriving
        return
      }

      handled = true
      req.body = b4a.toString(buffer.subarray(bodyStart, bodyStart + contentLength), 'utf8')
      respond(req)
    })

    socket.on('close', () => {
      if (upload && !upload.finished) {
        upload.stream.destroy(new TransportError('Client went away during upload', 'ECONNRESET'))
      }
    })

    socket.on('error', (err: Error) => {
      // Broken connections are normal; only report the unexpected
      if (!isTransportError(err)) this.logger.error(`HTTP socket error: ${err.message}`)
    })
  }
}

/**
 * Request body handed to a streaming route: the first `length` bytes after
 * the head, with the socket paused while the reader falls behind.
 */
class BodyStream {
  readonly stream = new PassThrough()
  private remaining: number
  private socket: net.Socket

  constructor(socket: net.Socket, length: number) {
    this.socket = socket
    this.remaining = length
    this.stream.on('drain', () => socket.resume())
    if (length === 0) this.stream.end()
  }

  get finished(): boolean {
    return this.remaining === 0
  }

  push(chunk: Buffer): void {
    if (this.remaining === 0 || chunk.length === 0) return
    const part = chunk.length > this.remaining ? chunk.subarray(0, this.remaining) : chunk
    this.remaining -= part.length
    if (this.stream.destroyed) return
    const more = this.stream.write(part)
    if (this.remaining === 0) {
      this.stream.end()
    } else if (!more) {
      this.socket.pause()
    }
  }

  discard(): void {
    this.stream.resume()
    this.socket.resume()
  }
}
