import net from 'node:net'
import type { StreamMode } from '../config.js'
import { isTransportError } from '../errors.js'
import type { SharedRoots } from '../roots.js'
import type { TransferRegistry } from '../transfer/registry.js'
import { errorMessage, type Logger } from '../utils.js'
import { handleConnection, type FastTransferContext } from './handler.js'

export interface FastTransferServerConfig {
  port: number
  host?: string
  roots: SharedRoots
  registry: TransferRegistry
  chunkSize: number
  sendBufferSize: number
  pollIntervalMs: number
  streamMode: StreamMode
  logger?: Logger
}

/**
 * Raw-socket file server: one request per connection, each handled on its
 * own and closed when the response is done.
 */
export class FastTransferServer {
  private server: net.Server | null = null
  private sockets: Set<net.Socket> = new Set()
  private config: FastTransferServerConfig
  private context: FastTransferContext

  constructor(config: FastTransferServerConfig) {
    this.config = config
    this.context = {
      roots: config.roots,
      registry: config.registry,
      chunkSize: config.chunkSize,
      pollIntervalMs: config.pollIntervalMs,
      streamMode: config.streamMode,
      logger: config.logger ?? console
    }
  }

  start(): Promise<number> {
    const logger = this.context.logger
    // Large stream buffers keep the Wi-Fi link busy; Nagle only adds latency here.
    // Listening sockets get SO_REUSEADDR from libuv.
    const options: net.ServerOpts & { highWaterMark: number } = {
      allowHalfOpen: true,
      noDelay: true,
      highWaterMark: this.config.sendBufferSize
    }

    return new Promise((resolve, reject) => {
      const server = net.createServer(options)
      this.server = server

      server.on('connection', (socket: net.Socket) => {
        this.sockets.add(socket)
        socket.setNoDelay(true)
        socket.on('close', () => this.sockets.delete(socket))
        socket.on('error', (err: Error) => {
          if (!isTransportError(err)) logger.error(`Fast transfer socket error: ${err.message}`)
        })

        handleConnection(socket, this.context).catch((err: unknown) => {
          logger.error(`Fast transfer handler failed: ${errorMessage(err)}`)
          socket.destroy()
        })
      })

      server.once('error', (err: Error) => {
        reject(err)
      })

      server.listen(this.config.port, this.config.host ?? '0.0.0.0', () => {
        const addr = server.address()
        const port = (addr && typeof addr === 'object') ? addr.port : this.config.port
        logger.log(`Fast transfer server listening on port ${port}`)
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
}
