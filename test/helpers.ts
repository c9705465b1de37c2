import fs from 'node:fs'
import net from 'node:net'
import os from 'node:os'
import path from 'node:path'

export interface RawResponse {
  status: number
  headers: Record<string, string>
  body: Buffer
  raw: Buffer
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'lanshare-test-'))
}

// Bytes that differ per file and per offset, so misplaced ranges show up.
export function patternBytes(size: number, seed = 0): Buffer {
  const buf = Buffer.alloc(size)
  for (let i = 0; i < size; i++) buf[i] = (i * 31 + seed) % 251
  return buf
}

export function parseRawResponse(raw: Buffer): RawResponse {
  const headEnd = raw.indexOf('\r\n\r\n')
  const head = raw.subarray(0, headEnd < 0 ? raw.length : headEnd).toString('utf8')
  const [statusLine = '', ...lines] = head.split('\r\n')
  const status = parseInt(statusLine.split(' ')[1] ?? '0', 10)

  const headers: Record<string, string> = {}
  for (const line of lines) {
    const colon = line.indexOf(':')
    if (colon < 0) continue
    headers[line.slice(0, colon).trim().toLowerCase()] = line.slice(colon + 1).trim()
  }

  return {
    status,
    headers,
    body: headEnd < 0 ? Buffer.alloc(0) : raw.subarray(headEnd + 4),
    raw
  }
}

/** Writes `request` on a fresh connection and collects everything until close. */
export function rawExchange(port: number, request: string | Buffer): Promise<Buffer> {
  return new Promise(resolve => {
    const socket = net.connect(port, '127.0.0.1')
    const chunks: Buffer[] = []
    socket.on('connect', () => socket.write(request))
    socket.on('data', (chunk: Buffer) => chunks.push(chunk))
    // A reset still ends the exchange; the test inspects what arrived
    socket.on('error', () => socket.destroy())
    socket.on('close', () => resolve(Buffer.concat(chunks)))
  })
}

export async function request(
  port: number,
  method: string,
  target: string,
  headers: Record<string, string> = {}
): Promise<RawResponse> {
  let head = `${method} ${target} HTTP/1.1\r\nHost: 127.0.0.1\r\n`
  for (const [name, value] of Object.entries(headers)) head += `${name}: ${value}\r\n`
  head += '\r\n'
  return parseRawResponse(await rawExchange(port, head))
}

export interface SocketPair {
  server: net.Socket
  client: net.Socket
  close: () => Promise<void>
}

/** A connected pair of sockets over loopback. */
export function socketPair(options: net.ServerOpts = {}): Promise<SocketPair> {
  return new Promise((resolve, reject) => {
    let client: net.Socket
    const listener = net.createServer(options)
    listener.once('error', reject)
    listener.once('connection', (server: net.Socket) => {
      server.on('error', () => server.destroy())
      resolve({
        server,
        client,
        close: () => new Promise<void>(done => {
          server.destroy()
          client.destroy()
          listener.close(() => done())
        })
      })
    })
    listener.listen(0, '127.0.0.1', () => {
      const addr = listener.address()
      const port = addr && typeof addr === 'object' ? addr.port : 0
      client = net.connect(port, '127.0.0.1')
      client.on('error', () => client.destroy())
    })
  })
}

export function collect(socket: net.Socket): () => Buffer {
  const chunks: Buffer[] = []
  socket.on('data', (chunk: Buffer) => chunks.push(chunk))
  return () => Buffer.concat(chunks)
}

export function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs
  return new Promise((resolve, reject) => {
    const check = (): void => {
      if (predicate()) resolve()
      else if (Date.now() > deadline) reject(new Error('Timed out waiting for condition'))
      else setTimeout(check, 5)
    }
    check()
  })
}

export interface Download {
  socket: net.Socket
  head: Promise<RawResponse>
  body: () => Buffer
  closed: Promise<void>
}

/** Starts a GET and hands back the live connection, for tests that act mid-transfer. */
export function openDownload(port: number, target: string): Download {
  const socket = net.connect(port, '127.0.0.1')
  const chunks: Buffer[] = []
  let headSeen = false
  let resolveHead: (res: RawResponse) => void = () => {}
  const head = new Promise<RawResponse>(resolve => { resolveHead = resolve })
  const closed = new Promise<void>(resolve => socket.on('close', () => resolve()))

  socket.on('connect', () => socket.write(`GET ${target} HTTP/1.1\r\nHost: 127.0.0.1\r\n\r\n`))
  socket.on('error', () => socket.destroy())
  socket.on('data', (chunk: Buffer) => {
    chunks.push(chunk)
    if (headSeen) return
    const raw = Buffer.concat(chunks)
    if (raw.indexOf('\r\n\r\n') >= 0) {
      headSeen = true
      resolveHead(parseRawResponse(raw))
    }
  })

  return {
    socket,
    head,
    body: () => parseRawResponse(Buffer.concat(chunks)).body,
    closed
  }
}

export interface FormPart {
  name: string
  filename?: string
  content: string | Buffer
}

export const FORM_BOUNDARY = 'lanshare-test-boundary'

/** Encodes `parts` as a multipart/form-data body delimited by FORM_BOUNDARY. */
export function multipartBody(parts: FormPart[]): Buffer {
  const chunks: Buffer[] = []
  for (const part of parts) {
    let disposition = `form-data; name="${part.name}"`
    if (part.filename !== undefined) disposition += `; filename="${part.filename}"`
    chunks.push(Buffer.from(
      `--${FORM_BOUNDARY}\r\nContent-Disposition: ${disposition}\r\nContent-Type: application/octet-stream\r\n\r\n`
    ))
    chunks.push(Buffer.from(part.content))
    chunks.push(Buffer.from('\r\n'))
  }
  chunks.push(Buffer.from(`--${FORM_BOUNDARY}--\r\n`))
  return Buffer.concat(chunks)
}
