import { test, describe, before, after } from 'node:test'
import assert from 'node:assert'
import fs from 'node:fs'
import path from 'node:path'
import { HttpServer } from '../src/http/server.js'
import type { HttpRequest } from '../src/http/parser.js'
import { SharedRoots } from '../src/roots.js'
import { TransferRegistry } from '../src/transfer/registry.js'
import { silentLogger } from '../src/utils.js'
import { FORM_BOUNDARY, makeTempDir, multipartBody, parseRawResponse, patternBytes, rawExchange, request, type FormPart } from './helpers.js'

let tmp: string
let roots: SharedRoots
let registry: TransferRegistry
let server: HttpServer
let port: number

function uploadRequest(body: Buffer, contentType = `multipart/form-data; boundary=${FORM_BOUNDARY}`): Buffer {
  const head = `POST /api/upload HTTP/1.1\r\nContent-Type: ${contentType}\r\nContent-Length: ${body.length}\r\n\r\n`
  return Buffer.concat([Buffer.from(head), body])
}

async function upload(parts: FormPart[]): Promise<{ status: number; body: unknown }> {
  const res = parseRawResponse(await rawExchange(port, uploadRequest(multipartBody(parts))))
  return { status: res.status, body: JSON.parse(res.body.toString()) }
}

function makeReq(method: string, reqPath: string, body = ''): HttpRequest {
  return { method, path: reqPath, query: {}, headers: {}, body }
}

before(async () => {
  tmp = makeTempDir()
  fs.mkdirSync(path.join(tmp, 'share'))
  fs.mkdirSync(path.join(tmp, 'other'))
  roots = new SharedRoots(path.join(tmp, 'share'), tmp)
  registry = new TransferRegistry()
  server = new HttpServer({
    port: 0,
    host: '127.0.0.1',
    logger: silentLogger,
    context: {
      roots,
      registry,
      address: '127.0.0.1',
      port: 5000,
      fastPort: 5001
    }
  })
  port = await server.start()
})

after(async () => {
  await server.stop()
  fs.rmSync(tmp, { recursive: true, force: true })
})

describe('HttpServer.dispatch', () => {
  test('routes to a handler', async () => {
    const id = registry.start('a.txt', 5, '10.0.0.2')
    const res = await server.dispatch(makeReq('POST', `/api/transfers/${id}/pause`))
    assert.strictEqual(res.status, 200)
    assert.strictEqual(registry.status(id), 'paused')
  })

  test('cancels through DELETE', async () => {
    const id = registry.start('a.txt', 5, '10.0.0.2')
    const res = await server.dispatch(makeReq('DELETE', `/api/transfers/${id}`))
    assert.strictEqual(res.status, 200)
    assert.strictEqual(registry.status(id), 'done')
  })

  test('answers an unknown path with 404', async () => {
    const res = await server.dispatch(makeReq('GET', '/api/nothing'))
    assert.strictEqual(res.status, 404)
    assert.deepStrictEqual(JSON.parse(res.body), { error: 'Not found' })
  })

  test('answers a known path with the wrong method with 405', async () => {
    const res = await server.dispatch(makeReq('DELETE', '/api/info'))
    assert.strictEqual(res.status, 405)
    assert.deepStrictEqual(JSON.parse(res.body), { error: 'Method not allowed' })
  })

  test('answers a preflight with the allowed methods', async () => {
    const res = await server.dispatch(makeReq('OPTIONS', '/api/transfers/abc'))
    assert.strictEqual(res.status, 204)
    assert.strictEqual(res.headers['access-control-allow-methods'], 'DELETE, OPTIONS')
  })

  test('lists POST for the upload route', async () => {
    const res = await server.dispatch(makeReq('OPTIONS', '/api/upload'))
    assert.strictEqual(res.headers['access-control-allow-methods'], 'POST, OPTIONS')
  })
})

describe('HttpServer over a socket', () => {
  test('serves JSON with CORS headers', async () => {
    const res = await request(port, 'GET', '/api/info')
    assert.strictEqual(res.status, 200)
    assert.strictEqual(res.headers['access-control-allow-origin'], '*')
    assert.strictEqual(res.headers['content-type'], 'application/json')
    const body: unknown = JSON.parse(res.body.toString())
    assert.ok(typeof body === 'object' && body !== null && 'fastUrl' in body)
    assert.strictEqual(body.fastUrl, 'http://127.0.0.1:5001')
  })

  test('reads a request body before dispatching', async () => {
    const payload = JSON.stringify({ directory: path.join(tmp, 'other') })
    const head = `POST /api/directory HTTP/1.1\r\nContent-Type: application/json\r\nContent-Length: ${Buffer.byteLength(payload)}\r\n\r\n`
    const res = parseRawResponse(await rawExchange(port, head + payload))
    assert.strictEqual(res.status, 200)
    assert.deepStrictEqual(JSON.parse(res.body.toString()), { success: true, directory: path.join(tmp, 'other') })
  })

  test('refuses an oversized body', async () => {
    const res = await request(port, 'POST', '/api/directory', { 'Content-Length': String(1024 * 1024) })
    assert.strictEqual(res.status, 400)
    assert.deepStrictEqual(JSON.parse(res.body.toString()), { error: 'Body too large' })
  })

  test('answers a malformed request line with 400', async () => {
    const res = parseRawResponse(await rawExchange(port, 'NONSENSE\r\n\r\n'))
    assert.strictEqual(res.status, 400)
  })
})

describe('HttpServer uploads', () => {
  test('streams an upload larger than the buffered body limit into the shared directory', async () => {
    const content = patternBytes(200 * 1024, 3)
    const res = await upload([
      { name: 'note', content: 'from my phone' },
      { name: 'file', filename: 'photo.bin', content }
    ])
    assert.strictEqual(res.status, 200)
    assert.deepStrictEqual(res.body, { success: true, filename: 'photo.bin', size: content.length })
    assert.ok(fs.readFileSync(path.join(roots.sharedDir, 'photo.bin')).equals(content))
  })

  test('keeps only the last component of the uploaded name', async () => {
    const res = await upload([{ name: 'file', filename: '../../escape.txt', content: 'hello' }])
    assert.strictEqual(res.status, 200)
    assert.deepStrictEqual(res.body, { success: true, filename: 'escape.txt', size: 5 })
    assert.strictEqual(fs.readFileSync(path.join(roots.sharedDir, 'escape.txt'), 'utf8'), 'hello')
    assert.strictEqual(fs.existsSync(path.join(path.dirname(tmp), 'escape.txt')), false)
  })

  test('refuses a form without a file part', async () => {
    const res = await upload([{ name: 'note', content: 'no attachment' }])
    assert.strictEqual(res.status, 400)
    assert.deepStrictEqual(res.body, { error: 'No file part' })
  })

  test('refuses a file part whose name is only dots', async () => {
    const res = await upload([{ name: 'file', filename: '..', content: 'x' }])
    assert.strictEqual(res.status, 400)
    assert.deepStrictEqual(res.body, { error: 'No selected file' })
  })

  test('refuses a body that is not multipart', async () => {
    const payload = Buffer.alloc(100 * 1024, 0x61)
    const res = parseRawResponse(await rawExchange(port, uploadRequest(payload, 'application/octet-stream')))
    assert.strictEqual(res.status, 400)
    assert.deepStrictEqual(JSON.parse(res.body.toString()), { error: 'Expected multipart/form-data' })
  })

  test('requires a Content-Length', async () => {
    const res = await request(port, 'POST', '/api/upload', { 'Content-Type': `multipart/form-data; boundary=${FORM_BOUNDARY}` })
    assert.strictEqual(res.status, 411)
    assert.deepStrictEqual(JSON.parse(res.body.toString()), { error: 'Content-Length required' })
  })
})
