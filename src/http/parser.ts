import type { Readable } from 'node:stream'

export interface HttpRequest {
  method: string
  path: string
  query: Record<string, string>
  headers: Record<string, string>
  body: string
  stream?: Readable           // set instead of `body` on streaming routes
}

export interface HttpResponse {
  status: number
  statusText: string
  headers: Record<string, string>
  body: string
}

export const HEADER_TERMINATOR = '\r\n\r\n'
export const MAX_HEAD_BYTES = 65536

// Percent-decoding that never throws: malformed escapes leave the token as
// sent, and the access guard refuses it later.
export function safeDecode(token: string): string {
  try {
    return decodeURIComponent(token)
  } catch {
    return token
  }
}

export function parseRequestHead(raw: string): HttpRequest | null {
  const headEnd = raw.indexOf(HEADER_TERMINATOR)
  const head = headEnd >= 0 ? raw.slice(0, headEnd) : raw
  const lines = head.split('\r\n')

  const requestLine = lines[0]
  if (!requestLine) return null

  const parts = requestLine.split(' ').filter(Boolean)
  const [rawMethod, rawUrl] = parts
  if (!rawMethod || !rawUrl) return null

  const method = rawMethod.toUpperCase()

  // Split path and query string
  const qIdx = rawUrl.indexOf('?')
  const path = safeDecode(qIdx >= 0 ? rawUrl.slice(0, qIdx) : rawUrl)
  const query = qIdx >= 0 ? parseQueryString(rawUrl.slice(qIdx + 1)) : {}

  // Parse headers
  const headers: Record<string, string> = {}
  for (const line of lines.slice(1)) {
    const colonIdx = line.indexOf(':')
    if (colonIdx < 0) continue
    const name = line.slice(0, colonIdx).trim().toLowerCase()
    const value = line.slice(colonIdx + 1).trim()
    headers[name] = value
  }

  return { method, path, query, headers, body: '' }
}

export function parseQueryString(qs: string): Record<string, string> {
  const result: Record<string, string> = {}
  if (!qs) return result

  const pairs = qs.split('&')
  for (const pair of pairs) {
    const eqIdx = pair.indexOf('=')
    if (eqIdx < 0) {
      if (pair) result[safeDecode(pair)] = ''
      continue
    }
    const key = safeDecode(pair.slice(0, eqIdx))
    const value = safeDecode(pair.slice(eqIdx + 1))
    result[key] = value
  }

  return result
}

export function formatHead(status: number, headers: Record<string, string>): string {
  let out = `HTTP/1.1 ${status} ${statusText(status)}\r\n`
  for (const [name, value] of Object.entries(headers)) {
    out += `${name}: ${value}\r\n`
  }
  return out + '\r\n'
}

export function formatResponse(res: HttpResponse): string {
  let out = `HTTP/1.1 ${res.status} ${res.statusText}\r\n`

  const headers = { ...res.headers }
  if (!headers['content-length']) {
    headers['content-length'] = String(Buffer.byteLength(res.body, 'utf8'))
  }
  if (!headers['connection']) {
    headers['connection'] = 'close'
  }

  for (const [name, value] of Object.entries(headers)) {
    out += `${name}: ${value}\r\n`
  }

  out += '\r\n'
  out += res.body

  return out
}

export function jsonResponse(data: unknown, status = 200): HttpResponse {
  const body = JSON.stringify(data)
  return {
    status,
    statusText: statusText(status),
    headers: { 'content-type': 'application/json' },
    body
  }
}

export function errorResponse(status: number, message: string): HttpResponse {
  return jsonResponse({ error: message }, status)
}

export function statusText(code: number): string {
  switch (code) {
    case 200: return 'OK'
    case 204: return 'No Content'
    case 206: return 'Partial Content'
    case 400: return 'Bad Request'
    case 403: return 'Forbidden'
    case 404: return 'Not Found'
    case 405: return 'Method Not Allowed'
    case 411: return 'Length Required'
    case 500: return 'Internal Server Error'
    default: return 'Unknown'
  }
}
