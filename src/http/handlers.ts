import type { HttpRequest, HttpResponse } from './parser.js'
import { jsonResponse, errorResponse } from './parser.js'
import type { RouteParams } from './router.js'
import { receiveUpload, UploadError } from './upload.js'
import { listDirectory } from '../browse.js'
import type { SharedRoots } from '../roots.js'
import type { TransferRegistry } from '../transfer/registry.js'

export interface HttpContext {
  roots: SharedRoots
  registry: TransferRegistry
  address: string             // LAN address advertised to phones
  port: number
  fastPort: number | null     // null when the fast server failed to start
  onDirectoryChange?: (dir: string) => void
  onUpload?: (filename: string, size: number) => void
}

// --- Server info ---

export function handleInfo(_req: HttpRequest, _params: RouteParams, ctx: HttpContext): HttpResponse {
  const { sharedDir, homeDir } = ctx.roots.snapshot()
  return jsonResponse({
    ip: ctx.address,
    port: ctx.port,
    fastPort: ctx.fastPort,
    url: `http://${ctx.address}:${ctx.port}`,
    fastUrl: ctx.fastPort === null ? null : `http://${ctx.address}:${ctx.fastPort}`,
    directory: sharedDir,
    home: homeDir,
    status: 'running'
  })
}

// --- Transfers ---

export function handleTransfers(_req: HttpRequest, _params: RouteParams, ctx: HttpContext): HttpResponse {
  return jsonResponse({ transfers: ctx.registry.list() })
}

type TransferAction = 'pause' | 'resume' | 'cancel'

function transferAction(action: TransferAction, params: RouteParams, ctx: HttpContext): HttpResponse {
  const id = params['id']
  if (!id) return errorResponse(400, 'Missing transfer id')

  const ok = action === 'pause'
    ? ctx.registry.pause(id)
    : action === 'resume'
      ? ctx.registry.resume(id)
      : ctx.registry.cancel(id)

  if (!ok) return errorResponse(404, 'Transfer not found')
  return jsonResponse({ success: true, id })
}

export function handlePauseTransfer(_req: HttpRequest, params: RouteParams, ctx: HttpContext): HttpResponse {
  return transferAction('pause', params, ctx)
}

export function handleResumeTransfer(_req: HttpRequest, params: RouteParams, ctx: HttpContext): HttpResponse {
  return transferAction('resume', params, ctx)
}

export function handleCancelTransfer(_req: HttpRequest, params: RouteParams, ctx: HttpContext): HttpResponse {
  return transferAction('cancel', params, ctx)
}

// --- Shared directory ---

export function handleSetDirectory(req: HttpRequest, _params: RouteParams, ctx: HttpContext): HttpResponse {
  let payload: unknown
  try {
    payload = JSON.parse(req.body)
  } catch {
    return errorResponse(400, 'Invalid JSON body')
  }

  const directory = typeof payload === 'object' && payload !== null && 'directory' in payload
    ? payload.directory
    : undefined
  if (typeof directory !== 'string' || !directory) {
    return errorResponse(400, 'Missing required field: directory')
  }

  const error = ctx.roots.setSharedDir(directory)
  if (error) return errorResponse(400, error)

  const current = ctx.roots.sharedDir
  ctx.onDirectoryChange?.(current)
  return jsonResponse({ success: true, directory: current })
}

// --- Browsing ---

export async function handleBrowse(req: HttpRequest, _params: RouteParams, ctx: HttpContext): Promise<HttpResponse> {
  const result = await listDirectory(req.query['path'], ctx.roots.snapshot())
  if (!result.ok) return errorResponse(result.status, result.message)
  return jsonResponse(result.listing)
}

// --- Uploads ---

export async function handleUpload(req: HttpRequest, _params: RouteParams, ctx: HttpContext): Promise<HttpResponse> {
  if (!req.stream) return errorResponse(400, 'No file part')
  const { sharedDir } = ctx.roots.snapshot()

  try {
    const saved = await receiveUpload(req.stream, req.headers['content-type'] ?? '', sharedDir)
    ctx.onUpload?.(saved.filename, saved.size)
    return jsonResponse({ success: true, filename: saved.filename, size: saved.size })
  } catch (err) {
    if (err instanceof UploadError) return errorResponse(err.status, err.message)
    throw err
  }
}
