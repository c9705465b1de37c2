import fs from 'node:fs'
import fsp from 'node:fs/promises'
import path from 'node:path'
import { pipeline } from 'node:stream/promises'
import type { Readable } from 'node:stream'
import busboy from 'busboy'
import { errorMessage } from '../utils.js'

/** Multipart field that carries the uploaded file. */
export const UPLOAD_FIELD = 'file'

export interface UploadResult {
  filename: string
  size: number
}

/** An upload that was refused or could not be stored; `status` is the HTTP status to answer with. */
export class UploadError extends Error {
  readonly status: number

  constructor(status: number, message: string) {
    super(message)
    this.name = 'UploadError'
    this.status = status
  }
}

type SaveOutcome =
  | { ok: true; result: UploadResult }
  | { ok: false; error: unknown }

/**
 * Reduces a client-supplied filename to its last path component. Returns
 * null when nothing usable is left.
 */
export function uploadFileName(raw: string | undefined): string | null {
  if (!raw) return null
  const name = path.basename(raw.replaceAll('\\', '/'))
  if (!name || name === '.' || name === '..') return null
  return name
}

/**
 * Streams the `file` part of a multipart/form-data body into `dir`,
 * replacing any file of the same name. Other parts are read and discarded.
 */
export async function receiveUpload(body: Readable, contentType: string, dir: string): Promise<UploadResult> {
  if (!/^multipart\/form-data\b/i.test(contentType)) {
    throw new UploadError(400, 'Expected multipart/form-data')
  }

  let parser: busboy.Busboy
  try {
    parser = busboy({ headers: { 'content-type': contentType }, defParamCharset: 'utf8' })
  } catch (err) {
    throw new UploadError(400, `Malformed upload: ${errorMessage(err)}`)
  }

  const form: { saving: Promise<SaveOutcome> | null; unnamed: boolean } = { saving: null, unnamed: false }

  parser.on('file', (field, file, info) => {
    if (field !== UPLOAD_FIELD || form.saving || form.unnamed) {
      file.resume()
      return
    }
    const name = uploadFileName(info.filename)
    if (!name) {
      form.unnamed = true
      file.resume()
      return
    }
    form.saving = saveFile(file, path.join(dir, name))
  })

  let parseError: unknown = null
  try {
    await pipeline(body, parser)
  } catch (err) {
    parseError = err
  }

  const outcome = form.saving ? await form.saving : null
  if (parseError !== null) throw new UploadError(400, `Malformed upload: ${errorMessage(parseError)}`)
  if (outcome === null) throw new UploadError(400, form.unnamed ? 'No selected file' : 'No file part')
  if (!outcome.ok) throw new UploadError(500, errorMessage(outcome.error))
  return outcome.result
}

// Never rejects. A failed write keeps draining the part so the form parser
// can reach the end of the body, and removes whatever was written.
function saveFile(file: Readable, target: string): Promise<SaveOutcome> {
  return new Promise((resolve) => {
    let settled = false
    const out = fs.createWriteStream(target)

    const fail = (error: unknown): void => {
      if (settled) return
      settled = true
      file.unpipe(out)
      file.resume()
      out.destroy()
      const done = (): void => resolve({ ok: false, error })
      fsp.rm(target, { force: true }).then(done, done)
    }

    out.on('error', fail)
    file.on('error', fail)
    file.on('close', () => {
      if (!file.readableEnded) fail(new Error('Upload interrupted'))
    })

    out.on('finish', () => {
      if (settled) return
      settled = true
      fsp.stat(target).then(
        (stats) => resolve({ ok: true, result: { filename: path.basename(target), size: stats.size } }),
        (error: unknown) => resolve({ ok: false, error })
      )
    })

    file.pipe(out)
  })
}
