import fs from 'node:fs/promises'
import path from 'node:path'
import type { RootSnapshot } from './roots.js'

export type FileLookup =
  | { ok: true; filePath: string; name: string; size: number }
  | { ok: false; status: 403 | 404 }

const DRIVE_LETTER = /^[a-zA-Z]:/

/**
 * Turns the request's path token (or its `?path=` override) into a normalized
 * filesystem path. Tokens with a drive letter or an absolute path are taken
 * as-is, anything else is relative to the shared directory.
 */
export function resolveRequestPath(token: string, queryPath: string | undefined, roots: RootSnapshot): string {
  if (queryPath) return path.normalize(queryPath)

  const stripped = token.replace(/^\/+/, '')
  if (DRIVE_LETTER.test(stripped) || path.isAbsolute(stripped)) {
    return path.normalize(stripped)
  }
  return path.normalize(path.join(roots.sharedDir, stripped))
}

// Textual prefix containment. Symlinks are not resolved, so a link inside a
// root that points elsewhere is still served.
export function isPermitted(filePath: string, roots: RootSnapshot): boolean {
  return filePath.startsWith(roots.sharedDir) || filePath.startsWith(roots.homeDir)
}

export async function lookupFile(token: string, queryPath: string | undefined, roots: RootSnapshot): Promise<FileLookup> {
  const filePath = resolveRequestPath(token, queryPath, roots)
  if (!isPermitted(filePath, roots)) return { ok: false, status: 403 }

  let stats
  try {
    stats = await fs.stat(filePath)
  } catch {
    return { ok: false, status: 404 }
  }
  if (!stats.isFile()) return { ok: false, status: 404 }

  return { ok: true, filePath, name: path.basename(filePath), size: stats.size }
}
