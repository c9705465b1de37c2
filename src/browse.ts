import fs from 'node:fs/promises'
import path from 'node:path'
import { isPermitted } from './access.js'
import type { RootSnapshot } from './roots.js'
import { errorMessage } from './utils.js'

export interface FileEntry {
  name: string
  path: string
  size: number
  modified: number
  extension: string
}

export interface DirectoryEntry {
  name: string
  path: string
}

export interface DirectoryListing {
  currentDir: string
  parentDir: string | null
  home: string
  directories: DirectoryEntry[]
  files: FileEntry[]
  commonDirs: DirectoryEntry[]
}

export type BrowseResult =
  | { ok: true; listing: DirectoryListing }
  | { ok: false; status: 403 | 404 | 500; message: string }

const COMMON_DIRS = ['Desktop', 'Downloads', 'Documents', 'Pictures', 'Music', 'Videos']

const byName = (a: { name: string }, b: { name: string }): number =>
  a.name.toLowerCase().localeCompare(b.name.toLowerCase())

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory()
  } catch {
    return false
  }
}

/**
 * Lists a directory under one of the permitted roots. Defaults to the shared
 * directory. Entries that cannot be read are left out.
 */
export async function listDirectory(requested: string | undefined, roots: RootSnapshot): Promise<BrowseResult> {
  const dir = path.normalize(requested || roots.sharedDir)
  if (!isPermitted(dir, roots)) return { ok: false, status: 403, message: 'Access denied' }
  if (!await isDirectory(dir)) return { ok: false, status: 404, message: 'Directory not found' }

  let names: string[]
  try {
    names = await fs.readdir(dir)
  } catch (err) {
    return { ok: false, status: 500, message: errorMessage(err) }
  }

  const directories: DirectoryEntry[] = []
  const files: FileEntry[] = []

  for (const name of names) {
    const itemPath = path.join(dir, name)
    try {
      const stats = await fs.stat(itemPath)
      if (stats.isFile()) {
        files.push({
          name,
          path: itemPath,
          size: stats.size,
          modified: stats.mtimeMs,
          extension: path.extname(name).toLowerCase()
        })
      } else if (stats.isDirectory()) {
        directories.push({ name, path: itemPath })
      }
    } catch {
      continue
    }
  }

  directories.sort(byName)
  files.sort(byName)

  const commonDirs: DirectoryEntry[] = []
  for (const name of COMMON_DIRS) {
    const candidate = path.join(roots.homeDir, name)
    if (await isDirectory(candidate)) commonDirs.push({ name, path: candidate })
  }

  const parent = path.dirname(dir)
  return {
    ok: true,
    listing: {
      currentDir: dir,
      parentDir: parent !== dir ? parent : null,
      home: roots.homeDir,
      directories,
      files,
      commonDirs
    }
  }
}
