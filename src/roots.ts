import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'

export interface RootSnapshot {
  sharedDir: string
  homeDir: string
}

/**
 * Holds the directories the servers may read from. The shared directory can
 * be reassigned while the servers run; a request reads one snapshot when it
 * starts and keeps it until it finishes.
 */
export class SharedRoots {
  private current: RootSnapshot

  constructor(sharedDir: string, homeDir: string = os.homedir()) {
    this.current = Object.freeze({
      sharedDir: path.normalize(path.resolve(sharedDir)),
      homeDir: path.normalize(homeDir)
    })
  }

  snapshot(): RootSnapshot {
    return this.current
  }

  get sharedDir(): string {
    return this.current.sharedDir
  }

  /**
   * Points the shared root at another existing directory. Returns an error
   * message instead of throwing when the directory is unusable.
   */
  setSharedDir(dir: string): string | null {
    if (!dir) return 'Directory is required'
    const resolved = path.resolve(dir)
    try {
      if (!fs.statSync(resolved).isDirectory()) return 'Not a directory'
    } catch {
      return 'Directory does not exist'
    }
    this.current = Object.freeze({ sharedDir: path.normalize(resolved), homeDir: this.current.homeDir })
    return null
  }
}
