import mime from 'mime-types'

const APK_TYPE = 'application/vnd.android.package-archive'
const FALLBACK_TYPE = 'application/octet-stream'

export function guessContentType(filePath: string): string {
  if (filePath.toLowerCase().endsWith('.apk')) return APK_TYPE
  return mime.lookup(filePath) || FALLBACK_TYPE
}

// Header-safe file name for Content-Disposition: anything outside printable
// ASCII, and the quote itself, becomes '?'.
export function attachmentName(name: string): string {
  return name.replace(/[^\x20-\x7e]|"/gu, '?')
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`
}
