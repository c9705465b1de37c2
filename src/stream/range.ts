export interface ByteRange {
  start: number
  end: number
  length: number
  partial: boolean
}

const DECIMAL = /^\d+$/

function fullRange(size: number, partial: boolean): ByteRange {
  return { start: 0, end: size - 1, length: size, partial }
}

/**
 * Works out which bytes of a `size`-byte file to send for an optional
 * `Range: bytes=<start>-<end>` header. Either bound may be left out: a missing
 * start means 0 and a missing end means the last byte. Anything that does not
 * parse, or names no bytes, falls back to the whole file.
 *
 * Any non-empty header makes the response partial (206), fallback included,
 * except on an empty file, which has no byte to point at.
 */
export function negotiateRange(size: number, header?: string): ByteRange {
  if (!header || size === 0) return fullRange(size, false)

  const value = header.trim().replace(/^bytes=/, '')
  const dash = value.indexOf('-')
  if (dash < 0) return fullRange(size, true)

  const startText = value.slice(0, dash).trim()
  const endText = value.slice(dash + 1).trim()
  if ((startText && !DECIMAL.test(startText)) || (endText && !DECIMAL.test(endText))) {
    return fullRange(size, true)
  }

  const start = startText ? parseInt(startText, 10) : 0
  const end = endText ? Math.min(parseInt(endText, 10), size - 1) : size - 1
  if (start > end) return fullRange(size, true)

  return { start, end, length: end - start + 1, partial: true }
}
