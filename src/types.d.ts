declare module 'hypercore-crypto' {
  export function randomBytes(n: number): Buffer
}

declare module 'b4a' {
  export function toString(buf: Buffer, encoding?: string): string
  export function alloc(size: number): Buffer
  export function concat(buffers: Buffer[], totalLength?: number): Buffer
  export function indexOf(buf: Buffer, value: string | Buffer, byteOffset?: number): number
}
