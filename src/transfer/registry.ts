import { EventEmitter } from 'node:events'
import { generateId } from '../utils.js'
import { DONE_RETENTION, type TransferRecord, type TransferStatus } from './types.js'

const ID_BYTES = 6

/**
 * In-memory table of file sends, newest last in insertion order.
 *
 * The streamer owns `bytesSent` and the move to `done`; pause, resume and
 * cancel arrive from the control API at any time. Every method runs to
 * completion without awaiting, so each is a critical section on the event
 * loop and readers never see a half-applied change.
 *
 * Emits 'transfer-started', 'transfer-paused', 'transfer-resumed',
 * 'transfer-cancelled' and 'transfer-complete' with a snapshot of the record.
 */
export class TransferRegistry extends EventEmitter {
  private transfers: Map<string, TransferRecord> = new Map()
  private retention: number

  constructor(retention = DONE_RETENTION) {
    super()
    this.retention = retention
  }

  start(name: string, size: number, origin: string): string {
    let id = generateId(ID_BYTES)
    while (this.transfers.has(id)) id = generateId(ID_BYTES)

    const record: TransferRecord = {
      id,
      name,
      size,
      bytesSent: 0,
      status: 'active',
      origin,
      startedAt: Date.now()
    }
    this.transfers.set(id, record)
    this.emit('transfer-started', { ...record })
    return id
  }

  update(id: string, bytesSent: number): void {
    const record = this.transfers.get(id)
    if (!record) return
    record.bytesSent = Math.min(Math.max(bytesSent, 0), record.size)
  }

  status(id: string): TransferStatus | undefined {
    return this.transfers.get(id)?.status
  }

  isPaused(id: string): boolean {
    return this.status(id) === 'paused'
  }

  pause(id: string): boolean {
    return this.transition(id, 'active', 'paused', 'transfer-paused')
  }

  resume(id: string): boolean {
    return this.transition(id, 'paused', 'active', 'transfer-resumed')
  }

  /** Forces the transfer to `done`; the streamer stops at its next chunk. */
  cancel(id: string): boolean {
    const record = this.transfers.get(id)
    if (!record) return false
    if (record.status !== 'done') {
      record.status = 'done'
      this.emit('transfer-cancelled', { ...record })
      this.prune()
    }
    return true
  }

  complete(id: string): void {
    const record = this.transfers.get(id)
    if (!record) return
    const wasDone = record.status === 'done'
    record.status = 'done'
    record.bytesSent = record.size
    if (!wasDone) this.emit('transfer-complete', { ...record })
    this.prune()
  }

  get(id: string): TransferRecord | undefined {
    const record = this.transfers.get(id)
    return record ? { ...record } : undefined
  }

  /** Snapshots, most recently started first. */
  list(): TransferRecord[] {
    return Array.from(this.transfers.values()).reverse().map(r => ({ ...r }))
  }

  size(): number {
    return this.transfers.size
  }

  private transition(id: string, from: TransferStatus, to: TransferStatus, event: string): boolean {
    const record = this.transfers.get(id)
    if (!record || record.status !== from) return false
    record.status = to
    this.emit(event, { ...record })
    return true
  }

  // Keeps the `retention` most recently started finished records.
  private prune(): void {
    let kept = 0
    for (const record of Array.from(this.transfers.values()).reverse()) {
      if (record.status !== 'done') continue
      kept++
      if (kept > this.retention) this.transfers.delete(record.id)
    }
  }
}
