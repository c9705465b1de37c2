export type TransferStatus = 'active' | 'paused' | 'done'

export interface TransferRecord {
  id: string
  name: string
  size: number                // bytes this response will carry
  bytesSent: number
  status: TransferStatus
  origin: string              // peer address
  startedAt: number
}

export const DONE_RETENTION = 20
