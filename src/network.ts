import os from 'node:os'

// First IPv4 address another device on the LAN could reach.
export function getLocalIp(): string {
  for (const addrs of Object.values(os.networkInterfaces())) {
    for (const addr of addrs ?? []) {
      if (addr.family !== 'IPv4' || addr.internal) continue
      if (addr.address.startsWith('169.254.')) continue
      return addr.address
    }
  }
  return '127.0.0.1'
}
