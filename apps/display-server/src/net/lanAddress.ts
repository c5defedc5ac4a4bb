import os from 'node:os';

export type InterfaceTable = ReturnType<typeof os.networkInterfaces>;

const LOOPBACK = '127.0.0.1';

export function isPrivateIpv4(address: string): boolean {
  if (address.startsWith('192.168.') || address.startsWith('10.')) return true;
  const m = /^172\.(\d{1,3})\./.exec(address);
  if (!m) return false;
  const second = Number(m[1]);
  return second >= 16 && second <= 31;
}

/** First non-internal private IPv4 address, for pairing devices on the same LAN. */
export function resolveLanAddress(interfaces: InterfaceTable = os.networkInterfaces()): string {
  for (const entries of Object.values(interfaces)) {
    for (const entry of entries ?? []) {
      if (entry.family !== 'IPv4' || entry.internal) continue;
      if (isPrivateIpv4(entry.address)) return entry.address;
    }
  }
  return LOOPBACK;
}
