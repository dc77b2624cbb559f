import os from 'node:os';

function isPrivateLan(ip: string): boolean {
  if (ip.startsWith('10.') || ip.startsWith('192.168.')) return true;
  if (!ip.startsWith('172.')) return false;
  const second = Number(ip.split('.')[1]);
  return second >= 16 && second <= 31;
}

/** Best guess at the address LAN players should type in; private ranges first. */
export function getLocalIPv4(): string {
  const candidates: string[] = [];
  for (const list of Object.values(os.networkInterfaces())) {
    for (const net of list ?? []) {
      if (net.family !== 'IPv4' || net.internal) continue;
      if (net.address.startsWith('169.254.')) continue; // link-local
      candidates.push(net.address);
    }
  }

  return candidates.find(isPrivateLan) ?? candidates[0] ?? '127.0.0.1';
}
