import type os from 'node:os';
import { describe, expect, it } from 'vitest';
import { isPrivateIpv4, resolveLanAddress } from './lanAddress.js';

function v4(address: string, internal = false): os.NetworkInterfaceInfo {
  return { address, netmask: '255.255.255.0', family: 'IPv4', mac: '00:00:00:00:00:00', internal, cidr: `${address}/24` };
}

function v6(address: string): os.NetworkInterfaceInfo {
  return {
    address,
    netmask: 'ffff:ffff:ffff:ffff::',
    family: 'IPv6',
    mac: '00:00:00:00:00:00',
    internal: false,
    cidr: `${address}/64`,
    scopeid: 0,
  };
}

describe('isPrivateIpv4', () => {
  it('matches the private ranges only', () => {
    expect(isPrivateIpv4('192.168.0.10')).toBe(true);
    expect(isPrivateIpv4('10.1.2.3')).toBe(true);
    expect(isPrivateIpv4('172.16.0.1')).toBe(true);
    expect(isPrivateIpv4('172.31.255.1')).toBe(true);
    expect(isPrivateIpv4('172.32.0.1')).toBe(false);
    expect(isPrivateIpv4('172.15.0.1')).toBe(false);
    expect(isPrivateIpv4('8.8.8.8')).toBe(false);
  });
});

describe('resolveLanAddress', () => {
  it('returns the first external private IPv4 address', () => {
    expect(
      resolveLanAddress({
        lo: [v4('127.0.0.1', true)],
        eth0: [v6('fe80::1'), v4('192.168.1.20')],
        wlan0: [v4('10.0.0.7')],
      }),
    ).toBe('192.168.1.20');
  });

  it('skips public and internal addresses', () => {
    expect(resolveLanAddress({ eth0: [v4('203.0.113.5')], docker0: [v4('172.17.0.1', true)] })).toBe('127.0.0.1');
  });

  it('falls back to loopback with no interfaces', () => {
    expect(resolveLanAddress({})).toBe('127.0.0.1');
    expect(resolveLanAddress({ eth0: undefined })).toBe('127.0.0.1');
  });
});
