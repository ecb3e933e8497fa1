/**
 * Remote-address allow-list for the network listener.
 *
 * @module ipFilter
 */

import net from 'net';

export interface Cidr {
  address: string;
  prefix: number;
  family: 'ipv4' | 'ipv6';
}

/** `::ffff:10.0.0.1` → `10.0.0.1`; everything else unchanged. */
export function normalizeAddress(address: string): string {
  const mapped = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/i.exec(address);
  return mapped ? mapped[1] : address;
}

function familyOf(address: string): 'ipv4' | 'ipv6' | null {
  switch (net.isIP(address)) {
    case 4:
      return 'ipv4';
    case 6:
      return 'ipv6';
    default:
      return null;
  }
}

/** Parse `a.b.c.d/n` or `x:y::/n`. Throws on malformed input. */
export function parseCidr(cidr: string): Cidr {
  const slash = cidr.indexOf('/');
  if (slash === -1) {
    throw new Error(`Invalid CIDR "${cidr}": missing /prefix`);
  }

  const address = normalizeAddress(cidr.slice(0, slash));
  const prefixText = cidr.slice(slash + 1);
  const family = familyOf(address);
  if (!family) {
    throw new Error(`Invalid CIDR "${cidr}": bad address`);
  }

  const maxPrefix = family === 'ipv4' ? 32 : 128;
  const prefix = Number(prefixText);
  if (!/^\d+$/.test(prefixText) || prefix > maxPrefix) {
    throw new Error(`Invalid CIDR "${cidr}": prefix must be 0-${maxPrefix}`);
  }

  return { address, prefix, family };
}

export class IpFilter {
  private readonly blockList = new net.BlockList();
  private readonly empty: boolean;

  constructor(allowedIPs: readonly string[], allowedSubnets: readonly string[]) {
    for (const ip of allowedIPs) {
      const address = normalizeAddress(ip);
      const family = familyOf(address);
      if (!family) {
        throw new Error(`Invalid IP address "${ip}"`);
      }
      this.blockList.addAddress(address, family);
    }
    for (const subnet of allowedSubnets) {
      const { address, prefix, family } = parseCidr(subnet);
      this.blockList.addSubnet(address, prefix, family);
    }
    this.empty = allowedIPs.length === 0 && allowedSubnets.length === 0;
  }

  /** True when no rules are configured and every address is accepted. */
  get open(): boolean {
    return this.empty;
  }

  allows(remoteAddress: string | undefined): boolean {
    if (this.empty) return true;
    if (!remoteAddress) return false;

    const address = normalizeAddress(remoteAddress);
    const family = familyOf(address);
    return family !== null && this.blockList.check(address, family);
  }
}
