/**
 * IPv4 CIDR parsing for port addresses.
 */

const CIDR_RE = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

export interface Ipv4Cidr {
  /** Address as written, without the prefix length */
  address: string;
  prefixLength: number;
  /** Network in `a.b.c.d/len` form */
  network: string;
}

/**
 * Parses `a.b.c.d/len`. Host bits may be set (`10.0.10.1/24` is a valid
 * interface address on network `10.0.10.0/24`).
 *
 * @returns The parsed address, or undefined when malformed
 */
export function parseIpv4Cidr(value: string): Ipv4Cidr | undefined {
  const match = CIDR_RE.exec(value);
  if (!match) return undefined;

  const octets = match.slice(1, 5).map(Number);
  if (octets.some((o) => o > 255)) return undefined;

  const prefixLength = Number(match[5]);
  if (prefixLength > 32) return undefined;

  const addr = octets.reduce((acc, o) => ((acc << 8) | o) >>> 0, 0);
  const mask = prefixLength === 0 ? 0 : (0xffffffff << (32 - prefixLength)) >>> 0;
  const network = (addr & mask) >>> 0;

  return {
    address: octets.join("."),
    prefixLength,
    network: `${toDotted(network)}/${prefixLength}`
  };
}

function toDotted(value: number): string {
  return [24, 16, 8, 0].map((shift) => (value >>> shift) & 0xff).join(".");
}
