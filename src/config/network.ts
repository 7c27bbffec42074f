/**
 * IPv4 / CIDR helpers used to derive and check lab addresses.
 */

export type Cidr = {
  /** Network address as an unsigned 32-bit integer. */
  network: number;
  prefix: number;
};

const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

export function parseIpv4(text: string): number | null {
  const match = IPV4_PATTERN.exec(text.trim());
  if (!match) return null;

  let value = 0;
  for (let i = 1; i <= 4; i++) {
    const octet = Number(match[i]);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

export function formatIpv4(value: number): string {
  return [24, 16, 8, 0].map((shift) => (value >>> shift) & 0xff).join(".");
}

function maskFor(prefix: number): number {
  return prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
}

/** Dotted netmask for a prefix length, e.g. 24 -> 255.255.255.0. */
export function netmaskFor(prefix: number): string {
  return formatIpv4(maskFor(prefix));
}

export function parseCidr(text: string): Cidr | null {
  const [address, bits, ...rest] = text.trim().split("/");
  if (rest.length > 0 || address === undefined || bits === undefined || !/^\d{1,2}$/.test(bits)) return null;

  const prefix = Number(bits);
  if (prefix > 32) return null;

  const ip = parseIpv4(address);
  if (ip === null) return null;

  return { network: (ip & maskFor(prefix)) >>> 0, prefix };
}

export function isCidr(text: string): boolean {
  return parseCidr(text) !== null;
}

export function isIpv4(text: string): boolean {
  return parseIpv4(text) !== null;
}

export function cidrSize(cidr: Cidr): number {
  return 2 ** (32 - cidr.prefix);
}

export function broadcastAddress(cidr: Cidr): number {
  return cidr.network + cidrSize(cidr) - 1;
}

export function cidrContainsAddress(cidr: Cidr, address: number): boolean {
  return ((address & maskFor(cidr.prefix)) >>> 0) === cidr.network;
}

/** True when `inner` lies entirely inside `outer`. */
export function cidrContainsCidr(outer: Cidr, inner: Cidr): boolean {
  return inner.prefix >= outer.prefix && cidrContainsAddress(outer, inner.network);
}

/** Offset of an address from the start of its network (the "host part"). */
export function hostOffset(cidr: Cidr, address: number): number {
  return address - cidr.network;
}

/** Address `offset` hosts into the network. */
export function addressAt(cidr: Cidr, offset: number): number {
  return cidr.network + offset;
}
