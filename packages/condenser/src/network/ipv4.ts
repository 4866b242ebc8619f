/**
 * IPv4 address, prefix and prefix-range helpers.
 *
 * Addresses are handled as unsigned 32-bit integers. A prefix range
 * `10.0.0.0/8:16-24` matches any prefix inside 10.0.0.0/8 whose length is
 * between 16 and 24; without the `:min-max` suffix only the exact length
 * matches.
 *
 * @module network/ipv4
 */

export interface Prefix {
  network: number;
  length: number;
}

export interface PrefixRange {
  prefix: Prefix;
  min: number;
  max: number;
}

const ADDRESS_RE = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
const COMMUNITY_RE = /^(\d{1,5}):(\d{1,5})$/;

export function parseAddress(text: string): number | null {
  const m = ADDRESS_RE.exec(text);
  if (!m) return null;
  let value = 0;
  for (let i = 1; i <= 4; i++) {
    const octet = Number(m[i]);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

export function formatAddress(value: number): string {
  return [24, 16, 8, 0].map((shift) => Math.floor(value / 2 ** shift) % 256).join('.');
}

function mask(length: number): number {
  return length === 0 ? 0 : (0xffffffff - (2 ** (32 - length) - 1));
}

function applyMask(address: number, length: number): number {
  // Bitwise operators work on signed 32-bit values; `>>> 0` brings them back.
  return (address & mask(length)) >>> 0;
}

/**
 * Parse `a.b.c.d/len`. A bare address parses as a /32. Host bits must be
 * zero unless `strict` is false, in which case they are masked away.
 */
export function parsePrefix(text: string, strict = true): Prefix | null {
  const slash = text.indexOf('/');
  const addressText = slash === -1 ? text : text.slice(0, slash);
  const lengthText = slash === -1 ? '32' : text.slice(slash + 1);
  if (!/^\d{1,2}$/.test(lengthText)) return null;
  const length = Number(lengthText);
  const address = parseAddress(addressText);
  if (address === null || length > 32) return null;
  const network = applyMask(address, length);
  if (strict && network !== address) return null;
  return { network, length };
}

export function formatPrefix(prefix: Prefix): string {
  return `${formatAddress(prefix.network)}/${prefix.length}`;
}

export function parsePrefixRange(text: string): PrefixRange | null {
  const colon = text.indexOf(':');
  const head = colon === -1 ? text : text.slice(0, colon);
  const prefix = head.includes('/') ? parsePrefix(head) : null;
  if (!prefix) return null;
  if (colon === -1) {
    return { prefix, min: prefix.length, max: prefix.length };
  }
  const m = /^(\d{1,2})-(\d{1,2})$/.exec(text.slice(colon + 1));
  if (!m) return null;
  const min = Number(m[1]);
  const max = Number(m[2]);
  if (min < prefix.length || min > max || max > 32) return null;
  return { prefix, min, max };
}

/** Whether `inner` lies inside `outer` (equal prefixes included). */
export function prefixContains(outer: Prefix, inner: Prefix): boolean {
  return inner.length >= outer.length && applyMask(inner.network, outer.length) === outer.network;
}

export function rangeMatches(range: PrefixRange, prefix: Prefix): boolean {
  return prefix.length >= range.min && prefix.length <= range.max && prefixContains(range.prefix, prefix);
}

/** The network an interface address belongs to, e.g. 10.0.1.7 mask 24 -> 10.0.1.0/24. */
export function networkOf(address: string, maskLength: number): Prefix | null {
  if (!Number.isInteger(maskLength) || maskLength < 0 || maskLength > 32) return null;
  const value = parseAddress(address);
  if (value === null) return null;
  return { network: applyMask(value, maskLength), length: maskLength };
}

export function isCommunity(text: string): boolean {
  const m = COMMUNITY_RE.exec(text);
  return m !== null && Number(m[1]) <= 65535 && Number(m[2]) <= 65535;
}
