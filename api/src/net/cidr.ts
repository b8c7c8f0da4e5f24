// SPDX-License-Identifier: Apache-2.0
// api/src/net/cidr.ts
import { isIP } from "node:net";
import ipaddr from "ipaddr.js";
import type { IPv4, IPv6 } from "ipaddr.js";

type Address = IPv4 | IPv6;
export type CidrRange = { source: string; network: Address; bits: number };

/** What to do when every configured entry turned out to be malformed. */
export type InvalidAllowListPolicy = "allow" | "deny";

export type ParsedAllowList = {
  ranges: CidrRange[];
  invalid: string[];
  /** true when at least one entry was configured, valid or not */
  configured: boolean;
  policy: InvalidAllowListPolicy;
};

export type ParseAllowListOptions = {
  policy?: InvalidAllowListPolicy;
  onInvalid?: (entry: string, reason: string) => void;
};

/** "1.2.3.4, 10.0.0.0/8 ,," -> ["1.2.3.4", "10.0.0.0/8"] */
export function splitAllowListEnv(csv: string | undefined): string[] {
  return (csv || "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Both checks must pass: isIP rejects shorthand IPv4 ("10.1", "0x7f.1") that
 * ipaddr.js takes, ipaddr.js rejects zone ids ("fe80::1%eth-0") that isIP takes.
 */
function isAddressLiteral(s: string) {
  return isIP(s) !== 0 && ipaddr.isValid(s);
}

/** Dotted quad or colon hex only. IPv4-mapped IPv6 comes back as IPv4. */
export function parseAddress(input: string): Address | null {
  const s = input.trim();
  if (!isAddressLiteral(s)) return null;
  return ipaddr.process(s);
}

export function parseCidr(entry: string): CidrRange | string {
  const source = entry.trim();
  const slash = source.indexOf("/");
  const addrPart = slash === -1 ? source : source.slice(0, slash);
  const bitsPart = slash === -1 ? "" : source.slice(slash + 1);

  if (!isAddressLiteral(addrPart)) return "not an IP address";
  const network = ipaddr.parse(addrPart);
  const max = network.kind() === "ipv4" ? 32 : 128;
  if (slash === -1) return { source, network, bits: max };

  if (!/^\d{1,3}$/.test(bitsPart)) return "prefix length is not a number";
  const bits = Number(bitsPart);
  if (bits > max) return `prefix length exceeds ${max}`;
  return { source, network, bits };
}

export function parseAllowList(entries: readonly string[], opts: ParseAllowListOptions = {}): ParsedAllowList {
  const ranges: CidrRange[] = [];
  const invalid: string[] = [];
  for (const raw of entries) {
    const entry = raw.trim();
    if (!entry) continue;
    const parsed = parseCidr(entry);
    if (typeof parsed === "string") {
      invalid.push(entry);
      opts.onInvalid?.(entry, parsed);
      continue;
    }
    ranges.push(parsed);
  }
  return {
    ranges,
    invalid,
    configured: ranges.length + invalid.length > 0,
    policy: opts.policy ?? "allow",
  };
}

export function rangeContains(range: CidrRange, addr: Address): boolean {
  const { network, bits } = range;
  if (network instanceof ipaddr.IPv4 && addr instanceof ipaddr.IPv4) return addr.match(network, bits);
  if (network instanceof ipaddr.IPv6 && addr instanceof ipaddr.IPv6) return addr.match(network, bits);
  return false;
}

export function matchesAllowList(candidateIp: string, list: ParsedAllowList): boolean {
  if (!list.configured) return true;
  if (list.ranges.length === 0) return list.policy === "allow";

  const addr = parseAddress(candidateIp);
  if (!addr) return false;
  return list.ranges.some((r) => rangeContains(r, addr));
}

/** One-shot form of parseAllowList + matchesAllowList. */
export function isAllowed(candidateIp: string, ranges: readonly string[], opts: ParseAllowListOptions = {}): boolean {
  return matchesAllowList(candidateIp, parseAllowList(ranges, opts));
}
