/**
 * @module utils/network
 * @fileoverview Outbound-address guard for the fetch layer.
 *
 * A crawler that follows links found on arbitrary pages will, sooner or
 * later, be handed `http://169.254.169.254/` or `http://localhost:6379/`.
 * {@link validateHostname} resolves a hostname through the system resolver
 * and refuses it when any resulting address falls in a reserved range.
 *
 * Ranges live in a `net.BlockList`; IPv4-mapped IPv6 addresses
 * (`::ffff:10.0.0.1`) are checked against the IPv4 rules.
 */

import dns from "node:dns/promises";
import net from "node:net";
import { SecurityError } from "./errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Reserved Ranges
 * ──────────────────────────────────────────────────────────────────────────── */

const IPV4_RESERVED: ReadonlyArray<readonly [string, number]> = [
  ["0.0.0.0", 8], // "this network"
  ["10.0.0.0", 8],
  ["100.64.0.0", 10], // carrier-grade NAT
  ["127.0.0.0", 8],
  ["169.254.0.0", 16], // link-local, cloud metadata
  ["172.16.0.0", 12],
  ["192.0.0.0", 24],
  ["192.168.0.0", 16],
  ["198.18.0.0", 15], // benchmarking
];

const IPV6_RESERVED: ReadonlyArray<readonly [string, number]> = [
  ["::", 128],
  ["::1", 128],
  ["fc00::", 7], // unique local
  ["fe80::", 10], // link-local
];

const reserved = new net.BlockList();
for (const [network, prefix] of IPV4_RESERVED) {
  reserved.addSubnet(network, prefix, "ipv4");
}
for (const [network, prefix] of IPV6_RESERVED) {
  reserved.addSubnet(network, prefix, "ipv6");
}

const MAPPED_IPV4_PREFIX = "::ffff:";

/* ────────────────────────────────────────────────────────────────────────────
 * Public API
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Whether an IP literal lies in a loopback, private, link-local or otherwise
 * reserved range. Strings that are not IP literals return `false`.
 *
 * @example
 * ```ts
 * isPrivateIP("10.0.0.1");            // true
 * isPrivateIP("::ffff:127.0.0.1");    // true
 * isPrivateIP("93.184.216.34");       // false
 * ```
 */
export function isPrivateIP(ip: string): boolean {
  const address = ip.split("%")[0].toLowerCase();

  if (address.startsWith(MAPPED_IPV4_PREFIX)) {
    const embedded = address.slice(MAPPED_IPV4_PREFIX.length);
    if (net.isIPv4(embedded)) {
      return reserved.check(embedded, "ipv4");
    }
  }

  switch (net.isIP(address)) {
    case 4:
      return reserved.check(address, "ipv4");
    case 6:
      return reserved.check(address, "ipv6");
    default:
      return false;
  }
}

/**
 * Resolve `hostname` and throw if it has no address or if any address is
 * reserved. IP literals (including bracketed IPv6 hosts from `URL.hostname`)
 * are checked without a lookup.
 *
 * @throws {SecurityError} When the host is unresolvable or reserved.
 */
export async function validateHostname(hostname: string): Promise<void> {
  const bare = hostname.replace(/^\[(.*)\]$/, "$1");

  let addresses: string[];
  if (net.isIP(bare) !== 0) {
    addresses = [bare];
  } else {
    try {
      const resolved = await dns.lookup(bare, { all: true, verbatim: true });
      addresses = resolved.map((entry) => entry.address);
    } catch (error) {
      throw new SecurityError(
        `DNS resolution failed for '${hostname}': ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }

  if (addresses.length === 0) {
    throw new SecurityError(`No addresses found for '${hostname}'`);
  }

  const blocked = addresses.find(isPrivateIP);
  if (blocked !== undefined) {
    throw new SecurityError(
      `Hostname '${hostname}' resolves to reserved address ${blocked}; request blocked`,
    );
  }
}
