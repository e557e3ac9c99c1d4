import { IpUtil } from "./ip-util";

const MAX_IPV6 = (BigInt(1) << BigInt(128)) - BigInt(1);

/**
 * Dedicated utility class for IPv6 address processing
 * Handles compression, embedded IPv4 tails and the bigint form used for
 * prefix arithmetic
 */
export class Ipv6Util {
  /**
   * Validate if a string is a valid IPv6 address (no zone, no brackets).
   * Accepts every form normalize() accepts, embedded IPv4 tails included.
   */
  public static isValid(ip: string): boolean {
    if (!ip.includes(":") || ip !== ip.trim()) return false;
    try {
      this.normalize(ip);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Expand an IPv6 address to eight lowercase groups without leading zeros
   * Example: "2001:DB8::0001" -> "2001:db8:0:0:0:0:0:1"
   */
  public static normalize(ip: string): string {
    if (!ip) {
      throw new Error("IPv6 address cannot be empty");
    }

    let address = ip.trim().toLowerCase();

    // Fold an embedded IPv4 tail (::ffff:192.0.2.1) into two hex groups
    const lastColon = address.lastIndexOf(":");
    const tail = address.substring(lastColon + 1);
    if (tail.includes(".")) {
      if (!IpUtil.isValidIpv4(tail)) {
        throw new Error(`Invalid IPv6 address: ${ip} (bad IPv4 tail)`);
      }
      const long = IpUtil.ipToLong(tail);
      address =
        address.substring(0, lastColon + 1) +
        `${(long >>> 16).toString(16)}:${(long & 0xffff).toString(16)}`;
    }

    const halves = address.split("::");
    if (halves.length > 2) {
      throw new Error(
        `Invalid IPv6 address: ${ip} (multiple :: compression markers)`
      );
    }

    let segments: string[];
    if (halves.length === 2) {
      const left = halves[0] ? halves[0].split(":") : [];
      const right = halves[1] ? halves[1].split(":") : [];
      const missing = 8 - (left.length + right.length);
      if (missing < 1) {
        throw new Error(`Invalid IPv6 address: ${ip} (too many segments)`);
      }
      segments = [...left, ...Array<string>(missing).fill("0"), ...right];
    } else {
      segments = address.split(":");
      if (segments.length !== 8) {
        throw new Error(
          `Invalid IPv6 address: ${ip} (expected 8 segments, got ${segments.length})`
        );
      }
    }

    for (const segment of segments) {
      if (!/^[0-9a-f]{1,4}$/.test(segment)) {
        throw new Error(`Invalid IPv6 group: ${segment} in address ${ip}`);
      }
    }

    return segments
      .map((segment) => segment.replace(/^0+(?=[0-9a-f])/, ""))
      .join(":");
  }

  /**
   * Convert an IPv6 address to BigInt for calculations
   */
  public static toBigInt(ip: string): bigint {
    return this.normalize(ip)
      .split(":")
      .reduce(
        (acc, segment) => (acc << BigInt(16)) | BigInt(parseInt(segment, 16)),
        BigInt(0)
      );
  }

  /**
   * Convert a BigInt back to an expanded IPv6 address string
   */
  public static fromBigInt(bigint: bigint): string {
    if (bigint < BigInt(0) || bigint > MAX_IPV6) {
      throw new Error(`BigInt value out of range for IPv6: ${bigint}`);
    }

    const groups: string[] = [];
    for (let shift = 112; shift >= 0; shift -= 16) {
      groups.push(((bigint >> BigInt(shift)) & BigInt(0xffff)).toString(16));
    }

    return groups.join(":");
  }

  /**
   * Canonical text form (RFC 5952): the longest run of two or more zero
   * groups collapses to "::", the leftmost run on a tie
   * Example: 2001:db8:0:0:0:0:0:1 -> "2001:db8::1"
   */
  public static compress(bigint: bigint): string {
    const groups = this.fromBigInt(bigint).split(":");

    let bestStart = -1;
    let bestLength = 0;
    for (let i = 0; i < groups.length; ) {
      if (groups[i] !== "0") {
        i++;
        continue;
      }
      let end = i;
      while (end < groups.length && groups[end] === "0") end++;
      if (end - i > bestLength) {
        bestStart = i;
        bestLength = end - i;
      }
      i = end;
    }

    if (bestLength < 2) {
      return groups.join(":");
    }

    const head = groups.slice(0, bestStart).join(":");
    const tail = groups.slice(bestStart + bestLength).join(":");
    return `${head}::${tail}`;
  }

  /**
   * IPv4-mapped addresses live in ::ffff:0:0/96
   */
  public static isIpv4Mapped(bigint: bigint): boolean {
    return bigint >> BigInt(32) === BigInt(0xffff);
  }
}
