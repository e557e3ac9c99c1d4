import { Ipv6Util } from "./ipv6-util";

/**
 * Utility functions for working with IP addresses
 */
export class IpUtil {
  /**
   * Convert an IPv4 address to its numeric representation
   * Example: "192.168.1.1" -> 3232235777
   */
  static ipToLong(ip: string): number {
    return (
      ip
        .split(".")
        .reduce((acc, octet) => (acc << 8) + parseInt(octet, 10), 0) >>> 0
    );
  }

  /**
   * Convert a numeric representation back to an IPv4 address string
   * Example: 3232235777 -> "192.168.1.1"
   */
  static longToIp(long: number): string {
    return [
      (long >>> 24) & 255,
      (long >>> 16) & 255,
      (long >>> 8) & 255,
      long & 255,
    ].join(".");
  }

  /**
   * Validate if the given string is a valid IPv4 address.
   * Octets with leading zeros are rejected since some resolvers read them
   * as octal.
   */
  static isValidIpv4(ip: string): boolean {
    const pattern = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
    if (!pattern.test(ip)) return false;

    return ip
      .split(".")
      .every(
        (octet) =>
          (octet.length === 1 || !octet.startsWith("0")) &&
          Number(octet) <= 255
      );
  }

  /**
   * Validate if the given string is a valid IPv6 address
   */
  static isValidIpv6(ip: string): boolean {
    return Ipv6Util.isValid(ip);
  }

  /**
   * Determine if an IP address is IPv4 or IPv6
   */
  static getIpVersion(ip: string): 4 | 6 | null {
    if (this.isValidIpv4(ip)) return 4;
    if (this.isValidIpv6(ip)) return 6;
    return null;
  }
}
