import { IpUtil } from "./ip-util";
import { Ipv6Util } from "./ipv6-util";

export type IpVersion = 4 | 6;

/**
 * A parsed IPv4 or IPv6 address. Equality is over the binary value, so
 * "2001:DB8::1" and "2001:db8:0:0:0:0:0:1" are the same address.
 */
export class Address {
  private constructor(
    readonly version: IpVersion,
    readonly value: bigint
  ) {}

  static fromIpv4(long: number): Address {
    return new Address(4, BigInt(long >>> 0));
  }

  /**
   * IPv4-mapped values (::ffff:a.b.c.d) are unwrapped to IPv4
   */
  static fromIpv6(value: bigint): Address {
    if (Ipv6Util.isIpv4Mapped(value)) {
      return new Address(4, value & BigInt(0xffffffff));
    }
    return new Address(6, value);
  }

  /**
   * Parse a bare IP literal. Brackets and zone ids are the classifier's
   * concern and are rejected here.
   */
  static parse(text: string): Address | null {
    switch (IpUtil.getIpVersion(text)) {
      case 4:
        return Address.fromIpv4(IpUtil.ipToLong(text));
      case 6:
        return Address.fromIpv6(Ipv6Util.toBigInt(text));
      default:
        return null;
    }
  }

  get bits(): 32 | 128 {
    return this.version === 4 ? 32 : 128;
  }

  /**
   * Stable identity used for deduplication
   */
  get key(): string {
    return `v${this.version}:${this.value.toString(16)}`;
  }

  equals(other: Address): boolean {
    return this.version === other.version && this.value === other.value;
  }

  /**
   * First address of the network of the given prefix length
   */
  network(prefixLength: number): Address {
    const length = Math.min(Math.max(prefixLength, 0), this.bits);
    const hostBits = BigInt(this.bits - length);
    return new Address(this.version, (this.value >> hostBits) << hostBits);
  }

  toCidr(prefixLength: number): string {
    return `${this.network(prefixLength).toString()}/${prefixLength}`;
  }

  toString(): string {
    return this.version === 4
      ? IpUtil.longToIp(Number(this.value))
      : Ipv6Util.compress(this.value);
  }
}
