import { domainToASCII } from "url";
import { Address } from "./address";
import { InvalidHostError } from "../models/errors";

export const MAX_HOST_LENGTH = 255;
const MAX_HOSTNAME_LENGTH = 253;

const LABEL_PATTERN = /^(?!-)[a-z0-9_-]{1,63}(?<!-)$/;
const ZONE_PATTERN = /^[0-9A-Za-z._~-]+$/;

/**
 * A DNS name in lowercase ASCII (IDNA) form without a trailing dot
 */
export class Hostname {
  constructor(readonly name: string) {}

  toString(): string {
    return this.name;
  }
}

/**
 * Classifies raw host input as an IP literal or a hostname. Pure, no
 * network access.
 */
export class HostClassifier {
  static classify(raw: string): Address | Hostname {
    const input = raw.trim();

    if (!input) {
      throw new InvalidHostError(raw, "host is empty");
    }
    if (input.length > MAX_HOST_LENGTH) {
      throw new InvalidHostError(
        input.slice(0, 64),
        `host exceeds ${MAX_HOST_LENGTH} characters`
      );
    }

    const literal = this.parseIpLiteral(input);
    if (literal) return literal;

    // Colons and brackets only occur in IPv6 literals
    if (/[:[\]%]/.test(input)) {
      throw new InvalidHostError(input, "malformed IP address");
    }

    const name = this.normalizeHostname(input);
    if (!name) {
      throw new InvalidHostError(input, "not an IP address or hostname");
    }
    return new Hostname(name);
  }

  /**
   * Parse IPv4, IPv6, bracketed IPv6 ("[::1]") and zoned IPv6
   * ("fe80::1%eth0", zone dropped)
   */
  static parseIpLiteral(input: string): Address | null {
    let candidate = input;

    if (candidate.startsWith("[")) {
      if (!candidate.endsWith("]")) return null;
      candidate = candidate.slice(1, -1);
      if (!candidate.includes(":")) return null;
    }

    const zoneIndex = candidate.indexOf("%");
    if (zoneIndex !== -1) {
      const zone = candidate.slice(zoneIndex + 1);
      candidate = candidate.slice(0, zoneIndex);
      if (!candidate.includes(":") || !ZONE_PATTERN.test(zone)) return null;
    }

    return Address.parse(candidate);
  }

  /**
   * Lowercase ASCII form of a hostname, or null when the input is not one
   */
  static normalizeHostname(input: string): string | null {
    const lowered = input.toLowerCase();
    // Checked before IDNA conversion too, which may rewrite numeric names
    if (this.hasNumericTld(lowered)) return null;

    const ascii = domainToASCII(lowered);
    if (!ascii) return null;

    const name = ascii.endsWith(".") ? ascii.slice(0, -1) : ascii;
    if (!name || name.length > MAX_HOSTNAME_LENGTH) return null;

    const labels = name.split(".");
    if (!labels.every((label) => LABEL_PATTERN.test(label))) return null;
    if (this.hasNumericTld(name)) return null;

    return name;
  }

  // "1.2.3" would otherwise reach the resolver and be read as an address
  private static hasNumericTld(name: string): boolean {
    const labels = name.replace(/\.$/, "").split(".");
    return /^\d+$/.test(labels[labels.length - 1]);
  }
}
