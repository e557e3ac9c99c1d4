import { Address } from "./address";
import { NetworkSpan } from "../models/geo-data";
import { StaticPrefixTable } from "./static-prefix-table";

type ReservedKind =
  | "unspecified"
  | "private"
  | "shared"
  | "loopback"
  | "link-local"
  | "documentation"
  | "benchmarking"
  | "multicast"
  | "reserved"
  | "broadcast"
  | "unique-local"
  | "discard";

// IANA special-purpose blocks that never appear in public routing tables
const reservedRanges = new StaticPrefixTable<ReservedKind>([
  { cidr: "0.0.0.0/8", record: "unspecified" },
  { cidr: "10.0.0.0/8", record: "private" },
  { cidr: "100.64.0.0/10", record: "shared" },
  { cidr: "127.0.0.0/8", record: "loopback" },
  { cidr: "169.254.0.0/16", record: "link-local" },
  { cidr: "172.16.0.0/12", record: "private" },
  { cidr: "192.0.0.0/24", record: "reserved" },
  { cidr: "192.0.2.0/24", record: "documentation" },
  { cidr: "192.168.0.0/16", record: "private" },
  { cidr: "198.18.0.0/15", record: "benchmarking" },
  { cidr: "198.51.100.0/24", record: "documentation" },
  { cidr: "203.0.113.0/24", record: "documentation" },
  { cidr: "224.0.0.0/4", record: "multicast" },
  { cidr: "240.0.0.0/4", record: "reserved" },
  { cidr: "255.255.255.255/32", record: "broadcast" },
  { cidr: "::/128", record: "unspecified" },
  { cidr: "::1/128", record: "loopback" },
  { cidr: "100::/64", record: "discard" },
  { cidr: "2001:db8::/32", record: "documentation" },
  { cidr: "fc00::/7", record: "unique-local" },
  { cidr: "fe80::/10", record: "link-local" },
  { cidr: "ff00::/8", record: "multicast" },
]);

export function isReserved(address: Address): boolean {
  return reservedRanges.lookup(address) !== null;
}

/**
 * The reserved block containing the address, if any
 */
export function reservedSpan(address: Address): NetworkSpan | null {
  return reservedRanges.lookup(address)?.span ?? null;
}
