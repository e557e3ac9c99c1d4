import { Address } from "./address";
import { PrefixMatch, PrefixTable } from "./prefix-table";

export interface PrefixEntry<T> {
  cidr: string;
  record: T;
}

interface ParsedEntry<T> {
  network: Address;
  prefixLength: number;
  record: T;
}

/**
 * In-memory prefix table built from CIDR entries. Entries may overlap;
 * the longest matching prefix wins.
 */
export class StaticPrefixTable<T> implements PrefixTable<T> {
  private readonly entries: ParsedEntry<T>[];

  constructor(entries: PrefixEntry<T>[]) {
    this.entries = entries
      .map(({ cidr, record }) => ({ ...StaticPrefixTable.parseCidr(cidr), record }))
      // Longest prefix first so the first hit is the most specific one
      .sort((a, b) => b.prefixLength - a.prefixLength);
  }

  static parseCidr(cidr: string): { network: Address; prefixLength: number } {
    const [ip, prefixText, ...rest] = cidr.split("/");
    const address = Address.parse(ip);
    const prefixLength = Number(prefixText);
    if (
      !address ||
      rest.length > 0 ||
      !/^\d{1,3}$/.test(prefixText ?? "") ||
      prefixLength > address.bits
    ) {
      throw new Error(`Invalid CIDR: ${cidr}`);
    }
    return { network: address.network(prefixLength), prefixLength };
  }

  get size(): number {
    return this.entries.length;
  }

  lookup(address: Address): PrefixMatch<T> | null {
    for (const entry of this.entries) {
      if (
        entry.network.version === address.version &&
        address.network(entry.prefixLength).equals(entry.network)
      ) {
        return {
          record: entry.record,
          span: { address: entry.network, prefixLength: entry.prefixLength },
        };
      }
    }
    return null;
  }
}
