import { promises as dns } from "dns";
import { Address } from "./address";
import { NoSuchHostError, errorMessage } from "../models/errors";

/**
 * Source of A and AAAA answers
 */
export interface DnsBackend {
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
}

/**
 * The operating system resolver (getaddrinfo), which honours /etc/hosts
 * and the configured search domains
 */
export const systemDns: DnsBackend = {
  async resolve4(hostname) {
    const entries = await dns.lookup(hostname, { family: 4, all: true });
    return entries.map((entry) => entry.address);
  },
  async resolve6(hostname) {
    const entries = await dns.lookup(hostname, { family: 6, all: true });
    return entries.map((entry) => entry.address);
  },
};

export const DEFAULT_DNS_TIMEOUT = 3000;

/**
 * Resolves a hostname to its deduplicated addresses, A answers first.
 * A failure of one record type is tolerated as long as the other returns
 * something.
 */
export class HostResolver {
  constructor(
    private readonly backend: DnsBackend = systemDns,
    private readonly timeoutMs: number = DEFAULT_DNS_TIMEOUT
  ) {}

  async resolve(hostname: string): Promise<Address[]> {
    const outcomes = await Promise.allSettled([
      this.withTimeout(this.backend.resolve4(hostname), "A"),
      this.withTimeout(this.backend.resolve6(hostname), "AAAA"),
    ]);

    const seen = new Set<string>();
    const addresses: Address[] = [];
    const failures: string[] = [];

    for (const outcome of outcomes) {
      if (outcome.status === "rejected") {
        failures.push(errorMessage(outcome.reason));
        continue;
      }

      for (const text of outcome.value) {
        const address = Address.parse(text);
        if (!address || seen.has(address.key)) continue;
        seen.add(address.key);
        addresses.push(address);
      }
    }

    if (addresses.length === 0) {
      throw new NoSuchHostError(
        hostname,
        failures.length > 0 ? failures.join("; ") : undefined
      );
    }

    return addresses;
  }

  private withTimeout<T>(query: Promise<T>, recordType: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(
            new Error(`${recordType} query timed out after ${this.timeoutMs}ms`)
          ),
        this.timeoutMs
      );
    });

    return Promise.race([query, timeout]).finally(() => clearTimeout(timer));
  }
}
