import { Address } from "./address";
import { HostClassifier } from "./host-classifier";
import { HostResolver } from "./host-resolver";
import { GeoLookupService } from "./geo-lookup-service";
import { SnapshotSource } from "./snapshot-manager";
import { ResolutionResult } from "../models/geo-data";

export interface GeoServiceDeps {
  snapshots: SnapshotSource;
  resolver: HostResolver;
  lookupService: GeoLookupService;
}

/**
 * Classifies, resolves and looks up a host. Every address of one query is
 * looked up against the snapshot that was live when the query started.
 */
export class GeoService {
  constructor(private readonly deps: GeoServiceDeps) {}

  async query(raw: string): Promise<ResolutionResult> {
    const target = HostClassifier.classify(raw);
    const snapshot = this.deps.snapshots.current();

    if (target instanceof Address) {
      return {
        host: raw.trim(),
        kind: "address",
        records: [this.deps.lookupService.lookup(target, snapshot)],
      };
    }

    // The response echoes the host as given; only DNS sees the IDNA form
    const addresses = await this.deps.resolver.resolve(target.name);
    return {
      host: raw.trim(),
      kind: "hostname",
      records: addresses.map((address) =>
        this.deps.lookupService.lookup(address, snapshot)
      ),
    };
  }

  queryAddress(address: Address): ResolutionResult {
    const snapshot = this.deps.snapshots.current();
    return {
      host: address.toString(),
      kind: "address",
      records: [this.deps.lookupService.lookup(address, snapshot)],
    };
  }
}
