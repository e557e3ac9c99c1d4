import { Address } from "./address";
import {
  AsnRecord,
  CountryInfo,
  GeoPlacement,
  GeoRecord,
} from "../models/geo-data";
import { CityEntry, NamedEntry, RegionEntry } from "./prefix-table";
import { DatabaseSnapshot } from "./snapshot-manager";
import {
  describeCity,
  describeSubdivision,
  pickName,
  shortRegionName,
} from "./region-names";
import { reservedSpan } from "./reserved-ranges";

export interface GeoLookupOptions {
  // Preferred name languages, most preferred first
  languages: string[];
}

/**
 * Looks up one address against one snapshot and merges the three tables.
 *
 * The region-specific table is consulted only when the global city table
 * places the address in the region table's country; a hit there replaces
 * the placement wholesale. ASN data is independent of which placement wins.
 */
export class GeoLookupService {
  constructor(private readonly options: GeoLookupOptions) {}

  lookup(address: Address, snapshot: DatabaseSnapshot): GeoRecord {
    const asnMatch = snapshot.asn.lookup(address);
    const catalogEntry = asnMatch
      ? snapshot.catalog.get(asnMatch.record.number)
      : undefined;

    let asn: AsnRecord | null = null;
    if (asnMatch) {
      const { number, organization } = asnMatch.record;
      asn = { number, name: organization, info: catalogEntry?.name ?? organization };
    }

    return {
      address,
      asn,
      span: asnMatch?.span ?? reservedSpan(address),
      placement: this.resolvePlacement(
        address,
        snapshot,
        catalogEntry?.type ?? null
      ),
    };
  }

  private resolvePlacement(
    address: Address,
    snapshot: DatabaseSnapshot,
    category: string | null
  ): GeoPlacement | null {
    const cityMatch = snapshot.city.lookup(address);
    const baseline = cityMatch
      ? this.fromCityEntry(cityMatch.record, category)
      : null;

    if (!baseline || baseline.country?.code !== snapshot.regionCountry) {
      return baseline;
    }

    const regionMatch = snapshot.region.lookup(address);
    return regionMatch
      ? this.fromRegionEntry(regionMatch.record, baseline)
      : baseline;
  }

  private fromCityEntry(entry: CityEntry, category: string | null): GeoPlacement {
    const { languages } = this.options;
    const regions: string[] = [];
    const regionsShort: string[] = [];

    const subdivision = entry.subdivisions[0];
    const province = subdivision ? describeSubdivision(subdivision, languages) : null;
    const city = entry.city ? describeCity(entry.city, languages) : null;

    for (const region of [province, city]) {
      if (region && region.name !== regions[regions.length - 1]) {
        regions.push(region.name);
        regionsShort.push(region.short);
      }
    }

    return {
      location: entry.location,
      country: this.toCountry(entry.country),
      registeredCountry: this.toCountry(entry.registeredCountry),
      regions,
      regionsShort,
      category,
    };
  }

  /**
   * The regional source has no country data of its own; country fields are
   * carried from the baseline, whose country is the covered one.
   */
  private fromRegionEntry(entry: RegionEntry, baseline: GeoPlacement): GeoPlacement {
    const regions = [entry.province, entry.city, entry.district]
      .filter((name): name is string => name !== null)
      // Municipalities repeat the province as the city
      .filter((name, index, names) => index === 0 || name !== names[index - 1]);

    return {
      location: entry.location,
      country: baseline.country,
      registeredCountry: baseline.registeredCountry,
      regions,
      regionsShort: regions.map(shortRegionName),
      category: entry.net,
    };
  }

  private toCountry(entry: NamedEntry | null): CountryInfo | null {
    if (!entry?.isoCode) return null;
    const picked = pickName(entry.names, this.options.languages);
    return { code: entry.isoCode, name: picked?.name ?? entry.isoCode };
  }
}
