import maxmind, { AsnResponse, CityResponse, Reader } from "maxmind";
import { Address } from "./address";
import { NetworkSpan, Coordinates } from "../models/geo-data";
import { DatabaseLoadError, TableName } from "../models/errors";

/**
 * A record together with the prefix that owns it
 */
export interface PrefixMatch<T> {
  record: T;
  span: NetworkSpan;
}

/**
 * Longest-prefix match capability shared by every lookup table
 */
export interface PrefixTable<T> {
  lookup(address: Address): PrefixMatch<T> | null;
}

export interface AsnEntry {
  number: number;
  organization: string;
}

export interface NamedEntry {
  isoCode: string | null;
  // Language code -> localized name
  names: Record<string, string>;
}

export interface CityEntry {
  location: Coordinates | null;
  country: NamedEntry | null;
  registeredCountry: NamedEntry | null;
  // Most general first
  subdivisions: NamedEntry[];
  city: NamedEntry | null;
}

/**
 * Region-specific record: administrative divisions of one country plus the
 * network category
 */
export interface RegionEntry {
  province: string | null;
  city: string | null;
  district: string | null;
  net: string | null;
  location: Coordinates | null;
}

type MmdbRecord = AsnResponse | CityResponse;

/**
 * The part of a maxmind Reader the tables search through
 */
export interface MmdbReader {
  metadata: { ipVersion: number };
  getWithPrefixLength(ipAddress: string): [unknown, number];
}

/**
 * Open an mmdb file, failing with a DatabaseLoadError naming the table
 */
export async function openMmdb(
  table: TableName,
  filePath: string
): Promise<Reader<MmdbRecord>> {
  try {
    return await maxmind.open<MmdbRecord>(filePath);
  } catch (error) {
    throw new DatabaseLoadError(table, filePath, error);
  }
}

/**
 * Base for tables backed by a MaxMind DB reader. Records are decoded from
 * their raw shape so that each variant only accepts the fields it knows.
 */
export abstract class MmdbTable<T> implements PrefixTable<T> {
  constructor(protected readonly reader: MmdbReader) {}

  lookup(address: Address): PrefixMatch<T> | null {
    // IPv4-only databases have no IPv6 tree to search
    if (address.version === 6 && this.reader.metadata.ipVersion === 4) {
      return null;
    }

    const [raw, prefixLength] = this.reader.getWithPrefixLength(
      address.toString()
    );
    if (raw === null) return null;

    const record = this.decode(raw);
    if (record === null) return null;

    return {
      record,
      span: { address: address.network(prefixLength), prefixLength },
    };
  }

  protected abstract decode(raw: unknown): T | null;
}

export class AsnTable extends MmdbTable<AsnEntry> {
  protected decode(raw: unknown): AsnEntry | null {
    if (!isObject(raw)) return null;
    const number = asNumber(raw.autonomous_system_number);
    if (number === null) return null;
    return {
      number,
      organization: asString(raw.autonomous_system_organization) ?? "",
    };
  }
}

export class CityTable extends MmdbTable<CityEntry> {
  protected decode(raw: unknown): CityEntry | null {
    if (!isObject(raw)) return null;
    const subdivisions = Array.isArray(raw.subdivisions)
      ? raw.subdivisions
          .map(decodeNamed)
          .filter((entry): entry is NamedEntry => entry !== null)
      : [];
    return {
      location: decodeLocation(raw.location),
      country: decodeNamed(raw.country),
      registeredCountry: decodeNamed(raw.registered_country),
      subdivisions,
      city: decodeNamed(raw.city),
    };
  }
}

export class RegionTable extends MmdbTable<RegionEntry> {
  protected decode(raw: unknown): RegionEntry | null {
    if (!isObject(raw)) return null;
    const entry: RegionEntry = {
      province: nonEmpty(raw.province),
      city: nonEmpty(raw.city),
      district: nonEmpty(raw.districts) ?? nonEmpty(raw.district),
      net: nonEmpty(raw.net),
      location: decodeLocation(raw.location),
    };
    // A record without any division carries nothing worth preferring
    if (!entry.province && !entry.city && !entry.district) return null;
    return entry;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function nonEmpty(value: unknown): string | null {
  const text = asString(value)?.trim();
  return text ? text : null;
}

function asNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function decodeLocation(value: unknown): Coordinates | null {
  if (!isObject(value)) return null;
  const latitude = asNumber(value.latitude);
  const longitude = asNumber(value.longitude);
  if (latitude === null || longitude === null) return null;
  return { latitude, longitude };
}

function decodeNamed(value: unknown): NamedEntry | null {
  if (!isObject(value)) return null;
  const names: Record<string, string> = {};
  if (isObject(value.names)) {
    for (const [language, name] of Object.entries(value.names)) {
      if (typeof name === "string" && name) names[language] = name;
    }
  }
  const isoCode = nonEmpty(value.iso_code);
  if (!isoCode && Object.keys(names).length === 0) return null;
  return { isoCode, names };
}
