import type { Address } from "../services/address";

/**
 * Autonomous system owning the matched network
 */
export interface AsnRecord {
  number: number;
  name: string;
  // Localized operator name from the ASN catalogue, falls back to `name`
  info: string;
}

/**
 * The CIDR prefix a lookup result belongs to
 */
export interface NetworkSpan {
  address: Address;
  prefixLength: number;
}

export interface CountryInfo {
  code: string;
  name: string;
}

export interface Coordinates {
  latitude: number;
  longitude: number;
}

/**
 * Geographic placement produced by exactly one source table
 */
export interface GeoPlacement {
  location: Coordinates | null;
  country: CountryInfo | null;
  registeredCountry: CountryInfo | null;
  // Country-level to most specific, e.g. province then city
  regions: string[];
  regionsShort: string[];
  category: string | null;
}

/**
 * Per-address lookup result. Every part is optional because a valid
 * address can be unmapped in any of the tables.
 */
export interface GeoRecord {
  address: Address;
  asn: AsnRecord | null;
  span: NetworkSpan | null;
  placement: GeoPlacement | null;
}

export interface ResolutionResult {
  host: string;
  kind: "address" | "hostname";
  records: GeoRecord[];
}

/**
 * Wire format of a single address
 */
export interface IpInfoResponse {
  ip: string;
  as: AsnRecord | null;
  addr: string | null;
  location: Coordinates | null;
  country: CountryInfo | null;
  registered_country: CountryInfo | null;
  regions: string[];
  regions_short: string[];
  type: string | null;
}

/**
 * Wire format of a hostname query
 */
export interface HostResponse {
  host: string;
  ips: IpInfoResponse[];
}

export type GeoResponse = IpInfoResponse | HostResponse;
