import {
  GeoRecord,
  GeoResponse,
  IpInfoResponse,
  ResolutionResult,
} from "../models/geo-data";

/**
 * Shapes lookup results for the wire. Absent objects are null and absent
 * region lists are empty arrays; keys are always emitted in the same order.
 */
export class ResponseAssembler {
  static assemble(result: ResolutionResult): GeoResponse {
    if (result.kind === "address") {
      const [record] = result.records;
      return this.toIpInfo(record);
    }

    return {
      host: result.host,
      ips: result.records.map((record) => this.toIpInfo(record)),
    };
  }

  static toIpInfo(record: GeoRecord): IpInfoResponse {
    const { asn, span, placement } = record;

    return {
      ip: record.address.toString(),
      as: asn ? { number: asn.number, name: asn.name, info: asn.info } : null,
      addr: span ? span.address.toCidr(span.prefixLength) : null,
      location: placement?.location
        ? {
            latitude: placement.location.latitude,
            longitude: placement.location.longitude,
          }
        : null,
      country: placement?.country
        ? { code: placement.country.code, name: placement.country.name }
        : null,
      registered_country: placement?.registeredCountry
        ? {
            code: placement.registeredCountry.code,
            name: placement.registeredCountry.name,
          }
        : null,
      regions: placement ? [...placement.regions] : [],
      regions_short: placement ? [...placement.regionsShort] : [],
      type: placement?.category ?? null,
    };
  }
}
