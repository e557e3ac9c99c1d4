import path from "path";
import { DatabasePaths } from "./services/snapshot-manager";

export interface AppConfig {
  port: number;
  host: string;
  dataDir: string;
  databases: DatabasePaths;
  regionCountry: string;
  languages: string[];
  reloadIntervalMs: number;
  dnsTimeoutMs: number;
  trustProxyHeaders: boolean;
  updateMaxAgeMs: number;
}

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
}

/**
 * Build the application config from environment variables. Call
 * dotenv.config() first to pick up a .env file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = path.resolve(env.MMDB_PATH || "data");

  return {
    port: parseInteger(env.PORT, 8080),
    host: env.HOST || "0.0.0.0",
    dataDir,
    databases: {
      asn: path.join(dataDir, env.ASN_DB_FILE || "GeoLite2-ASN.mmdb"),
      city: path.join(dataDir, env.CITY_DB_FILE || "GeoLite2-City.mmdb"),
      region: path.join(dataDir, env.REGION_DB_FILE || "GeoCN.mmdb"),
      asnInfo: path.join(dataDir, env.ASN_INFO_FILE || "asn-info.csv"),
    },
    regionCountry: (env.REGION_COUNTRY || "CN").toUpperCase(),
    languages: (env.GEO_LANGUAGES || "zh-CN,en")
      .split(",")
      .map((language) => language.trim())
      .filter(Boolean),
    reloadIntervalMs: parseInteger(env.DB_RELOAD_INTERVAL, 60 * 60 * 1000),
    dnsTimeoutMs: parseInteger(env.DNS_TIMEOUT, 3000),
    trustProxyHeaders: parseBoolean(env.TRUST_PROXY_HEADERS, true),
    updateMaxAgeMs: parseInteger(env.DB_UPDATE_MAX_AGE, 24 * 60 * 60 * 1000),
  };
}
