import fs from "fs";
import path from "path";
import { TableName, errorCode, errorMessage } from "../models/errors";
import { DatabasePaths } from "./snapshot-manager";

export interface DatabaseSource {
  fileName: string;
  url: string;
}

const UPSTREAM_URLS: Record<TableName, string> = {
  city: "https://github.com/P3TERX/GeoLite.mmdb/raw/download/GeoLite2-City.mmdb",
  asn: "https://github.com/P3TERX/GeoLite.mmdb/raw/download/GeoLite2-ASN.mmdb",
  region: "https://github.com/ljxi/GeoCN/releases/download/Latest/GeoCN.mmdb",
};

/**
 * Download sources for the configured database files, named relative to
 * the data directory so that the service reads what the updater writes
 */
export function databaseSources(
  dataDir: string,
  databases: Pick<DatabasePaths, TableName>
): DatabaseSource[] {
  const tables: TableName[] = ["city", "asn", "region"];
  return tables.map((table) => ({
    fileName: path.relative(dataDir, databases[table]),
    url: UPSTREAM_URLS[table],
  }));
}

/**
 * The part of a fetch Response the updater reads
 */
export interface DownloadResponse {
  ok: boolean;
  status: number;
  statusText: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type Fetcher = (url: string) => Promise<DownloadResponse>;

export interface DatabaseUpdaterOptions {
  maxAgeMs: number;
  fetcher?: Fetcher;
  now?: () => number;
}

export interface UpdateSummary {
  updated: string[];
  skipped: string[];
  failed: { fileName: string; error: string }[];
}

/**
 * Downloads database files into the data directory. Each file is written
 * beside its target and renamed into place, so a running service reading
 * the directory only ever sees complete files.
 */
export class DatabaseUpdater {
  private readonly fetcher: Fetcher;
  private readonly now: () => number;

  constructor(
    private readonly dataDir: string,
    private readonly options: DatabaseUpdaterOptions
  ) {
    this.fetcher = options.fetcher ?? ((url) => fetch(url));
    this.now = options.now ?? Date.now;
  }

  /**
   * A file is stale when it is missing or older than the configured max age
   */
  async isStale(fileName: string): Promise<boolean> {
    try {
      const stat = await fs.promises.stat(path.join(this.dataDir, fileName));
      return this.now() - stat.mtimeMs >= this.options.maxAgeMs;
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return true;
      }
      throw error;
    }
  }

  async download(source: DatabaseSource): Promise<void> {
    const target = path.join(this.dataDir, source.fileName);
    const temporary = `${target}.tmp`;

    const response = await this.fetcher(source.url);
    if (!response.ok) {
      throw new Error(
        `Download of ${source.url} failed: ${response.status} ${response.statusText}`
      );
    }

    const body = Buffer.from(await response.arrayBuffer());
    if (body.length === 0) {
      throw new Error(`Download of ${source.url} returned an empty body`);
    }

    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    try {
      await fs.promises.writeFile(temporary, body);
      await fs.promises.rename(temporary, target);
    } catch (error) {
      await fs.promises.rm(temporary, { force: true });
      throw error;
    }

    console.log(`Updated ${source.fileName} (${body.length} bytes)`);
  }

  /**
   * Update every stale source, or all of them when forced. One failed
   * download does not stop the others.
   */
  async updateAll(
    sources: DatabaseSource[],
    force = false
  ): Promise<UpdateSummary> {
    const summary: UpdateSummary = { updated: [], skipped: [], failed: [] };

    for (const source of sources) {
      try {
        if (!force && !(await this.isStale(source.fileName))) {
          console.log(`${source.fileName} is up to date, skipping`);
          summary.skipped.push(source.fileName);
          continue;
        }

        console.log(`Downloading ${source.fileName} from ${source.url}...`);
        await this.download(source);
        summary.updated.push(source.fileName);
      } catch (error) {
        const message = errorMessage(error);
        console.error(`Failed to update ${source.fileName}: ${message}`);
        summary.failed.push({ fileName: source.fileName, error: message });
      }
    }

    return summary;
  }
}
