import fs from "fs";
import {
  AsnEntry,
  AsnTable,
  CityEntry,
  CityTable,
  PrefixTable,
  RegionEntry,
  RegionTable,
  openMmdb,
} from "./prefix-table";
import { AsnCatalog } from "./asn-catalog";
import {
  DatabaseUnavailableError,
  errorCode,
  errorMessage,
} from "../models/errors";

export interface DatabasePaths {
  asn: string;
  city: string;
  region: string;
  asnInfo: string;
}

/**
 * Immutable bundle of every table a lookup reads. A lookup holds one
 * reference for its whole lifetime; reloads publish a new object instead
 * of touching this one.
 */
export interface DatabaseSnapshot {
  readonly asn: PrefixTable<AsnEntry>;
  readonly city: PrefixTable<CityEntry>;
  readonly region: PrefixTable<RegionEntry>;
  readonly catalog: AsnCatalog;
  // ISO code of the country the region table covers
  readonly regionCountry: string;
  readonly generation: number;
  readonly loadedAt: Date;
}

export type SnapshotTables = Omit<DatabaseSnapshot, "generation" | "loadedAt">;

export type SnapshotLoader = () => Promise<SnapshotTables>;

export interface SnapshotSource {
  current(): DatabaseSnapshot;
}

/**
 * Open the three mmdb tables (in asn, city, region order) and the ASN
 * catalogue. Fails with a DatabaseLoadError naming the first table that
 * could not be opened.
 */
export async function loadSnapshotTables(
  paths: DatabasePaths,
  regionCountry: string
): Promise<SnapshotTables> {
  const asn = new AsnTable(await openMmdb("asn", paths.asn));
  const city = new CityTable(await openMmdb("city", paths.city));
  const region = new RegionTable(await openMmdb("region", paths.region));
  const catalog = await AsnCatalog.load(paths.asnInfo);

  return { asn, city, region, catalog, regionCountry };
}

/**
 * Owns the live snapshot and is its only writer.
 *
 * Files on disk are expected to be replaced atomically (write to a temporary
 * file, then rename) so a reload never reads a half-written database.
 */
export class SnapshotManager implements SnapshotSource {
  private snapshot: DatabaseSnapshot | null = null;
  private generation = 0;
  private fileVersions: string | null = null;
  // Serializes reloads so generations are published in order
  private pending: Promise<void> = Promise.resolve();
  private refreshing = false;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly loader: SnapshotLoader,
    private readonly watchedFiles: string[] = []
  ) {}

  /**
   * First load. Callers treat a failure here as fatal.
   */
  async initialize(): Promise<DatabaseSnapshot> {
    return this.reload();
  }

  isReady(): boolean {
    return this.snapshot !== null;
  }

  current(): DatabaseSnapshot {
    if (!this.snapshot) {
      throw new DatabaseUnavailableError();
    }
    return this.snapshot;
  }

  /**
   * Build a snapshot from the files on disk and publish it. On failure the
   * error is rethrown and the previous snapshot stays live.
   */
  reload(): Promise<DatabaseSnapshot> {
    const next = this.pending.then(() => this.buildAndPublish());
    this.pending = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  /**
   * Scheduled refresh: reload only when a watched file changed. Failures are
   * logged and the previous snapshot is kept until the next tick.
   */
  async refresh(): Promise<boolean> {
    if (this.refreshing) return false;
    this.refreshing = true;

    try {
      const versions = await this.readFileVersions();
      if (this.snapshot && versions === this.fileVersions) {
        return false;
      }
      await this.reload();
      return true;
    } catch (error) {
      const message = errorMessage(error);
      console.warn(
        `Database refresh failed, keeping generation ${this.generation}: ${message}`
      );
      return false;
    } finally {
      this.refreshing = false;
    }
  }

  start(intervalMs: number): void {
    this.stop();
    this.timer = setInterval(() => {
      this.refresh().catch((error) =>
        console.error("Unexpected error during database refresh:", error)
      );
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async buildAndPublish(): Promise<DatabaseSnapshot> {
    const versions = await this.readFileVersions();
    const tables = await this.loader();

    const snapshot: DatabaseSnapshot = Object.freeze({
      ...tables,
      generation: this.generation + 1,
      loadedAt: new Date(),
    });

    // Publication is this single reference assignment
    this.snapshot = snapshot;
    this.generation = snapshot.generation;
    this.fileVersions = versions;

    console.log(
      `Published database snapshot generation ${snapshot.generation}`
    );
    return snapshot;
  }

  private async readFileVersions(): Promise<string> {
    const versions = await Promise.all(
      this.watchedFiles.map(async (file) => {
        try {
          const stat = await fs.promises.stat(file);
          return `${file}@${stat.mtimeMs}:${stat.size}`;
        } catch (error) {
          if (errorCode(error) === "ENOENT") return `${file}@missing`;
          throw error;
        }
      })
    );
    return versions.join("|");
  }
}
