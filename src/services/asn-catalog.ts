import fs from "fs";
import csv from "csv-parser";

// Category of a catalogued network whose row leaves the type empty
export const OTHER_NETWORK_TYPE = "其他网络";

export interface AsnCatalogEntry {
  // Localized operator name
  name: string;
  // Network-use category, e.g. "broadband" or "datacenter"
  type: string;
}

/**
 * Catalogue of well-known autonomous systems, keyed by ASN.
 *
 * The source is a CSV file with the columns `asn,name,type`. Rows with a
 * non-numeric ASN or an empty name are skipped. An empty type reads as
 * OTHER_NETWORK_TYPE.
 */
export class AsnCatalog {
  constructor(
    private readonly entries: ReadonlyMap<number, AsnCatalogEntry> = new Map()
  ) {}

  static empty(): AsnCatalog {
    return new AsnCatalog();
  }

  get size(): number {
    return this.entries.size;
  }

  get(asn: number): AsnCatalogEntry | undefined {
    return this.entries.get(asn);
  }

  /**
   * Load the catalogue from disk. A missing file yields an empty catalogue,
   * the lookup tables work without it.
   */
  static async load(filePath: string): Promise<AsnCatalog> {
    if (!fs.existsSync(filePath)) {
      console.warn(`ASN catalogue ${filePath} not found, continuing without it`);
      return AsnCatalog.empty();
    }

    const entries = new Map<number, AsnCatalogEntry>();
    let skipped = 0;

    await new Promise<void>((resolve, reject) => {
      fs.createReadStream(filePath)
        .pipe(csv({ mapHeaders: ({ header }) => header.trim().toLowerCase() }))
        .on("data", (row: Record<string, string>) => {
          const entry = AsnCatalog.parseRow(row);
          if (entry) {
            entries.set(entry.asn, { name: entry.name, type: entry.type });
          } else {
            skipped++;
          }
        })
        .on("end", () => resolve())
        .on("error", (err: Error) => {
          console.error(`Error reading ASN catalogue: ${err.message}`);
          reject(err);
        });
    });

    console.log(
      `Loaded ASN catalogue with ${entries.size} entries (${skipped} skipped)`
    );
    return new AsnCatalog(entries);
  }

  static parseRow(
    row: Record<string, string>
  ): ({ asn: number } & AsnCatalogEntry) | null {
    const asnText = (row.asn ?? "").trim().replace(/^as/i, "");
    const name = (row.name ?? "").trim();
    if (!/^\d+$/.test(asnText) || !name) return null;

    const type = (row.type ?? "").trim();
    return { asn: Number(asnText), name, type: type || OTHER_NETWORK_TYPE };
  }
}
