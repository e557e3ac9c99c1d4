import fs from "fs";
import os from "os";
import path from "path";
import {
  SnapshotManager,
  SnapshotTables,
  loadSnapshotTables,
} from "../../src/services/snapshot-manager";
import { StaticPrefixTable } from "../../src/services/static-prefix-table";
import { AsnEntry } from "../../src/services/prefix-table";
import { GeoService } from "../../src/services/geo-service";
import { GeoLookupService } from "../../src/services/geo-lookup-service";
import { DnsBackend, HostResolver } from "../../src/services/host-resolver";
import {
  DatabaseLoadError,
  DatabaseUnavailableError,
} from "../../src/models/errors";
import { createSnapshotTables } from "../fixtures/snapshot-fixture";

function reassignedAsnTables(): SnapshotTables {
  return createSnapshotTables({
    asn: new StaticPrefixTable<AsnEntry>([
      { cidr: "8.8.8.0/24", record: { number: 64512, organization: "RENUMBERED" } },
    ]),
  });
}

describe("SnapshotManager", () => {
  test("should be unavailable before the first load", () => {
    const manager = new SnapshotManager(jest.fn());

    expect(manager.isReady()).toBe(false);
    expect(() => manager.current()).toThrow(DatabaseUnavailableError);
  });

  test("should publish the first snapshot on initialize", async () => {
    const manager = new SnapshotManager(async () => createSnapshotTables());

    const snapshot = await manager.initialize();

    expect(manager.isReady()).toBe(true);
    expect(snapshot.generation).toBe(1);
    expect(manager.current()).toBe(snapshot);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  test("should replace the snapshot on reload", async () => {
    const loader = jest
      .fn<Promise<SnapshotTables>, []>()
      .mockResolvedValueOnce(createSnapshotTables())
      .mockResolvedValueOnce(reassignedAsnTables());
    const manager = new SnapshotManager(loader);

    const first = await manager.initialize();
    const second = await manager.reload();

    expect(second.generation).toBe(2);
    expect(manager.current()).toBe(second);
    expect(first.asn).not.toBe(second.asn);
  });

  test("should keep the previous snapshot when a reload fails", async () => {
    const loader = jest
      .fn<Promise<SnapshotTables>, []>()
      .mockResolvedValueOnce(createSnapshotTables())
      .mockRejectedValueOnce(
        new DatabaseLoadError("city", "/data/GeoLite2-City.mmdb", new Error("truncated"))
      );
    const manager = new SnapshotManager(loader);

    const first = await manager.initialize();
    await expect(manager.reload()).rejects.toThrow(
      "Failed to load city database from /data/GeoLite2-City.mmdb: truncated"
    );

    expect(manager.current()).toBe(first);
    expect(manager.current().generation).toBe(1);
  });

  test("should run overlapping reloads one after another", async () => {
    let active = 0;
    let maxActive = 0;
    const loader = jest.fn(async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return createSnapshotTables();
    });
    const manager = new SnapshotManager(loader);

    const [first, second] = await Promise.all([manager.reload(), manager.reload()]);

    expect(maxActive).toBe(1);
    expect(first.generation).toBe(1);
    expect(second.generation).toBe(2);
    expect(manager.current()).toBe(second);
  });

  test("should answer in-flight queries from the snapshot they started with", async () => {
    let releaseA: (value: string[]) => void = () => undefined;
    const dns: DnsBackend = {
      resolve4: () => new Promise<string[]>((resolve) => (releaseA = resolve)),
      resolve6: () => Promise.resolve([]),
    };
    const loader = jest
      .fn<Promise<SnapshotTables>, []>()
      .mockResolvedValueOnce(createSnapshotTables())
      .mockResolvedValueOnce(reassignedAsnTables());
    const manager = new SnapshotManager(loader);
    await manager.initialize();

    const geoService = new GeoService({
      snapshots: manager,
      resolver: new HostResolver(dns),
      lookupService: new GeoLookupService({ languages: ["en"] }),
    });

    const inFlight = geoService.query("dns.example");
    await manager.reload();
    releaseA(["8.8.8.8"]);

    const before = await inFlight;
    const after = await geoService.query("8.8.8.8");

    expect(before.records[0].asn?.number).toBe(15169);
    expect(after.records[0].asn?.number).toBe(64512);
  });

  describe("refresh", () => {
    let tempDir: string;
    let watched: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "snapshot-manager-"));
      watched = path.join(tempDir, "GeoLite2-City.mmdb");
      fs.writeFileSync(watched, "v1");
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    test("should reload only when a watched file changed", async () => {
      const loader = jest.fn(async () => createSnapshotTables());
      const manager = new SnapshotManager(loader, [watched]);
      await manager.initialize();

      expect(await manager.refresh()).toBe(false);
      expect(loader).toHaveBeenCalledTimes(1);

      fs.writeFileSync(watched, "version two");

      expect(await manager.refresh()).toBe(true);
      expect(loader).toHaveBeenCalledTimes(2);
      expect(manager.current().generation).toBe(2);
    });

    test("should log and keep serving when the refresh fails", async () => {
      const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
      const loader = jest
        .fn<Promise<SnapshotTables>, []>()
        .mockResolvedValueOnce(createSnapshotTables())
        .mockRejectedValueOnce(new Error("corrupt file"));
      const manager = new SnapshotManager(loader, [watched]);
      const first = await manager.initialize();

      fs.rmSync(watched);

      expect(await manager.refresh()).toBe(false);
      expect(manager.current()).toBe(first);
      expect(warn).toHaveBeenCalledWith(
        "Database refresh failed, keeping generation 1: corrupt file"
      );
      warn.mockRestore();
    });
  });

  describe("timer", () => {
    afterEach(() => {
      jest.useRealTimers();
    });

    test("should refresh on every interval until stopped", () => {
      jest.useFakeTimers();
      const manager = new SnapshotManager(async () => createSnapshotTables());
      const refresh = jest.spyOn(manager, "refresh").mockResolvedValue(false);

      manager.start(1000);
      jest.advanceTimersByTime(2500);
      expect(refresh).toHaveBeenCalledTimes(2);

      manager.stop();
      jest.advanceTimersByTime(5000);
      expect(refresh).toHaveBeenCalledTimes(2);
    });
  });
});

describe("loadSnapshotTables", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "snapshot-tables-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function paths() {
    return {
      asn: path.join(tempDir, "GeoLite2-ASN.mmdb"),
      city: path.join(tempDir, "GeoLite2-City.mmdb"),
      region: path.join(tempDir, "GeoCN.mmdb"),
      asnInfo: path.join(tempDir, "asn-info.csv"),
    };
  }

  test("should name the table whose file is missing", async () => {
    const error = await loadSnapshotTables(paths(), "CN").catch((e) => e);

    expect(error).toBeInstanceOf(DatabaseLoadError);
    expect(error.table).toBe("asn");
    expect(error.message).toContain(
      `Failed to load asn database from ${paths().asn}`
    );
  });

  test("should name the table whose file is not a database", async () => {
    fs.writeFileSync(paths().asn, "this is not a MaxMind database");

    const error = await loadSnapshotTables(paths(), "CN").catch((e) => e);

    expect(error).toBeInstanceOf(DatabaseLoadError);
    expect(error.table).toBe("asn");
    expect(error.status).toBe(503);
  });
});
