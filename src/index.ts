import dotenv from "dotenv";
import { Server } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { GeoLookupService } from "./services/geo-lookup-service";
import { GeoService } from "./services/geo-service";
import { HostResolver } from "./services/host-resolver";
import {
  SnapshotManager,
  loadSnapshotTables,
} from "./services/snapshot-manager";

// Load environment variables from .env
dotenv.config();

const config = loadConfig();

const snapshots = new SnapshotManager(
  () => loadSnapshotTables(config.databases, config.regionCountry),
  Object.values(config.databases)
);

const geoService = new GeoService({
  snapshots,
  resolver: new HostResolver(undefined, config.dnsTimeoutMs),
  lookupService: new GeoLookupService({ languages: config.languages }),
});

let server: Server | null = null;

async function main() {
  try {
    await snapshots.initialize();
  } catch (err) {
    console.error("Failed to load geolocation databases:", err);
    process.exit(1);
  }

  snapshots.start(config.reloadIntervalMs);

  const app = createApp({
    geoService,
    snapshots,
    trustProxyHeaders: config.trustProxyHeaders,
  });

  // Start the server
  server = app.listen(config.port, config.host, () => {
    const base = `http://localhost:${config.port}`;
    console.log(`Server is running on ${config.host}:${config.port}`);
    console.log(`API endpoints:`);
    console.log(`- GET ${base}/`);
    console.log(`- GET ${base}/{host}`);
    console.log(`- GET ${base}/api/{host}`);
    console.log(`- GET ${base}/api?host={host}`);
    console.log(`- GET ${base}/health`);
  });
}

// Reload the databases on demand, e.g. after a manual update
process.on("SIGHUP", () => {
  console.log("Received SIGHUP, reloading databases...");
  snapshots.reload().catch((err) => {
    console.error("Database reload failed, keeping the current snapshot:", err);
  });
});

// Listen for termination signals to close connections
process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);

// Clean shutdown function
function shutdown() {
  console.log("Shutting down gracefully...");
  snapshots.stop();

  if (!server) {
    process.exit(0);
  }

  server.close((err) => {
    if (err) {
      console.error("Error during shutdown:", err);
      process.exit(1);
    }
    console.log("HTTP server closed");
    process.exit(0);
  });
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
