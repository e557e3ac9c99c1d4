import path from "path";
import dotenv from "dotenv";
import { loadConfig } from "../src/config";
import {
  DatabaseUpdater,
  databaseSources,
} from "../src/services/database-updater";

// Parse command line arguments
function parseArgs(): { [key: string]: string | boolean } {
  const args: { [key: string]: string | boolean } = {
    force: false,
  };

  for (let i = 2; i < process.argv.length; i++) {
    const arg = process.argv[i];

    if (arg === "--force" || arg === "-f") {
      args.force = true;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      args.help = true;
      continue;
    }

    if (arg.startsWith("--")) {
      args[arg.substring(2)] = process.argv[++i] ?? "";
    } else if (arg.startsWith("-")) {
      const key = arg.substring(1);
      const value = process.argv[++i] ?? "";
      // Map short options to long options
      args[key === "d" ? "dir" : key] = value;
    }
  }

  return args;
}

// Print usage information
function printUsage(): void {
  console.log("Usage: npm run update-databases -- [options]");
  console.log("");
  console.log("Options:");
  console.log("  --dir, -d <directory>    Data directory (default: MMDB_PATH)");
  console.log("  --force, -f              Download even if files are fresh");
  console.log("  --help, -h               Show this message");
  console.log("");
  console.log("Example:");
  console.log("  npm run update-databases -- -d ./data --force");
}

// Main function
async function main() {
  dotenv.config();
  const args = parseArgs();

  if (args.help) {
    printUsage();
    process.exit(0);
  }

  const config = loadConfig();
  const dataDir =
    typeof args.dir === "string" && args.dir
      ? path.resolve(process.cwd(), args.dir)
      : config.dataDir;

  const updater = new DatabaseUpdater(dataDir, {
    maxAgeMs: config.updateMaxAgeMs,
  });
  const sources = databaseSources(config.dataDir, config.databases);
  const summary = await updater.updateAll(sources, args.force === true);

  console.log(
    `Update finished: ${summary.updated.length} updated, ` +
      `${summary.skipped.length} skipped, ${summary.failed.length} failed`
  );
  process.exit(summary.failed.length > 0 ? 1 : 0);
}

// Run the script
main().catch((error) => {
  console.error("Unhandled error:", error);
  process.exit(1);
});
