import * as fs from "node:fs";
import {
  basicLogger,
  createNodeServer,
  filteredLogger,
  loadConfig,
} from "@cannedhttp/engine";
import { applyOptions, HELP_TEXT, parseArgs } from "./args.js";

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(new URL("../package.json", import.meta.url), "utf8"),
  );
  if (
    manifest &&
    typeof manifest === "object" &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  return "unknown";
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed.kind === "help") {
    console.log(HELP_TEXT);
    return;
  }
  if (parsed.kind === "version") {
    console.log(readVersion());
    return;
  }
  if (parsed.kind === "error") {
    console.error(parsed.message);
    console.log(HELP_TEXT);
    process.exit(1);
  }

  const config = applyOptions(loadConfig(process.env), parsed.options);
  const logger = filteredLogger(config.logLevel, basicLogger());

  const server = createNodeServer({ config, logger });
  await server.start();

  const shutdown = () => {
    logger.info("Shutting down...");
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Error during shutdown:", err);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
