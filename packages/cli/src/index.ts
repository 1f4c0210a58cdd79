#!/usr/bin/env node
import * as path from "node:path";
import {
  basicLogger,
  createNodeServer,
  filteredLogger,
  prefixedLogger,
} from "@tinyhttpd/engine";
import { logLevelFor, parseArgs } from "./args.js";
import { VERSION } from "./version.js";

function printHelp(): void {
  console.log(`
tinyhttpd - a small HTTP/1.1 server

Usage: tinyhttpd [--directory <dir>] [options]

Options:
  --directory, -d <dir>  Directory for /files/ (default: .)
  --port, -p <port>      Port to listen on (default: 4221)
  --host, -H <host>      Host to bind (default: 0.0.0.0)
  --read-timeout <ms>    Close a connection idle for this long (default: never)
  --quiet, -q            Suppress request logging
  --verbose              Log connection state changes
  --log-level <level>    debug, info, warn or error (overrides -q/--verbose)
  --version, -v          Show version
  --help, -h             Show this help
`);
}

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));
  switch (command.kind) {
    case "help":
      printHelp();
      return;
    case "version":
      console.log(VERSION);
      return;
    case "error":
      console.error(command.message);
      printHelp();
      process.exitCode = 1;
      return;
  }

  const { options } = command;
  const directory = path.resolve(options.directory);
  const logger = filteredLogger(
    logLevelFor(options),
    prefixedLogger("tinyhttpd", basicLogger()),
  );

  const server = createNodeServer({
    config: {
      directory,
      port: options.port,
      host: options.host,
      readTimeoutMs: options.readTimeoutMs,
      quiet: options.quiet,
    },
    logger,
  });
  const port = await server.start();

  const host = options.host === "0.0.0.0" ? "localhost" : options.host;
  console.log(`\n  tinyhttpd serving ${directory}\n`);
  console.log(`  Local:   http://${host}:${port}`);
  if (options.host === "0.0.0.0") {
    console.log(`  Network: http://0.0.0.0:${port}`);
  }
  console.log();

  const shutdown = async () => {
    console.log("\nShutting down...");
    await server.stop();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error("Shutdown failed:", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
