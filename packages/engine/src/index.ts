import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { ControlConfig } from "@deskmode/core";
import { HELP_TEXT, parseEngineCli } from "./cli.js";
import { controlConfigFromEnv, defaultEnvFile } from "./config.js";
import { createEngine } from "./engine.js";
import { loadEnvFile } from "./utils/env.js";
import { createLogger } from "./utils/logger.js";

function fail(err: unknown): never {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(msg);
  process.exit(1);
}

const cli = (() => {
  try {
    return parseEngineCli(process.argv.slice(2));
  } catch (err) {
    fail(err);
  }
})();

if (cli.help) {
  process.stderr.write(`${HELP_TEXT}\n`);
  process.exit(0);
}

const envFile = cli.envFile ?? defaultEnvFile();
try {
  loadEnvFile(envFile);
} catch (err) {
  fail(err);
}

const config = (() => {
  const overrides: Partial<ControlConfig> = {};
  if (cli.host !== undefined) overrides.host = cli.host;
  if (cli.port !== undefined) overrides.port = cli.port;
  try {
    return controlConfigFromEnv(overrides);
  } catch (err) {
    fail(err);
  }
})();

const logger = createLogger({ logFile: config.logFile, alsoConsole: config.debug });
const engine = createEngine(config, { logger });
const { server, registry } = engine;

server.on("error", (err) => {
  logger.error(`[engine] server error: ${err.message}`);
  void logger.flush().then(() => process.exit(1));
});

server.listen(config.port, config.host, () => {
  const address = server.address();
  const port = address !== null && typeof address === "object" ? address.port : config.port;

  if (cli.stateFile) {
    try {
      mkdirSync(dirname(cli.stateFile), { recursive: true });
      writeFileSync(
        cli.stateFile,
        JSON.stringify({ host: config.host, port, pid: process.pid, startedAt: Date.now() }, null, 2)
      );
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.error(`[engine] Failed to write state file (${cli.stateFile}): ${msg}`);
    }
  }

  const cyan = (s: string) => `\x1b[36m${s}\x1b[0m`;
  const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
  const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;
  console.log(`
  ${cyan("✦")} deskmode ${dim("v0.1.0")}
  ${dim("HTTP:")}     ${cyan(`http://${config.host}:${port}`)}
  ${dim("Services:")} ${registry.startOrder().join(" -> ")}
  ${dim("Toggle:")}   ${config.kioskScript}
  ${dim("Status:")}   ${green("● Ready")}
`);
  logger.info(`[engine] listening on ${config.host}:${port}`);
  logger.data("[engine] config", { ...config, port });
});

// Graceful shutdown
let shuttingDown = false;
async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`[engine] Shutting down (${signal})...`);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await logger.flush();
  process.exit(0);
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));
