import path from "node:path";
import { fileURLToPath } from "node:url";
import { ControlConfigSchema, DEFAULT_CONFIG, type ControlConfig } from "@deskmode/core";
import { shellSplit } from "./services/shellSplit.js";
import { envBool, envNumber, envString } from "./utils/env.js";

export const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../../");

export function defaultEnvFile(): string {
  return envString("DESKMODE_ENV_FILE") ?? path.join(repoRoot, ".deskmode", "env");
}

function logFileFromEnv(): string | null {
  const raw = envString("DESKMODE_LOG_FILE");
  if (raw === "-") return null;
  if (!raw) return path.join(repoRoot, ".deskmode", "logs", "deskmode.log");
  return path.isAbsolute(raw) ? raw : path.join(repoRoot, raw);
}

/** Reads `DESKMODE_*` variables over {@link DEFAULT_CONFIG}; throws when the result does not validate. */
export function controlConfigFromEnv(overrides: Partial<ControlConfig> = {}): ControlConfig {
  const d = DEFAULT_CONFIG;
  const supervisorctl = envString("DESKMODE_SUPERVISORCTL");
  const candidate = {
    host: envString("DESKMODE_HOST") ?? d.host,
    port: envNumber("DESKMODE_PORT", d.port),
    supervisorctl: supervisorctl ? shellSplit(supervisorctl) : d.supervisorctl,
    wmService: envString("DESKMODE_WM_SERVICE") ?? d.wmService,
    desktopService: envString("DESKMODE_DESKTOP_SERVICE") ?? d.desktopService,
    kioskScript: envString("DESKMODE_KIOSK_SCRIPT") ?? d.kioskScript,
    statusTimeoutMs: envNumber("DESKMODE_STATUS_TIMEOUT_MS", d.statusTimeoutMs),
    controlTimeoutMs: envNumber("DESKMODE_CONTROL_TIMEOUT_MS", d.controlTimeoutMs),
    applyTimeoutMs: envNumber("DESKMODE_APPLY_TIMEOUT_MS", d.applyTimeoutMs),
    probeTimeoutMs: envNumber("DESKMODE_PROBE_TIMEOUT_MS", d.probeTimeoutMs),
    stackWaitMs: envNumber("DESKMODE_STACK_WAIT_MS", d.stackWaitMs),
    stackPollMs: envNumber("DESKMODE_STACK_POLL_MS", d.stackPollMs),
    displayWaitMs: envNumber("DESKMODE_DISPLAY_WAIT_MS", d.displayWaitMs),
    displayPollMs: envNumber("DESKMODE_DISPLAY_POLL_MS", d.displayPollMs),
    displayReadyCmd: envString("DESKMODE_DISPLAY_READY_CMD") ?? d.displayReadyCmd,
    settleMs: envNumber("DESKMODE_SETTLE_MS", d.settleMs),
    display: envString("DESKMODE_DISPLAY") ?? d.display,
    logFile: logFileFromEnv(),
    debug: envBool("DESKMODE_DEBUG", d.debug),
    ...overrides,
  };

  const parsed = ControlConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`);
    throw new Error(`Invalid configuration:\n  ${issues.join("\n  ")}`);
  }
  return parsed.data;
}

/** Environment handed to every child process. */
export function childEnv(config: ControlConfig): Record<string, string> {
  return { DISPLAY: envString("DISPLAY") ?? config.display };
}
