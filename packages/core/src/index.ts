import { z } from "zod";
import { DEFAULT_WM_SERVICE, type ServiceRunState, type StackHealth } from "./services.js";

export * from "./services.js";

// Display modes
export type KioskMode = "on" | "off";
export type CurrentMode = KioskMode | "unknown";

export function modeFor(wantKiosk: boolean): KioskMode {
  return wantKiosk ? "on" : "off";
}

export interface ModeState {
  currentMode: CurrentMode;
  /** Epoch seconds of the last successful apply, 0 when none. */
  lastApplyTs: number;
}

// Outcome of one external step. Steps never throw; they report.
export interface StepResult {
  ok: boolean;
  reason: string;
}

export interface ApplyResult {
  ok: boolean;
  message: string;
}

// Response payloads (wire format is snake_case)
export interface StatusPayload {
  services: Record<string, ServiceRunState>;
  running: boolean;
  health: StackHealth;
  last_switch_ts: number;
  last_apply_ts: number;
  current_mode: CurrentMode;
  kiosk_script: string;
  wm_service: string;
  desktop_service: string;
}

export type EnsureMessage = "ready" | "starting" | "applying" | "switch_in_progress";

export interface BusyPayload extends StatusPayload {
  ok: false;
  busy: true;
  changed: false;
  message: "switch_in_progress";
}

export interface EnsurePayload extends StatusPayload {
  ok: boolean;
  busy: false;
  changed: boolean;
  requested_mode: KioskMode;
  applied: boolean;
  mode_ok: boolean;
  mode_msg: string;
  message: Exclude<EnsureMessage, "switch_in_progress">;
}

export interface RestartPayload extends StatusPayload {
  ok: true;
  message: "restarted";
}

export interface FailurePayload {
  ok: false;
  busy?: false;
  changed?: false;
  error: "exception";
  message: string;
}

export type HttpOutcome<T> = { status: number; body: T };
export type EnsureOutcome = HttpOutcome<EnsurePayload | BusyPayload | FailurePayload>;

// Configuration
const millis = z.number().int().nonnegative();

export const ControlConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  supervisorctl: z.array(z.string().min(1)).min(1),
  wmService: z.string().min(1),
  desktopService: z.string(),
  kioskScript: z.string().min(1),
  statusTimeoutMs: millis.min(1),
  controlTimeoutMs: millis.min(1),
  applyTimeoutMs: millis.min(1),
  probeTimeoutMs: millis.min(1),
  stackWaitMs: millis,
  stackPollMs: millis.min(1),
  displayWaitMs: millis,
  displayPollMs: millis.min(1),
  displayReadyCmd: z.string(),
  settleMs: millis,
  display: z.string().min(1),
  logFile: z.string().nullable(),
  debug: z.boolean(),
});

export type ControlConfig = z.infer<typeof ControlConfigSchema>;

export const DEFAULT_CONFIG: ControlConfig = {
  host: "0.0.0.0",
  port: 9001,
  supervisorctl: ["supervisorctl"],
  wmService: DEFAULT_WM_SERVICE,
  desktopService: "none",
  kioskScript: "/data/conf/scripts/kiosk_mode.sh",
  statusTimeoutMs: 5_000,
  controlTimeoutMs: 10_000,
  applyTimeoutMs: 20_000,
  probeTimeoutMs: 3_000,
  stackWaitMs: 8_000,
  stackPollMs: 200,
  displayWaitMs: 6_000,
  displayPollMs: 200,
  displayReadyCmd: "",
  settleMs: 800,
  display: ":0",
  logFile: null,
  debug: false,
};
