import {
  isStackUp,
  modeFor,
  type BusyPayload,
  type EnsureOutcome,
  type EnsurePayload,
  type HttpOutcome,
  type KioskMode,
  type ModeState,
  type RestartPayload,
  type StatusPayload,
  type StepResult,
} from "@deskmode/core";
import type { ModeApplicator } from "../services/ModeApplicator.js";
import type { ReadinessProber } from "../services/ReadinessProber.js";
import type { SupervisorClient } from "../services/SupervisorClient.js";
import { epochSeconds, systemClock, type Clock } from "../utils/clock.js";
import type { Logger } from "../utils/logger.js";
import { nullLogger } from "../utils/logger.js";
import { SwitchLock } from "./SwitchLock.js";

export type StackAction = "start" | "restart";

export type EnsureModeRequest = {
  force: boolean;
  wantKiosk: boolean;
};

export type ModeReconcilerOptions = {
  supervisor: SupervisorClient;
  prober: ReadinessProber;
  applicator: ModeApplicator;
  /** Pause after a successful apply so the desktop finishes redrawing before we report. */
  settleMs: number;
  clock?: Clock;
  logger?: Logger;
};

/**
 * Owns the desktop's mode state and converges it on request.
 *
 * Only {@link ensureMode} mutates {@link ModeState}, and only while holding the
 * switch lock. A mode is applied when forced, after the stack was (re)started,
 * or when the remembered mode differs from the requested one; otherwise the
 * apply is skipped so polling clients do not make the desktop flicker.
 */
export class ModeReconciler {
  readonly #supervisor: SupervisorClient;
  readonly #prober: ReadinessProber;
  readonly #applicator: ModeApplicator;
  readonly #settleMs: number;
  readonly #clock: Clock;
  readonly #logger: Logger;
  readonly #lock = new SwitchLock();

  #mode: ModeState = { currentMode: "unknown", lastApplyTs: 0 };
  #lastSwitchTs = 0;

  constructor(opts: ModeReconcilerOptions) {
    this.#supervisor = opts.supervisor;
    this.#prober = opts.prober;
    this.#applicator = opts.applicator;
    this.#settleMs = opts.settleMs;
    this.#clock = opts.clock ?? systemClock;
    this.#logger = opts.logger ?? nullLogger;
  }

  modeState(): Readonly<ModeState> {
    return { ...this.#mode };
  }

  get lastSwitchTs(): number {
    return this.#lastSwitchTs;
  }

  get busy(): boolean {
    return this.#lock.held;
  }

  // Read without the lock; may show a run in progress.
  async status(): Promise<StatusPayload> {
    const registry = this.#supervisor.registry;
    const snapshot = await this.#supervisor.statusSnapshot();
    const health = this.#supervisor.stackHealth(snapshot);
    return {
      services: this.#supervisor.serviceStates(snapshot),
      running: isStackUp(health),
      health,
      last_switch_ts: this.#lastSwitchTs,
      last_apply_ts: this.#mode.lastApplyTs,
      current_mode: this.#mode.currentMode,
      kiosk_script: this.#applicator.scriptPath,
      wm_service: registry.wmService,
      desktop_service: registry.describeCompanion(),
    };
  }

  async ensureMode(req: EnsureModeRequest): Promise<EnsureOutcome> {
    const release = this.#lock.tryAcquire();
    try {
      if (!release) {
        this.#logger.info(`[reconcile] busy, rejecting ${modeFor(req.wantKiosk)} request`);
        return await this.#busyOutcome();
      }
      return await this.#reconcile(req);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.#logger.error(`[reconcile] unexpected failure: ${message}`);
      return { status: 500, body: { ok: false, busy: false, changed: false, error: "exception", message } };
    } finally {
      release?.();
    }
  }

  /** Stops and starts every service regardless of state or lock. Mode memory is left alone. */
  async restartStack(): Promise<HttpOutcome<RestartPayload>> {
    this.#logger.info("[reconcile] restart requested");
    await this.#runStack("restart");
    const payload: RestartPayload = { ...(await this.status()), ok: true, message: "restarted" };
    return { status: 200, body: payload };
  }

  async #busyOutcome(): Promise<EnsureOutcome> {
    const body: BusyPayload = {
      ...(await this.status()),
      ok: false,
      busy: true,
      changed: false,
      message: "switch_in_progress",
    };
    return { status: 202, body };
  }

  async #reconcile({ force, wantKiosk }: EnsureModeRequest): Promise<EnsureOutcome> {
    const desired = modeFor(wantKiosk);
    const snapshot = await this.#supervisor.statusSnapshot();
    const running = await this.#supervisor.stackRunning(snapshot);

    let restarted = false;
    if (force || !running) {
      const action: StackAction = force ? "restart" : "start";
      this.#logger.info(`[reconcile] ${action} stack (force=${force}, running=${running})`);
      const stack = await this.#runStack(action);
      restarted = true;
      this.#lastSwitchTs = epochSeconds(this.#clock.now());
      if (stack.ok) {
        const display = await this.#prober.waitDisplayReady();
        if (!display.ok) this.#logger.warn(`[reconcile] continuing without display: ${display.reason}`);
      }
    }

    const applyNeeded = force || restarted || this.#mode.currentMode !== desired;
    let modeOk = true;
    let modeMsg = "skipped";
    if (applyNeeded) {
      ({ ok: modeOk, message: modeMsg } = await this.#apply(desired));
    } else {
      this.#logger.info(`[reconcile] mode already ${desired}, skipping apply`);
    }

    const status = await this.status();
    const ok = status.running && modeOk && this.#mode.currentMode === desired;
    const body: EnsurePayload = {
      ...status,
      ok,
      busy: false,
      changed: restarted,
      requested_mode: desired,
      applied: applyNeeded,
      mode_ok: modeOk,
      mode_msg: modeMsg,
      message: ok ? "ready" : status.running ? "applying" : "starting",
    };
    return { status: ok ? 200 : 202, body };
  }

  async #apply(mode: KioskMode) {
    const result = await this.#applicator.applyMode(mode);
    if (!result.ok) {
      this.#logger.warn(`[reconcile] apply ${mode} failed: ${result.message}`);
      return result;
    }
    this.#mode = { currentMode: mode, lastApplyTs: epochSeconds(this.#clock.now()) };
    this.#logger.info(`[reconcile] applied ${mode}`);
    if (this.#settleMs > 0) await this.#clock.sleep(this.#settleMs);
    return result;
  }

  async #runStack(action: StackAction): Promise<StepResult> {
    const registry = this.#supervisor.registry;
    if (action === "restart") {
      for (const name of registry.stopOrder()) await this.#supervisor.stop(name);
    }
    for (const name of registry.startOrder()) await this.#supervisor.start(name);
    return this.#prober.waitStackReady();
  }
}
