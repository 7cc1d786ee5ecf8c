import type { StepResult } from "@deskmode/core";
import { systemClock, type Clock } from "../utils/clock.js";
import type { Logger } from "../utils/logger.js";
import { nullLogger } from "../utils/logger.js";
import type { CommandRunner } from "./runCommand.js";
import type { SupervisorClient } from "./SupervisorClient.js";

// Tried in order on every tick when no custom readiness command is configured.
export const DEFAULT_DISPLAY_PROBES: readonly (readonly string[])[] = [["xset", "q"], ["xdpyinfo"]];

export type ReadinessProberOptions = {
  supervisor: SupervisorClient;
  run: CommandRunner;
  stackWaitMs: number;
  stackPollMs: number;
  displayWaitMs: number;
  displayPollMs: number;
  /** Shell snippet run via `/bin/sh -lc`; empty means use {@link DEFAULT_DISPLAY_PROBES}. */
  displayReadyCmd?: string;
  probeTimeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
};

export class ReadinessProber {
  readonly #opts: ReadinessProberOptions;
  readonly #clock: Clock;
  readonly #logger: Logger;

  constructor(opts: ReadinessProberOptions) {
    this.#opts = opts;
    this.#clock = opts.clock ?? systemClock;
    this.#logger = opts.logger ?? nullLogger;
  }

  async waitStackReady(maxWaitMs = this.#opts.stackWaitMs): Promise<StepResult> {
    const { supervisor } = this.#opts;
    const ready = await this.#poll(maxWaitMs, this.#opts.stackPollMs, async () =>
      supervisor.stackRunning(await supervisor.statusSnapshot())
    );
    if (ready) return { ok: true, reason: "stack running" };
    this.#logger.warn(`[readiness] stack not running after ${maxWaitMs}ms`);
    return { ok: false, reason: `stack not running after ${maxWaitMs}ms` };
  }

  async waitDisplayReady(maxWaitMs = this.#opts.displayWaitMs): Promise<StepResult> {
    const custom = this.#opts.displayReadyCmd?.trim();
    const probes: readonly (readonly string[])[] = custom ? [["/bin/sh", "-lc", custom]] : DEFAULT_DISPLAY_PROBES;

    let winner = "";
    const ready = await this.#poll(maxWaitMs, this.#opts.displayPollMs, async () => {
      for (const probe of probes) {
        // A probe that is not installed resolves with a non-zero code, same as any failure.
        const res = await this.#opts.run(probe, { timeoutMs: this.#opts.probeTimeoutMs ?? 3_000 });
        if (res.code === 0) {
          winner = probe.join(" ");
          return true;
        }
      }
      return false;
    });

    if (ready) return { ok: true, reason: `display ready (${winner})` };
    this.#logger.warn(`[readiness] display not ready after ${maxWaitMs}ms`);
    return { ok: false, reason: `display not ready after ${maxWaitMs}ms` };
  }

  async #poll(maxWaitMs: number, pollMs: number, check: () => Promise<boolean>): Promise<boolean> {
    const deadline = this.#clock.now() + maxWaitMs;
    while (this.#clock.now() < deadline) {
      if (await check()) return true;
      await this.#clock.sleep(pollMs);
    }
    return false;
  }
}
