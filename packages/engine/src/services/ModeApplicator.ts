import { existsSync } from "node:fs";
import type { ApplyResult, KioskMode } from "@deskmode/core";
import type { Logger } from "../utils/logger.js";
import { nullLogger } from "../utils/logger.js";
import type { CommandRunner } from "./runCommand.js";

export type ModeApplicatorOptions = {
  scriptPath: string;
  run: CommandRunner;
  timeoutMs?: number;
  exists?: (path: string) => boolean;
  logger?: Logger;
};

/** Runs the external kiosk toggle (`<script> on|off`). Its output is diagnostic only. */
export class ModeApplicator {
  readonly scriptPath: string;
  readonly #run: CommandRunner;
  readonly #timeoutMs: number;
  readonly #exists: (path: string) => boolean;
  readonly #logger: Logger;

  constructor(opts: ModeApplicatorOptions) {
    this.scriptPath = opts.scriptPath;
    this.#run = opts.run;
    this.#timeoutMs = opts.timeoutMs ?? 20_000;
    this.#exists = opts.exists ?? existsSync;
    this.#logger = opts.logger ?? nullLogger;
  }

  async applyMode(mode: KioskMode): Promise<ApplyResult> {
    if (!this.#exists(this.scriptPath)) {
      this.#logger.error(`[mode] toggle script not found: ${this.scriptPath}`);
      return { ok: false, message: `missing_script:${this.scriptPath}` };
    }

    const res = await this.#run([this.scriptPath, mode], { timeoutMs: this.#timeoutMs });
    const ok = res.code === 0;
    const failure = res.timedOut ? "timeout" : `exit ${res.code}`;
    const message = res.stdout.trim() || res.stderr.trim() || (ok ? "ok" : failure);
    if (!ok) this.#logger.warn(`[mode] ${mode} failed (${failure}): ${message}`);
    return { ok, message };
  }
}
