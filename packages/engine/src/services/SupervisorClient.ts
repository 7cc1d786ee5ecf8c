import type { ServiceRunState, StackHealth, StackStatus, StepResult } from "@deskmode/core";
import { isStackUp } from "@deskmode/core";
import type { Logger } from "../utils/logger.js";
import { nullLogger } from "../utils/logger.js";
import { describeFailure, type CommandRunner } from "./runCommand.js";
import type { ServiceRegistry } from "./ServiceRegistry.js";

export type SupervisorClientOptions = {
  /** Control command plus any fixed arguments, e.g. `["supervisorctl", "-c", "/etc/supervisord.conf"]`. */
  command: readonly string[];
  registry: ServiceRegistry;
  run: CommandRunner;
  statusTimeoutMs?: number;
  controlTimeoutMs?: number;
  logger?: Logger;
};

/** Parses `supervisorctl status` output: first field is the name, second the state. */
export function parseStatusOutput(output: string): StackStatus {
  const status: StackStatus = {};
  for (const line of output.split(/\r?\n/)) {
    const parts = line.trim().split(/\s+/);
    const [name, state] = parts;
    if (!name || !state) continue;
    status[name] = state;
  }
  return status;
}

export class SupervisorClient {
  readonly #command: readonly string[];
  readonly #registry: ServiceRegistry;
  readonly #run: CommandRunner;
  readonly #statusTimeoutMs: number;
  readonly #controlTimeoutMs: number;
  readonly #logger: Logger;

  constructor(opts: SupervisorClientOptions) {
    if (opts.command.length === 0) throw new Error("SupervisorClient requires a control command.");
    this.#command = opts.command;
    this.#registry = opts.registry;
    this.#run = opts.run;
    this.#statusTimeoutMs = opts.statusTimeoutMs ?? 5_000;
    this.#controlTimeoutMs = opts.controlTimeoutMs ?? 10_000;
    this.#logger = opts.logger ?? nullLogger;
  }

  get registry(): ServiceRegistry {
    return this.#registry;
  }

  /** Current state of every supervised service. `{}` when the status query fails. */
  async statusSnapshot(): Promise<StackStatus> {
    const res = await this.#run([...this.#command, "status"], { timeoutMs: this.#statusTimeoutMs });
    if (res.code !== 0) {
      this.#logger.warn(`[supervisor] status query failed (${describeFailure(res)})`);
      return {};
    }
    return parseStatusOutput(res.stdout);
  }

  start(name: string): Promise<StepResult> {
    return this.#control("start", name);
  }

  stop(name: string): Promise<StepResult> {
    return this.#control("stop", name);
  }

  async #control(action: "start" | "stop", name: string): Promise<StepResult> {
    const res = await this.#run([...this.#command, action, name], { timeoutMs: this.#controlTimeoutMs });
    if (res.code === 0) {
      return { ok: true, reason: res.stdout.trim() || `${action === "start" ? "started" : "stopped"} ${name}` };
    }
    const reason = describeFailure(res);
    this.#logger.warn(`[supervisor] ${action} ${name} failed (${reason})`);
    return { ok: false, reason };
  }

  stackHealth(snapshot: StackStatus): StackHealth {
    if (Object.keys(snapshot).length === 0) return "unknown";
    const allRunning = this.#registry.startOrder().every((name) => snapshot[name] === "RUNNING");
    return allRunning ? "running" : "not_running";
  }

  /** Fail-open: an empty snapshot (status channel unavailable) counts as running. */
  async stackRunning(snapshot?: StackStatus): Promise<boolean> {
    return isStackUp(this.stackHealth(snapshot ?? (await this.statusSnapshot())));
  }

  serviceStates(snapshot: StackStatus): Record<string, ServiceRunState> {
    const states: Record<string, ServiceRunState> = {};
    for (const name of this.#registry.startOrder()) {
      states[name] = snapshot[name] ?? "UNKNOWN";
    }
    return states;
  }
}
