import type { CommandResult, CommandRunner } from "../services/runCommand.js";
import type { Clock } from "../utils/clock.js";

export type FakeDesktopOptions = {
  /** Initial supervisor states, e.g. `{ xfce: "STOPPED" }`. */
  services: Record<string, string>;
  supervisorctl?: string;
  scriptPath?: string;
  /** `supervisorctl status` exits non-zero. */
  statusFails?: boolean;
  /** `start` leaves the service in its current state. */
  startHangs?: boolean;
  toggleExit?: number;
  toggleStdout?: string;
  toggleStderr?: string;
  /** Exit code per probe command line (`"xset q"`); unknown commands exit 127. */
  probes?: Record<string, number>;
  /** Throw from the runner when the joined command line matches. */
  throwOn?: string;
};

function result(code: number, stdout = "", stderr = ""): CommandResult {
  return { code, stdout, stderr, timedOut: false };
}

/** In-process stand-in for supervisorctl, the kiosk toggle script and the display probes. */
export class FakeDesktop {
  readonly services: Record<string, string>;
  readonly calls: string[][] = [];
  readonly opts: FakeDesktopOptions;
  #toggleGate: Promise<void> | null = null;

  constructor(opts: FakeDesktopOptions) {
    this.opts = opts;
    this.services = { ...opts.services };
  }

  get supervisorctl(): string {
    return this.opts.supervisorctl ?? "supervisorctl";
  }

  get scriptPath(): string {
    return this.opts.scriptPath ?? "/opt/kiosk/kiosk_mode.sh";
  }

  /** Blocks the next toggle runs until the returned function is called. */
  holdToggle(): () => void {
    let open: () => void = () => {};
    this.#toggleGate = new Promise<void>((resolve) => {
      open = resolve;
    });
    return () => {
      this.#toggleGate = null;
      open();
    };
  }

  run: CommandRunner = async (cmd) => {
    const argv = [...cmd];
    this.calls.push(argv);
    const line = argv.join(" ");
    if (this.opts.throwOn && line === this.opts.throwOn) throw new Error(`runner exploded on ${line}`);

    const [file, ...args] = argv;
    if (file === this.supervisorctl) return this.#supervisor(args);
    if (file === this.scriptPath) {
      if (this.#toggleGate) await this.#toggleGate;
      return result(this.opts.toggleExit ?? 0, this.opts.toggleStdout ?? "", this.opts.toggleStderr ?? "");
    }
    const probeCode = this.opts.probes?.[line];
    return probeCode === undefined ? result(127, "", `${file}: not found`) : result(probeCode);
  };

  #supervisor(args: string[]): CommandResult {
    const [action, name] = args;
    if (action === "status") {
      if (this.opts.statusFails) return result(1, "", "unix:///var/run/supervisor.sock no such file");
      const out = Object.entries(this.services)
        .map(([svc, state]) => `${svc.padEnd(24)}${state.padEnd(10)}pid 42, uptime 0:01:00`)
        .join("\n");
      return result(0, `${out}\n`);
    }
    if (!name || !(name in this.services)) return result(1, "", `${name ?? ""}: ERROR (no such process)`);
    if (action === "stop") {
      this.services[name] = "STOPPED";
      return result(0, `${name}: stopped`);
    }
    if (action === "start") {
      if (!this.opts.startHangs) this.services[name] = "RUNNING";
      return result(0, `${name}: started`);
    }
    return result(1, "", `unknown action ${action ?? ""}`);
  }

  /** Calls whose joined form starts with `prefix`. */
  callsMatching(prefix: string): string[][] {
    return this.calls.filter((c) => c.join(" ").startsWith(prefix));
  }

  toggles(): string[] {
    return this.calls.filter((c) => c[0] === this.scriptPath).map((c) => c[1] ?? "");
  }
}

export class FakeClock implements Clock {
  current: number;
  readonly sleeps: number[] = [];

  constructor(start = 1_700_000_000_000) {
    this.current = start;
  }

  now = (): number => this.current;

  sleep = async (ms: number): Promise<void> => {
    this.sleeps.push(ms);
    this.current += ms;
  };
}
