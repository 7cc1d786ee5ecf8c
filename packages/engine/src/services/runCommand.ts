import { spawn, type ChildProcess } from "node:child_process";

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export type RunOptions = {
  timeoutMs?: number;
  cwd?: string;
  env?: Record<string, string>;
};

export type CommandRunner = (cmd: readonly string[], opts?: RunOptions) => Promise<CommandResult>;

export const EXIT_NOT_FOUND = 127;
export const EXIT_NOT_EXECUTABLE = 126;
export const EXIT_TIMEOUT = 124;

const DEFAULT_TIMEOUT_MS = 10_000;

function spawnFailureCode(err: Error): number {
  if ("code" in err && err.code === "EACCES") return EXIT_NOT_EXECUTABLE;
  return EXIT_NOT_FOUND;
}

// Kills the child's whole process group so shell-spawned descendants go too.
function killTree(proc: ChildProcess): void {
  try {
    if (proc.pid !== undefined) process.kill(-proc.pid, "SIGKILL");
    else proc.kill("SIGKILL");
  } catch {
    proc.kill("SIGKILL");
  }
}

/**
 * Runs a command to completion and collects its output. Never rejects: a missing
 * binary resolves with code 127, a timeout kills the child's process group and
 * resolves with 124 straight away, keeping whatever output arrived before it.
 */
export function runCommand(cmd: readonly string[], opts: RunOptions = {}): Promise<CommandResult> {
  const [file, ...args] = cmd;
  if (!file) {
    return Promise.resolve({ code: EXIT_NOT_FOUND, stdout: "", stderr: "empty command", timedOut: false });
  }

  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (code: number) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve({ code, stdout, stderr, timedOut });
    };

    let proc: ChildProcess;
    try {
      proc = spawn(file, args, {
        cwd: opts.cwd,
        env: { ...process.env, ...opts.env },
        stdio: ["ignore", "pipe", "pipe"],
        detached: true,
      });
    } catch (err) {
      stderr = err instanceof Error ? err.message : String(err);
      finish(err instanceof Error ? spawnFailureCode(err) : EXIT_NOT_FOUND);
      return;
    }

    timer = setTimeout(() => {
      timedOut = true;
      killTree(proc);
      // A descendant that escaped the group may still hold the pipes.
      proc.stdout?.destroy();
      proc.stderr?.destroy();
      finish(EXIT_TIMEOUT);
    }, opts.timeoutMs ?? DEFAULT_TIMEOUT_MS);

    proc.stdout?.setEncoding("utf8");
    proc.stderr?.setEncoding("utf8");
    proc.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });

    proc.on("error", (err) => {
      if (!stderr) stderr = err.message;
      finish(spawnFailureCode(err));
    });
    proc.on("close", (code) => finish(code ?? 1));
  });
}

/** Binds default options (environment, timeout) to {@link runCommand}. */
export function createCommandRunner(defaults: RunOptions = {}): CommandRunner {
  return (cmd, opts = {}) =>
    runCommand(cmd, {
      ...defaults,
      ...opts,
      env: { ...defaults.env, ...opts.env },
    });
}

export function describeFailure(result: CommandResult): string {
  if (result.timedOut) return "timeout";
  const detail = result.stderr.trim() || result.stdout.trim();
  return detail ? `exit ${result.code}: ${detail}` : `exit ${result.code}`;
}
