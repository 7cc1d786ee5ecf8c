import { describe, it, expect } from "vitest";
import { FakeClock, FakeDesktop } from "../__fixtures__/fake-desktop.js";
import { ModeApplicator } from "../services/ModeApplicator.js";
import { DEFAULT_DISPLAY_PROBES, ReadinessProber } from "../services/ReadinessProber.js";
import { ServiceRegistry } from "../services/ServiceRegistry.js";
import { parseStatusOutput, SupervisorClient } from "../services/SupervisorClient.js";
import type { CommandResult, CommandRunner } from "../services/runCommand.js";

describe("ServiceRegistry", () => {
  it.each([undefined, null, "", "  ", "none", "NONE", "null", "0", "false", " False ", "xfce"])(
    "manages only the window manager when the companion is %j",
    (desktopService) => {
      const registry = new ServiceRegistry({ wmService: "xfce", desktopService });
      expect(registry.startOrder()).toEqual(["xfce"]);
      expect(registry.stopOrder()).toEqual(registry.startOrder());
      expect(registry.describeCompanion()).toBe("none");
    }
  );

  it("starts the companion after the window manager and stops it first", () => {
    const registry = new ServiceRegistry({ wmService: "openbox", desktopService: " pcmanfm " });
    expect(registry.startOrder()).toEqual(["openbox", "pcmanfm"]);
    expect(registry.stopOrder()).toEqual(["pcmanfm", "openbox"]);
    expect(registry.describeCompanion()).toBe("pcmanfm");
  });

  it("hands out copies of its orders", () => {
    const registry = new ServiceRegistry({ wmService: "xfce", desktopService: "panel" });
    registry.startOrder().push("extra");
    registry.stopOrder().length = 0;
    expect(registry.startOrder()).toEqual(["xfce", "panel"]);
    expect(registry.stopOrder()).toEqual(["panel", "xfce"]);
  });
});

describe("parseStatusOutput", () => {
  it("maps the first two fields of each line", () => {
    const out = [
      "xfce                             RUNNING   pid 101, uptime 0:10:02",
      "panel                            FATAL     Exited too quickly",
      "",
      "lonely",
      "  vnc   STOPPED   Not started  ",
    ].join("\n");
    expect(parseStatusOutput(out)).toEqual({ xfce: "RUNNING", panel: "FATAL", vnc: "STOPPED" });
  });
});

describe("SupervisorClient", () => {
  function client(fake: FakeDesktop, desktopService = "none") {
    const registry = new ServiceRegistry({ wmService: "xfce", desktopService });
    return new SupervisorClient({ command: ["supervisorctl"], registry, run: fake.run });
  }

  it("returns an empty snapshot when the status query fails", async () => {
    const fake = new FakeDesktop({ services: { xfce: "RUNNING" }, statusFails: true });
    await expect(client(fake).statusSnapshot()).resolves.toEqual({});
  });

  it("reduces snapshots to a tri-state health", () => {
    const supervisor = client(new FakeDesktop({ services: {} }), "panel");
    expect(supervisor.stackHealth({})).toBe("unknown");
    expect(supervisor.stackHealth({ xfce: "RUNNING", panel: "RUNNING" })).toBe("running");
    expect(supervisor.stackHealth({ xfce: "RUNNING", panel: "STARTING" })).toBe("not_running");
    expect(supervisor.stackHealth({ xfce: "RUNNING", other: "RUNNING" })).toBe("not_running");
  });

  it("fails open when the status channel is empty", async () => {
    const fake = new FakeDesktop({ services: { xfce: "STOPPED" }, statusFails: true });
    await expect(client(fake).stackRunning()).resolves.toBe(true);
    await expect(client(fake).stackRunning({ xfce: "STOPPED" })).resolves.toBe(false);
  });

  it("passes extra control arguments through", async () => {
    const fake = new FakeDesktop({ services: { xfce: "STOPPED" }, supervisorctl: "/usr/bin/supervisorctl" });
    const registry = new ServiceRegistry({ wmService: "xfce" });
    const calls: string[][] = [];
    const run: CommandRunner = (cmd, opts) => {
      calls.push([...cmd, `timeout=${opts?.timeoutMs ?? "none"}`]);
      return fake.run(cmd.filter((c) => c !== "-c" && c !== "/etc/supervisord.conf"), opts);
    };
    const supervisor = new SupervisorClient({
      command: ["/usr/bin/supervisorctl", "-c", "/etc/supervisord.conf"],
      registry,
      run,
      statusTimeoutMs: 1_500,
      controlTimeoutMs: 4_000,
    });

    await expect(supervisor.start("xfce")).resolves.toEqual({ ok: true, reason: "xfce: started" });
    await expect(supervisor.statusSnapshot()).resolves.toEqual({ xfce: "RUNNING" });
    expect(calls).toEqual([
      ["/usr/bin/supervisorctl", "-c", "/etc/supervisord.conf", "start", "xfce", "timeout=4000"],
      ["/usr/bin/supervisorctl", "-c", "/etc/supervisord.conf", "status", "timeout=1500"],
    ]);
  });

  it("reports control failures with their reason", async () => {
    const fake = new FakeDesktop({ services: { xfce: "RUNNING" } });
    await expect(client(fake).stop("ghost")).resolves.toEqual({
      ok: false,
      reason: "exit 1: ghost: ERROR (no such process)",
    });
  });

  it("labels services missing from the snapshot as UNKNOWN", () => {
    const supervisor = client(new FakeDesktop({ services: {} }), "panel");
    expect(supervisor.serviceStates({ xfce: "RUNNING" })).toEqual({ xfce: "RUNNING", panel: "UNKNOWN" });
  });
});

describe("ReadinessProber", () => {
  function prober(run: CommandRunner, clock: FakeClock, displayReadyCmd = "") {
    const registry = new ServiceRegistry({ wmService: "xfce" });
    const supervisor = new SupervisorClient({ command: ["supervisorctl"], registry, run });
    return new ReadinessProber({
      supervisor,
      run,
      stackWaitMs: 1_000,
      stackPollMs: 250,
      displayWaitMs: 500,
      displayPollMs: 100,
      displayReadyCmd,
      clock,
    });
  }

  it("falls back to the next probe when the first is not installed", async () => {
    const fake = new FakeDesktop({ services: {}, probes: { xdpyinfo: 0 } });
    const result = await prober(fake.run, new FakeClock()).waitDisplayReady();
    expect(result).toEqual({ ok: true, reason: "display ready (xdpyinfo)" });
    expect(fake.calls).toEqual([["xset", "q"], ["xdpyinfo"]]);
  });

  it("runs a configured readiness command through the shell instead of the defaults", async () => {
    const fake = new FakeDesktop({ services: {}, probes: { "/bin/sh -lc xwininfo -root": 0 } });
    const result = await prober(fake.run, new FakeClock(), "xwininfo -root").waitDisplayReady();
    expect(result.ok).toBe(true);
    expect(fake.calls).toEqual([["/bin/sh", "-lc", "xwininfo -root"]]);
  });

  it("gives up on the display after the wait budget", async () => {
    const fake = new FakeDesktop({ services: {} });
    const clock = new FakeClock();
    const result = await prober(fake.run, clock).waitDisplayReady();
    expect(result).toEqual({ ok: false, reason: "display not ready after 500ms" });
    expect(clock.sleeps).toEqual([100, 100, 100, 100, 100]);
    expect(fake.calls).toHaveLength(5 * DEFAULT_DISPLAY_PROBES.length);
  });

  it("polls the supervisor until the stack is running", async () => {
    const fake = new FakeDesktop({ services: { xfce: "STARTING" } });
    let polls = 0;
    const run: CommandRunner = (cmd, opts) => {
      if (cmd[1] === "status" && ++polls === 3) fake.services.xfce = "RUNNING";
      return fake.run(cmd, opts);
    };
    const clock = new FakeClock();

    const result = await prober(run, clock).waitStackReady();

    expect(result).toEqual({ ok: true, reason: "stack running" });
    expect(polls).toBe(3);
    expect(clock.sleeps).toEqual([250, 250]);
  });

  it("reports a stack that never comes up", async () => {
    const fake = new FakeDesktop({ services: { xfce: "BACKOFF" } });
    const clock = new FakeClock();
    const result = await prober(fake.run, clock).waitStackReady();
    expect(result).toEqual({ ok: false, reason: "stack not running after 1000ms" });
    expect(clock.sleeps).toEqual([250, 250, 250, 250]);
  });
});

describe("ModeApplicator", () => {
  function applicator(res: CommandResult, exists = true) {
    const calls: string[][] = [];
    const app = new ModeApplicator({
      scriptPath: "/opt/kiosk/kiosk_mode.sh",
      run: async (cmd) => {
        calls.push([...cmd]);
        return res;
      },
      exists: () => exists,
    });
    return { app, calls };
  }

  it("fails fast when the script is missing", async () => {
    const { app, calls } = applicator({ code: 0, stdout: "", stderr: "", timedOut: false }, false);
    await expect(app.applyMode("on")).resolves.toEqual({ ok: false, message: "missing_script:/opt/kiosk/kiosk_mode.sh" });
    expect(calls).toEqual([]);
  });

  it("prefers stdout, then stderr, then ok", async () => {
    const a = applicator({ code: 0, stdout: " applied on \n", stderr: "warn", timedOut: false });
    await expect(a.app.applyMode("on")).resolves.toEqual({ ok: true, message: "applied on" });
    expect(a.calls).toEqual([["/opt/kiosk/kiosk_mode.sh", "on"]]);

    const b = applicator({ code: 1, stdout: "  ", stderr: "no xfconf\n", timedOut: false });
    await expect(b.app.applyMode("off")).resolves.toEqual({ ok: false, message: "no xfconf" });

    const c = applicator({ code: 0, stdout: "", stderr: "", timedOut: false });
    await expect(c.app.applyMode("off")).resolves.toEqual({ ok: true, message: "ok" });
  });

  it("treats a timed out toggle as a failure", async () => {
    const { app } = applicator({ code: 124, stdout: "", stderr: "", timedOut: true });
    await expect(app.applyMode("on")).resolves.toEqual({ ok: false, message: "timeout" });
  });

  it("reports the exit code when a failing toggle prints nothing", async () => {
    const { app } = applicator({ code: 2, stdout: "", stderr: " \n", timedOut: false });
    await expect(app.applyMode("off")).resolves.toEqual({ ok: false, message: "exit 2" });
  });
});
