import type { Server } from "node:http";
import type { ControlConfig } from "@deskmode/core";
import { childEnv } from "./config.js";
import { createControlServer } from "./http/server.js";
import { ModeReconciler } from "./reconcile/ModeReconciler.js";
import { ModeApplicator } from "./services/ModeApplicator.js";
import { ReadinessProber } from "./services/ReadinessProber.js";
import { createCommandRunner, type CommandRunner } from "./services/runCommand.js";
import { ServiceRegistry } from "./services/ServiceRegistry.js";
import { SupervisorClient } from "./services/SupervisorClient.js";
import { systemClock, type Clock } from "./utils/clock.js";
import { nullLogger, type Logger } from "./utils/logger.js";

export type EngineDeps = {
  run?: CommandRunner;
  clock?: Clock;
  logger?: Logger;
  exists?: (path: string) => boolean;
};

export type Engine = {
  config: ControlConfig;
  registry: ServiceRegistry;
  supervisor: SupervisorClient;
  prober: ReadinessProber;
  applicator: ModeApplicator;
  reconciler: ModeReconciler;
  server: Server;
};

/** Wires every component from one validated config. Nothing is started or bound. */
export function createEngine(config: ControlConfig, deps: EngineDeps = {}): Engine {
  const logger = deps.logger ?? nullLogger;
  const clock = deps.clock ?? systemClock;
  const run = deps.run ?? createCommandRunner({ env: childEnv(config) });

  const registry = new ServiceRegistry({ wmService: config.wmService, desktopService: config.desktopService });
  const supervisor = new SupervisorClient({
    command: config.supervisorctl,
    registry,
    run,
    statusTimeoutMs: config.statusTimeoutMs,
    controlTimeoutMs: config.controlTimeoutMs,
    logger,
  });
  const prober = new ReadinessProber({
    supervisor,
    run,
    stackWaitMs: config.stackWaitMs,
    stackPollMs: config.stackPollMs,
    displayWaitMs: config.displayWaitMs,
    displayPollMs: config.displayPollMs,
    displayReadyCmd: config.displayReadyCmd,
    probeTimeoutMs: config.probeTimeoutMs,
    clock,
    logger,
  });
  const applicator = new ModeApplicator({
    scriptPath: config.kioskScript,
    run,
    timeoutMs: config.applyTimeoutMs,
    exists: deps.exists,
    logger,
  });
  const reconciler = new ModeReconciler({ supervisor, prober, applicator, settleMs: config.settleMs, clock, logger });
  const server = createControlServer({ reconciler, logger });

  return { config, registry, supervisor, prober, applicator, reconciler, server };
}

export { ModeReconciler } from "./reconcile/ModeReconciler.js";
export { routeRequest, parseRequestUrl } from "./http/server.js";
export { controlConfigFromEnv } from "./config.js";
export { createLogger, nullLogger, type Logger } from "./utils/logger.js";
export type { CommandResult, CommandRunner } from "./services/runCommand.js";
