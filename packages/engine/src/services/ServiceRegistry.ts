import { isDisabledServiceName } from "@deskmode/core";

export type ServiceRegistryConfig = {
  wmService: string;
  desktopService?: string | null;
};

/** Ordered set of supervised services: window manager first, optional companion second. */
export class ServiceRegistry {
  readonly wmService: string;
  #companion: string | null;
  #startOrder: readonly string[];

  constructor(config: ServiceRegistryConfig) {
    this.wmService = config.wmService.trim();
    const companion = (config.desktopService ?? "").trim();
    this.#companion = isDisabledServiceName(companion) || companion === this.wmService ? null : companion;
    this.#startOrder = this.#companion ? [this.wmService, this.#companion] : [this.wmService];
  }

  /** Label used in status payloads. */
  describeCompanion(): string {
    return this.#companion ?? "none";
  }

  startOrder(): string[] {
    return [...this.#startOrder];
  }

  stopOrder(): string[] {
    return [...this.#startOrder].reverse();
  }
}
