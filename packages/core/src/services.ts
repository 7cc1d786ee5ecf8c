export const DEFAULT_WM_SERVICE = "xfce";

// Companion values that mean "no companion service".
export const DISABLED_SERVICE_SENTINELS = ["none", "null", "0", "false"] as const;

export const KNOWN_SERVICE_STATES = ["RUNNING", "STOPPED", "STARTING", "STOPPING", "BACKOFF", "EXITED", "FATAL", "UNKNOWN"] as const;
export type KnownServiceState = (typeof KNOWN_SERVICE_STATES)[number];

// Supervisors may report states we do not know about; keep the raw value.
export type ServiceRunState = KnownServiceState | (string & {});

/** Service name -> state, as reported by one status query. Empty when the query failed. */
export type StackStatus = Record<string, ServiceRunState>;

/**
 * Reduced view of a {@link StackStatus}:
 * - `running`: every managed service reports RUNNING
 * - `not_running`: at least one managed service reports something else
 * - `unknown`: the status channel returned nothing
 *
 * `unknown` is treated as running by the reconciler so a flaky status channel
 * does not trigger restarts.
 */
export type StackHealth = "running" | "not_running" | "unknown";

export function isStackUp(health: StackHealth): boolean {
  return health !== "not_running";
}

export function isDisabledServiceName(value: string | null | undefined): boolean {
  const trimmed = (value ?? "").trim();
  if (!trimmed) return true;
  return (DISABLED_SERVICE_SENTINELS as readonly string[]).includes(trimmed.toLowerCase());
}
