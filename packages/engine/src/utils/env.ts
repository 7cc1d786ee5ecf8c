import { existsSync, readFileSync } from "node:fs";

export function envString(key: string): string | undefined {
  const raw = process.env[key];
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  return trimmed ? trimmed : undefined;
}

export function envNumber(key: string, defaultValue: number): number;
export function envNumber(key: string, defaultValue?: number): number | undefined;
export function envNumber(key: string, defaultValue?: number): number | undefined {
  const raw = envString(key);
  if (!raw) return defaultValue;
  const n = Number(raw);
  return Number.isFinite(n) ? n : defaultValue;
}

export function envBool(key: string, defaultValue = false): boolean {
  const raw = envString(key);
  if (!raw) return defaultValue;
  const normalized = raw.toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "n", "off"].includes(normalized)) return false;
  return defaultValue;
}

/**
 * Parses `KEY=value` lines (optionally prefixed with `export `). Blank lines and
 * `#` comments are skipped; one level of matching quotes is stripped.
 */
export function parseEnvText(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of text.split(/\r?\n/)) {
    let trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    if (trimmed.startsWith("export ")) trimmed = trimmed.slice(7).trim();
    const eq = trimmed.indexOf("=");
    if (eq <= 0) continue;
    const key = trimmed.slice(0, eq).trim();
    let value = trimmed.slice(eq + 1).trim();
    if (!key || key.includes(" ")) continue;
    if (
      value.length >= 2 &&
      ((value.startsWith("\"") && value.endsWith("\"")) || (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }
    out[key] = value;
  }
  return out;
}

/** Loads an env file into `process.env`. Variables that are already set win. Returns the keys applied. */
export function loadEnvFile(envPath: string): string[] {
  if (!existsSync(envPath)) return [];
  const applied: string[] = [];
  const parsed = parseEnvText(readFileSync(envPath, "utf8"));
  for (const [key, value] of Object.entries(parsed)) {
    if (process.env[key] !== undefined) continue;
    process.env[key] = value;
    applied.push(key);
  }
  return applied;
}
