import { LIVE_TRADING_ACK } from "../constants/broker.constants";

export type EnvSource = Record<string, string | undefined>;

/**
 * Read an env var, accepting the lower-case spelling as a fallback
 */
export function readEnv(env: EnvSource, key: string): string | undefined {
  const value = env[key] ?? env[key.toLowerCase()];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

export function envStr(env: EnvSource, key: string, fallback: string): string {
  return readEnv(env, key) ?? fallback;
}

/**
 * Live trading is enabled only when LIVE_TRADING is exactly the acknowledgement string
 */
export function isLiveTradingEnabled(env: EnvSource): boolean {
  return readEnv(env, "LIVE_TRADING") === LIVE_TRADING_ACK;
}

/**
 * Parse `--key=value`, `--key value` and bare `--flag` arguments.
 * Keys are upper-cased with dashes turned into underscores.
 */
export function parseCliOverrides(argv: string[]): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) continue;
    const eq = arg.indexOf("=");
    const rawKey = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    const key = rawKey.toUpperCase().replace(/-/g, "_");
    if (eq >= 0) {
      overrides[key] = arg.slice(eq + 1);
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      overrides[key] = next;
      i += 1;
    } else {
      overrides[key] = "true";
    }
  }
  return overrides;
}
