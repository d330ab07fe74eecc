import { PortSchema, UnsignedIntegerSchema } from "@quotdd/contracts";

export interface AppConfig {
  port: number;
  host: string;
  quotesFile?: string;
  rateLimitThreshold: number;
  rateLimitDecay: number;
  decayIntervalSec: number;
  connectionTimeoutMs: number;
  maxConnections: number;
  failFast: boolean;
  statusPort?: number;
  logLevel: string;
}

type Env = Record<string, string | undefined>;

function portEnv(env: Env, name: string): number | undefined {
  const value = env[name];
  if (value === undefined) {
    return undefined;
  }
  const parsed = PortSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid port passed in ${name}: ${value}`);
  }
  return parsed.data;
}

function integerEnv(env: Env, name: string, fallback: number, min: number): number {
  const value = env[name];
  if (!value) {
    return fallback;
  }
  const parsed = UnsignedIntegerSchema.safeParse(value);
  if (!parsed.success || parsed.data < min) {
    throw new Error(`Invalid numeric env var ${name}: ${value}`);
  }
  return parsed.data;
}

function booleanEnv(env: Env, name: string, fallback: boolean): boolean {
  const value = env[name];
  if (!value) {
    return fallback;
  }
  switch (value.toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
      return false;
    default:
      throw new Error(`Invalid boolean env var ${name}: ${value}`);
  }
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: portEnv(env, "QUOTDD_PORT") ?? 17,
    host: env.QUOTDD_HOST ?? "0.0.0.0",
    quotesFile: env.QUOTDD_QUOTES_FILE || undefined,
    rateLimitThreshold: integerEnv(env, "QUOTDD_RATE_LIMIT", 10, 1),
    rateLimitDecay: integerEnv(env, "QUOTDD_RATE_DECAY", 10, 1),
    decayIntervalSec: integerEnv(env, "QUOTDD_DECAY_INTERVAL_SEC", 60, 1),
    connectionTimeoutMs: integerEnv(env, "QUOTDD_CONNECTION_TIMEOUT_MS", 30_000, 0),
    maxConnections: integerEnv(env, "QUOTDD_MAX_CONNECTIONS", 256, 1),
    failFast: booleanEnv(env, "QUOTDD_FAIL_FAST", false),
    statusPort: portEnv(env, "QUOTDD_STATUS_PORT"),
    logLevel: env.LOG_LEVEL ?? "info",
  };
}
