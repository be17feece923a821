export interface OperatorConfig {
  namespace: string;
  httpPort: number;
  workers: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  orphanSweepIntervalMinutes: number;
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

/**
 * Read operator settings from the environment (after dotenv has loaded .env)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): OperatorConfig {
  const config: OperatorConfig = {
    namespace: env.NAMESPACE || "default",
    httpPort: readInteger(env, "HTTP_PORT", 8080, 0),
    workers: readInteger(env, "WORKERS", 2, 1),
    retryBaseDelayMs: readInteger(env, "RETRY_BASE_DELAY_MS", 5, 1),
    retryMaxDelayMs: readInteger(env, "RETRY_MAX_DELAY_MS", 1_000_000, 1),
    orphanSweepIntervalMinutes: readInteger(
      env,
      "ORPHAN_SWEEP_INTERVAL_MINUTES",
      0,
      0,
    ),
  };
  if (config.retryMaxDelayMs < config.retryBaseDelayMs) {
    throw new Error("RETRY_MAX_DELAY_MS must not be smaller than RETRY_BASE_DELAY_MS");
  }
  return config;
}
