export type ApiConfig = {
  port: number;
  allowPortFallback: boolean;
  rateLimitWindowMs: number;
  rateLimitMax: number;
  maxBatchSize: number;
};

type Env = Record<string, string | undefined>;

const DEFAULT_PORT = 3000;
const DEFAULT_RATE_LIMIT_WINDOW_MS = 60 * 1000;
const DEFAULT_RATE_LIMIT_MAX = 120;
const DEFAULT_MAX_BATCH = 32;

const parsePositiveInt = (env: Env, name: string, fallback: number) => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}".`);
  }
  return value;
};

export const loadApiConfig = (env: Env = process.env): ApiConfig => {
  const port = parsePositiveInt(env, "PORT", DEFAULT_PORT);
  return {
    port,
    // only hop to the next free port when no port was pinned, or outside production
    allowPortFallback:
      !env.PORT || (env.NODE_ENV !== undefined && env.NODE_ENV !== "production"),
    rateLimitWindowMs: parsePositiveInt(
      env,
      "TIMING_RATE_LIMIT_WINDOW_MS",
      DEFAULT_RATE_LIMIT_WINDOW_MS
    ),
    rateLimitMax: parsePositiveInt(env, "TIMING_RATE_LIMIT_MAX", DEFAULT_RATE_LIMIT_MAX),
    maxBatchSize: parsePositiveInt(env, "TIMING_MAX_BATCH", DEFAULT_MAX_BATCH),
  };
};
