import dotenv from "dotenv";
import {
  DEFAULT_DEVICE_LIST_INTERVAL_MS,
  DEFAULT_POLL_INTERVAL_MS,
} from "./coordinator.ts";
import { DEFAULT_DAILY_QUOTA } from "./governor.ts";
import { DEFAULT_API_BASE } from "./transport/http.ts";

export interface AppConfig {
  env: string;
  isProd: boolean;
  sentryDsn?: string;
  apiKey?: string;
  apiBase: string;
  /** Diagnostics export served instead of the cloud API */
  fixtureFile?: string;
  pollIntervalMs: number;
  deviceListIntervalMs: number;
  requestTimeoutMs: number;
  dailyQuota: number;
  quotaReserve: number;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
const DEFAULT_QUOTA_RESERVE = 100;

const raise = (message: string): never => {
  throw new Error(message);
};

const optString = (env: NodeJS.ProcessEnv, name: string): string | undefined =>
  env[name]?.trim() || undefined;

const intEnvironment = (
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number
): number => {
  const value = optString(env, name);
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    return raise(
      `Invalid environment variable ${name}: expected an integer >= ${min}, got "${value}"`
    );
  }
  return parsed;
};

const secondsEnvironment = (
  env: NodeJS.ProcessEnv,
  name: string,
  fallbackMs: number
): number => intEnvironment(env, name, fallbackMs / 1000, 1) * 1000;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  dotenv.config();

  const nodeEnv = (env.NODE_ENV || "production").toLowerCase();
  const fixtureFile = optString(env, "GOVEE_FIXTURE_FILE");
  const apiKey =
    optString(env, "GOVEE_API_KEY") ??
    (fixtureFile
      ? undefined
      : raise("Missing required environment variable: GOVEE_API_KEY"));

  const dailyQuota = intEnvironment(
    env,
    "DAILY_QUOTA",
    DEFAULT_DAILY_QUOTA,
    1
  );
  const quotaReserve = intEnvironment(
    env,
    "QUOTA_RESERVE",
    Math.min(DEFAULT_QUOTA_RESERVE, dailyQuota),
    0
  );
  if (quotaReserve > dailyQuota) {
    raise(
      `Invalid environment variable QUOTA_RESERVE: ${quotaReserve} exceeds DAILY_QUOTA ${dailyQuota}`
    );
  }

  return {
    env: nodeEnv,
    isProd: nodeEnv === "production",
    sentryDsn: optString(env, "SENTRY_DSN"),
    apiKey,
    apiBase: optString(env, "GOVEE_API_BASE") ?? DEFAULT_API_BASE,
    fixtureFile,
    pollIntervalMs: secondsEnvironment(
      env,
      "POLL_INTERVAL",
      DEFAULT_POLL_INTERVAL_MS
    ),
    deviceListIntervalMs: secondsEnvironment(
      env,
      "DEVICE_LIST_INTERVAL",
      DEFAULT_DEVICE_LIST_INTERVAL_MS
    ),
    requestTimeoutMs: secondsEnvironment(
      env,
      "REQUEST_TIMEOUT",
      DEFAULT_REQUEST_TIMEOUT_MS
    ),
    dailyQuota,
    quotaReserve,
  };
}
