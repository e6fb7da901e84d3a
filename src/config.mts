import { Preconditions } from "./base/preconditions.mjs";

export type Mode = "development" | "production";

export interface Config {
  readonly MODE: Mode;
  readonly DISCORD_TOKEN: string;
  readonly RIOT_API_KEY: string;
  readonly MONGODB_URI: string;
  readonly MONGODB_DATABASE: string;
  readonly FOLLOW_POLL_INTERVAL_MINUTES: number;
  readonly REQUEST_TIMEOUT_MS: number;
  readonly SENTRY_DSN: string | undefined;
}

type RawEnv = Readonly<Record<string, string | undefined>>;

const DEFAULT_DATABASE = "stat-summoner";
const DEFAULT_POLL_INTERVAL_MINUTES = 2;
const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

function readRequired(env: RawEnv, key: string): string {
  const value = Preconditions.checkExists(env[key], `${key} is required`);
  Preconditions.checkArgument(value.trim() !== "", `${key} is required`);

  return value;
}

function readPositiveNumber(env: RawEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw == null || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw);
  Preconditions.checkArgument(Number.isFinite(value) && value > 0, `${key} must be a positive number, got "${raw}"`);

  return value;
}

function readMode(env: RawEnv): Mode {
  const mode = env["MODE"] ?? "development";
  switch (mode) {
    case "development":
    case "production": {
      return mode;
    }
    default: {
      throw new Error(`MODE must be "development" or "production", got "${mode}"`);
    }
  }
}

export function loadConfig(env: RawEnv = process.env): Config {
  const sentryDsn = env["SENTRY_DSN"];

  return Object.freeze({
    MODE: readMode(env),
    DISCORD_TOKEN: readRequired(env, "DISCORD_TOKEN"),
    RIOT_API_KEY: readRequired(env, "RIOT_API_KEY"),
    MONGODB_URI: readRequired(env, "MONGODB_URI"),
    MONGODB_DATABASE: env["MONGODB_DATABASE"] ?? DEFAULT_DATABASE,
    FOLLOW_POLL_INTERVAL_MINUTES: readPositiveNumber(env, "FOLLOW_POLL_INTERVAL_MINUTES", DEFAULT_POLL_INTERVAL_MINUTES),
    REQUEST_TIMEOUT_MS: readPositiveNumber(env, "REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS),
    SENTRY_DSN: sentryDsn != null && sentryDsn !== "" ? sentryDsn : undefined,
  });
}
