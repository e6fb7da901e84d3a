import type { Config } from "../../config.mjs";

export function aFakeConfigWith(config: Partial<Config> = {}): Config {
  return {
    MODE: "development",
    DISCORD_TOKEN: "DISCORD_TOKEN",
    RIOT_API_KEY: "RIOT_API_KEY",
    MONGODB_URI: "mongodb://localhost:27017",
    MONGODB_DATABASE: "stat-summoner-test",
    FOLLOW_POLL_INTERVAL_MINUTES: 2,
    REQUEST_TIMEOUT_MS: 5000,
    SENTRY_DSN: undefined,
    ...config,
  };
}
