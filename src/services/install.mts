import type { MongoClient } from "mongodb";
import type { Config } from "../config.mjs";
import { DatabaseService } from "./database/database.mjs";
import type { FollowedPlayerDocument } from "./database/types/followed_player.mjs";
import { FOLLOWED_PLAYERS_COLLECTION } from "./database/types/followed_player.mjs";
import { DiscordService } from "./discord/discord.mjs";
import { FollowService } from "./follow/follow.mjs";
import { FollowTrackerService } from "./follow-tracker/follow-tracker.mjs";
import type { LogService } from "./log/types.mjs";
import { AggregatorClient } from "./log/aggregator-client.mjs";
import { ConsoleLogClient } from "./log/console-log-client.mjs";
import { SentryLogClient } from "./log/sentry-log-client.mjs";
import { RiotService } from "./riot/riot.mjs";
import { StatsService } from "./stats/stats.mjs";

export interface Services {
  logService: LogService;
  databaseService: DatabaseService;
  riotService: RiotService;
  discordService: DiscordService;
  followService: FollowService;
  followTrackerService: FollowTrackerService;
  statsService: StatsService;
}

interface InstallServicesOpts {
  config: Config;
  mongoClient: MongoClient;
  fetch?: typeof fetch;
}

export function installServices({ config, mongoClient, fetch = globalThis.fetch }: InstallServicesOpts): Services {
  const logService = new AggregatorClient(
    config.MODE === "production"
      ? [new SentryLogClient(config.MODE), new ConsoleLogClient()]
      : [new ConsoleLogClient({ verbose: true })],
  );
  const databaseService = new DatabaseService({
    logService,
    followedPlayers: mongoClient
      .db(config.MONGODB_DATABASE)
      .collection<FollowedPlayerDocument>(FOLLOWED_PLAYERS_COLLECTION),
  });
  const riotService = new RiotService({
    apiKey: config.RIOT_API_KEY,
    logService,
    fetch,
    requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
  });
  const discordService = new DiscordService({
    token: config.DISCORD_TOKEN,
    logService,
    fetch,
    requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
  });
  const followService = new FollowService({ logService, databaseService, riotService });
  const followTrackerService = new FollowTrackerService({ logService, databaseService, riotService, discordService });
  const statsService = new StatsService({ logService, riotService });

  return {
    logService,
    databaseService,
    riotService,
    discordService,
    followService,
    followTrackerService,
    statsService,
  };
}
