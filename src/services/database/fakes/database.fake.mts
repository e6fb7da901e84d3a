import { aFakeLogServiceWith } from "../../log/fakes/log.fake.mjs";
import type { DatabaseServiceOpts } from "../database.mjs";
import { DatabaseService } from "../database.mjs";
import type { FollowedPlayer } from "../types/followed_player.mjs";
import { FakeFollowedPlayerCollection } from "./followed-player-collection.fake.mjs";

export function aFakeFollowedPlayer(opts: Partial<FollowedPlayer> = {}): FollowedPlayer {
  return {
    puuid: "puuid-blue-2",
    summonerId: "summoner-blue-2",
    gameName: "Blue2",
    tagLine: "EUW",
    region: "euw1",
    lastMatchId: "EUW1_7000000001",
    expiresAt: new Date("2025-01-01T12:00:00.000Z"),
    channelId: "channel-1",
    guildId: "guild-1",
    ...opts,
  };
}

export function aFakeDatabaseServiceWith(opts: Partial<DatabaseServiceOpts> = {}): DatabaseService {
  return new DatabaseService({
    logService: aFakeLogServiceWith(),
    followedPlayers: new FakeFollowedPlayerCollection(),
    ...opts,
  });
}
