import { aFakeDatabaseServiceWith } from "../../database/fakes/database.fake.mjs";
import { aFakeDiscordServiceWith } from "../../discord/fakes/discord.fake.mjs";
import { aFakeLogServiceWith } from "../../log/fakes/log.fake.mjs";
import { aFakeRiotServiceWith } from "../../riot/fakes/riot.fake.mjs";
import type { FollowTrackerServiceOpts } from "../follow-tracker.mjs";
import { FollowTrackerService } from "../follow-tracker.mjs";

export function aFakeFollowTrackerServiceWith(opts: Partial<FollowTrackerServiceOpts> = {}): FollowTrackerService {
  return new FollowTrackerService({
    logService: aFakeLogServiceWith(),
    databaseService: aFakeDatabaseServiceWith(),
    riotService: aFakeRiotServiceWith(),
    discordService: aFakeDiscordServiceWith(),
    ...opts,
  });
}
