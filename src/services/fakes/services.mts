import { aFakeDatabaseServiceWith } from "../database/fakes/database.fake.mjs";
import { aFakeDiscordServiceWith } from "../discord/fakes/discord.fake.mjs";
import { aFakeFollowServiceWith } from "../follow/fakes/follow.fake.mjs";
import { aFakeFollowTrackerServiceWith } from "../follow-tracker/fakes/follow-tracker.fake.mjs";
import type { Services } from "../install.mjs";
import { aFakeLogServiceWith } from "../log/fakes/log.fake.mjs";
import { aFakeRiotServiceWith } from "../riot/fakes/riot.fake.mjs";
import { aFakeStatsServiceWith } from "../stats/fakes/stats.fake.mjs";

export function installFakeServicesWith(opts: Partial<Services> = {}): Services {
  const logService = opts.logService ?? aFakeLogServiceWith();
  const databaseService = opts.databaseService ?? aFakeDatabaseServiceWith({ logService });
  const riotService = opts.riotService ?? aFakeRiotServiceWith({ logService });
  const discordService = opts.discordService ?? aFakeDiscordServiceWith({ logService });
  const followService = opts.followService ?? aFakeFollowServiceWith({ logService, databaseService, riotService });
  const followTrackerService =
    opts.followTrackerService ??
    aFakeFollowTrackerServiceWith({ logService, databaseService, riotService, discordService });
  const statsService = opts.statsService ?? aFakeStatsServiceWith({ logService, riotService });

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
