import { aFakeLogServiceWith } from "../../log/fakes/log.fake.mjs";
import { aFakeRiotServiceWith } from "../../riot/fakes/riot.fake.mjs";
import type { StatsServiceOpts } from "../stats.mjs";
import { StatsService } from "../stats.mjs";

export function aFakeStatsServiceWith(opts: Partial<StatsServiceOpts> = {}): StatsService {
  return new StatsService({
    logService: aFakeLogServiceWith(),
    riotService: aFakeRiotServiceWith(),
    ...opts,
  });
}
