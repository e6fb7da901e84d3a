import { aFakeDatabaseServiceWith } from "../../database/fakes/database.fake.mjs";
import { aFakeLogServiceWith } from "../../log/fakes/log.fake.mjs";
import { aFakeRiotServiceWith } from "../../riot/fakes/riot.fake.mjs";
import type { FollowServiceOpts } from "../follow.mjs";
import { FollowService } from "../follow.mjs";

export function aFakeFollowServiceWith(opts: Partial<FollowServiceOpts> = {}): FollowService {
  return new FollowService({
    logService: aFakeLogServiceWith(),
    databaseService: aFakeDatabaseServiceWith(),
    riotService: aFakeRiotServiceWith(),
    ...opts,
  });
}
