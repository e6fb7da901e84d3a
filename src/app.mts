import type { Config } from "./config.mjs";
import { FollowPoller } from "./pollers/follow-poller.mjs";
import type { Services } from "./services/install.mjs";

export interface App {
  poller: FollowPoller;
  shutdown(): Promise<void>;
}

interface StartAppOpts {
  config: Config;
  services: Services;
}

export async function startApp({ config, services }: StartAppOpts): Promise<App> {
  const { logService, databaseService, riotService, followTrackerService } = services;

  await databaseService.ensureIndexes();

  const poller = new FollowPoller({
    logService,
    followTrackerService,
    intervalMs: config.FOLLOW_POLL_INTERVAL_MINUTES * 60_000,
  });
  poller.start();

  return {
    poller,
    shutdown: async () => {
      await poller.stop();
      await riotService.dispose();
    },
  };
}
