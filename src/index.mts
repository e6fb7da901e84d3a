import "dotenv/config";
import { MongoClient } from "mongodb";
import { startApp } from "./app.mjs";
import { loadConfig } from "./config.mjs";
import { initSentry } from "./services/log/sentry-init.mjs";
import { installServices } from "./services/install.mjs";

const config = loadConfig();
initSentry(config);

const mongoClient = new MongoClient(config.MONGODB_URI);
await mongoClient.connect();

const services = installServices({ config, mongoClient });
const { logService } = services;
const app = await startApp({ config, services });

let shuttingDown = false;
async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) {
    return;
  }

  shuttingDown = true;
  logService.info(`Received ${signal}, shutting down`);
  try {
    await app.shutdown();
  } finally {
    await mongoClient.close();
  }
}

for (const signal of ["SIGINT", "SIGTERM"] satisfies NodeJS.Signals[]) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logService.fatal(error instanceof Error ? error : new Error(String(error)));
      process.exitCode = 1;
    });
  });
}
