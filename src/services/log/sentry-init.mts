import * as Sentry from "@sentry/node";
import type { Config } from "../../config.mjs";
import { RiotError } from "../riot/riot-error.mjs";

export function initSentry(config: Config): boolean {
  if (config.MODE !== "production" || config.SENTRY_DSN == null) {
    return false;
  }

  Sentry.init({
    dsn: config.SENTRY_DSN,
    environment: config.MODE,
    tracesSampleRate: 0.1,
    beforeSend: (event, hint) => {
      // a player without a ranked or matched history is not an incident
      if (hint.originalException instanceof RiotError && hint.originalException.httpStatus === 404) {
        return null;
      }

      return event;
    },
  });

  return true;
}
