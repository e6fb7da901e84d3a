import type { LogService, JsonAny } from "./types.mjs";

/**
 * Fans every log call out to each wrapped client, in order.
 */
export class AggregatorClient implements LogService {
  private readonly clients: readonly LogService[];

  constructor(clients: readonly LogService[]) {
    this.clients = clients;
  }

  debug(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.clients.forEach((client) => {
      client.debug(error, extra);
    });
  }

  info(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.clients.forEach((client) => {
      client.info(error, extra);
    });
  }

  warn(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.clients.forEach((client) => {
      client.warn(error, extra);
    });
  }

  error(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.clients.forEach((client) => {
      client.error(error, extra);
    });
  }

  fatal(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.clients.forEach((client) => {
      client.fatal(error, extra);
    });
  }
}
