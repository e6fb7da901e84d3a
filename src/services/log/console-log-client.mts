import type { LogService, JsonAny } from "./types.mjs";

function formatExtra(extra: ReadonlyMap<string, JsonAny> | undefined): string | undefined {
  return extra && extra.size > 0 ? JSON.stringify(Object.fromEntries(extra), null, 2) : undefined;
}

export class ConsoleLogClient implements LogService {
  private readonly verbose: boolean;

  constructor({ verbose = false }: { verbose?: boolean } = {}) {
    this.verbose = verbose;
  }

  debug(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    if (!this.verbose) {
      return;
    }

    console.debug(this.timestamp(), error, formatExtra(extra) ?? "");
  }

  info(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    console.info(this.timestamp(), error, formatExtra(extra) ?? "");
  }

  warn(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    console.warn(this.timestamp(), error, formatExtra(extra) ?? "");
  }

  error(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    console.error(this.timestamp(), error, formatExtra(extra) ?? "");
  }

  fatal(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    console.error(this.timestamp(), "FATAL:", error, formatExtra(extra) ?? "");
  }

  private timestamp(): string {
    return `[${new Date().toISOString()}]`;
  }
}
