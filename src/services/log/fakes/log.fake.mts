import type { JsonAny, LogService } from "../types.mjs";

export class FakeLogService implements LogService {
  readonly entries: { level: keyof LogService; message: string; extra: ReadonlyMap<string, JsonAny> | undefined }[] = [];

  debug(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.record("debug", error, extra);
  }
  info(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.record("info", error, extra);
  }
  warn(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.record("warn", error, extra);
  }
  error(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.record("error", error, extra);
  }
  fatal(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.record("fatal", error, extra);
  }

  private record(level: keyof LogService, error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.entries.push({ level, message: error instanceof Error ? error.message : error, extra });
  }
}

export function aFakeLogServiceWith(): FakeLogService {
  return new FakeLogService();
}
