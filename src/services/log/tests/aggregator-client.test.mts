import { describe, it, expect, vi } from "vitest";
import { AggregatorClient } from "../aggregator-client.mjs";
import { aFakeLogServiceWith } from "../fakes/log.fake.mjs";

describe("AggregatorClient", () => {
  it("forwards every level to each client", () => {
    const first = aFakeLogServiceWith();
    const second = aFakeLogServiceWith();
    const client = new AggregatorClient([first, second]);
    const extra = new Map([["puuid", "puuid-1"]]);

    client.debug("debug message");
    client.info("info message", extra);
    client.warn(new Error("warn error"));
    client.error("error message");
    client.fatal(new Error("fatal error"), extra);

    for (const fake of [first, second]) {
      expect(fake.entries).toEqual([
        { level: "debug", message: "debug message", extra: undefined },
        { level: "info", message: "info message", extra },
        { level: "warn", message: "warn error", extra: undefined },
        { level: "error", message: "error message", extra: undefined },
        { level: "fatal", message: "fatal error", extra },
      ]);
    }
  });

  it("calls clients in the order they were given", () => {
    const calls: string[] = [];
    const first = aFakeLogServiceWith();
    const second = aFakeLogServiceWith();
    vi.spyOn(first, "error").mockImplementation(() => calls.push("first"));
    vi.spyOn(second, "error").mockImplementation(() => calls.push("second"));

    new AggregatorClient([first, second]).error("boom");

    expect(calls).toEqual(["first", "second"]);
  });
});
