import { beforeEach, describe, it, expect, vi } from "vitest";
import { addBreadcrumb, captureException, captureMessage } from "@sentry/node";
import { SentryLogClient } from "../sentry-log-client.mjs";

vi.mock("@sentry/node", () => ({
  addBreadcrumb: vi.fn(),
  captureException: vi.fn(),
  captureMessage: vi.fn(),
}));

describe("SentryLogClient", () => {
  beforeEach(() => {
    vi.mocked(addBreadcrumb).mockClear();
    vi.mocked(captureException).mockClear();
    vi.mocked(captureMessage).mockClear();
  });

  it("does nothing outside of production", () => {
    const client = new SentryLogClient("development");

    client.info("info");
    client.error(new Error("error"));

    expect(addBreadcrumb).not.toHaveBeenCalled();
    expect(captureException).not.toHaveBeenCalled();
  });

  it("records info as a breadcrumb", () => {
    new SentryLogClient().info("Follow pass completed", new Map([["processed", 3]]));

    expect(addBreadcrumb).toHaveBeenCalledWith({
      category: "info",
      message: "Follow pass completed",
      level: "info",
      data: { processed: 3 },
    });
  });

  it("captures warnings only when they carry an error", () => {
    const client = new SentryLogClient();
    const error = new Error("rate limited");

    client.warn("plain warning");
    client.warn(error);

    expect(addBreadcrumb).toHaveBeenCalledWith({
      category: "warning",
      message: "plain warning",
      level: "warning",
      data: {},
    });
    expect(captureException).toHaveBeenCalledWith(error, { level: "warning", extra: {} });
  });

  it("captures string errors as messages", () => {
    new SentryLogClient().fatal("poller crashed", new Map([["pass", 4]]));

    expect(captureMessage).toHaveBeenCalledWith("poller crashed", { level: "fatal", extra: { pass: 4 } });
  });
});
