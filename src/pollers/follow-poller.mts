import type { FollowTrackerService } from "../services/follow-tracker/follow-tracker.mjs";
import type { PassResult } from "../services/follow-tracker/types.mjs";
import type { LogService } from "../services/log/types.mjs";

export interface FollowPollerOpts {
  logService: LogService;
  followTrackerService: FollowTrackerService;
  intervalMs: number;
}

interface RunningPass {
  controller: AbortController;
  promise: Promise<PassResult | undefined>;
}

/**
 * Runs a follow pass straight away and then on every interval. At most one pass runs at a time.
 */
export class FollowPoller {
  private readonly logService: LogService;
  private readonly followTrackerService: FollowTrackerService;
  private readonly intervalMs: number;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private running: RunningPass | undefined;
  private started = false;

  constructor({ logService, followTrackerService, intervalMs }: FollowPollerOpts) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error(`intervalMs must be a positive number, got ${intervalMs.toString()}`);
    }

    this.logService = logService;
    this.followTrackerService = followTrackerService;
    this.intervalMs = intervalMs;
  }

  get isRunning(): boolean {
    return this.started;
  }

  start(): void {
    if (this.started) {
      return;
    }

    this.started = true;
    this.logService.info("Follow poller started", new Map([["intervalMs", this.intervalMs]]));
    this.schedule(0);
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }

    this.started = false;
    clearTimeout(this.timer);
    this.timer = undefined;

    const { running } = this;
    if (running) {
      running.controller.abort();
      await running.promise;
    }

    this.logService.info("Follow poller stopped");
  }

  /**
   * Starts a pass unless one is still in flight. Resolves with the pass result, or `undefined` when skipped.
   */
  async tick(): Promise<PassResult | undefined> {
    if (this.running) {
      this.logService.warn("Skipping follow pass, the previous one is still running");
      return undefined;
    }

    const controller = new AbortController();
    const promise = this.runPass(controller.signal);
    this.running = { controller, promise };

    try {
      return await promise;
    } finally {
      this.running = undefined;
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      if (!this.started) {
        return;
      }

      this.schedule(this.intervalMs);
      void this.tick();
    }, delayMs);
  }

  private async runPass(signal: AbortSignal): Promise<PassResult | undefined> {
    try {
      return await this.followTrackerService.runPass({ signal });
    } catch (error) {
      this.logService.error(error instanceof Error ? error : new Error(String(error)), new Map([["stage", "pass"]]));
      return undefined;
    }
  }
}
