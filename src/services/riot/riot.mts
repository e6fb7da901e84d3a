import Bottleneck from "bottleneck";
import type { JsonValue } from "../../base/json.mjs";
import { parseJson } from "../../base/json.mjs";
import type { JsonAny, LogService } from "../log/types.mjs";
import { ParseError, RiotError } from "./riot-error.mjs";
import {
  parseAccount,
  parseChampionMasteries,
  parseLeagueEntries,
  parseMatch,
  parseMatchIds,
  parseSummoner,
} from "./parse.mjs";
import type {
  ChampionMastery,
  LeagueEntry,
  MatchDetail,
  PlatformId,
  RegionalRoute,
  RiotAccount,
  RiotSummoner,
} from "./types.mjs";
import { platformToRegionalRoute, regionalRouteFromMatchId } from "./types.mjs";

export interface RateLimitWindow {
  limit: number;
  intervalMs: number;
}

export interface RiotServiceOpts {
  apiKey: string;
  logService: LogService;
  fetch: typeof fetch;
  requestTimeoutMs: number;
  /** Defaults to the development key limits: 20 per second and 100 per 2 minutes */
  shortWindow?: RateLimitWindow;
  longWindow?: RateLimitWindow;
}

const ACCOUNT_ROUTE: RegionalRoute = "europe";
const DEFAULT_RETRY_AFTER_MS = 1000;
const MAX_RETRY_AFTER_MS = 60_000;

function parseRetryAfterMs(headers: Headers): number {
  const value = Number(headers.get("Retry-After"));
  if (headers.get("Retry-After") == null || !Number.isFinite(value) || value < 0) {
    return DEFAULT_RETRY_AFTER_MS;
  }

  return Math.min(MAX_RETRY_AFTER_MS, value * 1000);
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error("Riot API request aborted");
}

async function delay(ms: number, signal: AbortSignal | undefined): Promise<void> {
  if (signal == null) {
    return new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
  if (signal.aborted) {
    throw abortReason(signal);
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timeout);
      reject(abortReason(signal));
    };
    const timeout = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Settles with `promise`, or rejects as soon as `signal` aborts. The limiter keeps a queued job, so the job itself
 * checks the signal again before it calls out.
 */
async function untilAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (signal == null) {
    return promise;
  }

  let rejectAborted: (error: Error) => void = () => undefined;
  const aborted = new Promise<never>((_resolve, reject) => {
    rejectAborted = reject;
  });
  const onAbort = (): void => {
    rejectAborted(abortReason(signal));
  };
  signal.addEventListener("abort", onAbort, { once: true });

  try {
    return await Promise.race([promise, aborted]);
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}

export class RiotService {
  private readonly apiKey: string;
  private readonly logService: LogService;
  private readonly globalFetch: typeof fetch;
  private readonly requestTimeoutMs: number;
  private readonly shortWindow: RateLimitWindow;
  private readonly longWindow: RateLimitWindow;
  // keyed by host; each routing value has its own application rate limit
  private readonly limiters = new Map<string, { fast: Bottleneck; slow: Bottleneck }>();

  constructor({ apiKey, logService, fetch, requestTimeoutMs, shortWindow, longWindow }: RiotServiceOpts) {
    this.apiKey = apiKey;
    this.logService = logService;
    this.globalFetch = fetch;
    this.requestTimeoutMs = requestTimeoutMs;
    this.shortWindow = shortWindow ?? { limit: 20, intervalMs: 1000 };
    this.longWindow = longWindow ?? { limit: 100, intervalMs: 120_000 };
  }

  async getAccountByRiotId(gameName: string, tagLine: string): Promise<RiotAccount> {
    const data = await this.fetch(
      ACCOUNT_ROUTE,
      `/riot/account/v1/accounts/by-riot-id/${encodeURIComponent(gameName)}/${encodeURIComponent(tagLine)}`,
    );

    return parseAccount(data);
  }

  async getSummonerByPuuid(platform: PlatformId, puuid: string): Promise<RiotSummoner> {
    const data = await this.fetch(platform, `/lol/summoner/v4/summoners/by-puuid/${encodeURIComponent(puuid)}`);

    return parseSummoner(data);
  }

  async getMatchIds(platform: PlatformId, puuid: string, count: number, signal?: AbortSignal): Promise<string[]> {
    const data = await this.fetch(
      platformToRegionalRoute(platform),
      `/lol/match/v5/matches/by-puuid/${encodeURIComponent(puuid)}/ids`,
      { start: 0, count },
      signal,
    );

    return parseMatchIds(data);
  }

  async getLatestMatchId(platform: PlatformId, puuid: string, signal?: AbortSignal): Promise<string | null> {
    const [latest] = await this.getMatchIds(platform, puuid, 1, signal);

    return latest ?? null;
  }

  async getMatch(matchId: string, signal?: AbortSignal): Promise<MatchDetail> {
    const data = await this.fetch(
      regionalRouteFromMatchId(matchId),
      `/lol/match/v5/matches/${encodeURIComponent(matchId)}`,
      {},
      signal,
    );

    return parseMatch(data);
  }

  async getLeagueEntries(platform: PlatformId, puuid: string): Promise<LeagueEntry[]> {
    const data = await this.fetch(platform, `/lol/league/v4/entries/by-puuid/${encodeURIComponent(puuid)}`);

    return parseLeagueEntries(data);
  }

  async getTopChampionMasteries(platform: PlatformId, puuid: string, count = 10): Promise<ChampionMastery[]> {
    const data = await this.fetch(
      platform,
      `/lol/champion-mastery/v4/champion-masteries/by-puuid/${encodeURIComponent(puuid)}/top`,
      { count },
    );

    return parseChampionMasteries(data);
  }

  async dispose(): Promise<void> {
    const limiters = [...this.limiters.values()].flatMap(({ fast, slow }) => [fast, slow]);
    this.limiters.clear();
    await Promise.all(limiters.map(async (limiter) => limiter.disconnect()));
  }

  private getLimiter(host: string): Bottleneck {
    const existing = this.limiters.get(host);
    if (existing) {
      return existing.fast;
    }

    const fast = new Bottleneck({
      reservoir: this.shortWindow.limit,
      reservoirRefreshAmount: this.shortWindow.limit,
      reservoirRefreshInterval: this.shortWindow.intervalMs,
      maxConcurrent: 4,
    });
    const slow = new Bottleneck({
      reservoir: this.longWindow.limit,
      reservoirRefreshAmount: this.longWindow.limit,
      reservoirRefreshInterval: this.longWindow.intervalMs,
      maxConcurrent: 4,
    });
    fast.chain(slow);
    this.limiters.set(host, { fast, slow });

    return fast;
  }

  private async fetch(
    host: PlatformId | RegionalRoute,
    path: string,
    queryParameters: Record<string, string | number> = {},
    signal?: AbortSignal,
    retry = false,
  ): Promise<JsonValue> {
    const url = new URL(path, `https://${host}.api.riotgames.com`);
    for (const [key, value] of Object.entries(queryParameters)) {
      url.searchParams.set(key, value.toString());
    }

    const headers = new Headers();
    headers.set("X-Riot-Token", this.apiKey);
    headers.set("Accept", "application/json");

    this.logService.debug(
      "Riot API request",
      new Map<string, JsonAny>([
        ["url", url.toString()],
        ["retry", retry],
      ]),
    );

    if (signal?.aborted === true) {
      throw abortReason(signal);
    }

    const response = await untilAborted(
      this.getLimiter(host).schedule(async () => {
        if (signal?.aborted === true) {
          throw abortReason(signal);
        }

        const timeout = AbortSignal.timeout(this.requestTimeoutMs);
        return this.globalFetch(url.toString(), {
          method: "GET",
          headers,
          signal: signal == null ? timeout : AbortSignal.any([signal, timeout]),
        });
      }),
      signal,
    );

    if (!response.ok) {
      const body = await response.text();
      if (response.status === 429 && !retry) {
        const retryAfterMs = parseRetryAfterMs(response.headers);
        this.logService.warn(
          "Riot API rate limit hit",
          new Map<string, JsonAny>([
            ["path", path],
            ["retryAfterMs", retryAfterMs],
          ]),
        );
        await delay(retryAfterMs, signal);

        return this.fetch(host, path, queryParameters, signal, true);
      }

      const error = new RiotError(
        response.status,
        body,
        response.status === 429 ? parseRetryAfterMs(response.headers) : undefined,
      );
      this.logService.warn(error, new Map([["path", path]]));

      throw error;
    }

    const text = await response.text();
    try {
      return parseJson(text);
    } catch (error) {
      throw new ParseError(
        `Invalid JSON from Riot API for ${path}: ${error instanceof Error ? error.message : String(error)}`,
        text.slice(0, 500),
      );
    }
  }
}
