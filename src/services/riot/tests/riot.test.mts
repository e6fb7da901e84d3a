import type { Mock } from "vitest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RiotService } from "../riot.mjs";
import { ParseError, RiotError } from "../riot-error.mjs";
import { aFakeMatchPayloadWith, aFakeMatchWith } from "../fakes/data.mjs";
import { aFakeLogServiceWith } from "../../log/fakes/log.fake.mjs";
import type { FakeLogService } from "../../log/fakes/log.fake.mjs";

function requestedUrl(mockFetch: Mock<typeof fetch>, call = 0): string {
  const [input] = mockFetch.mock.calls[call] ?? [];
  return typeof input === "string" ? input : "";
}

function requestedHeaders(mockFetch: Mock<typeof fetch>, call = 0): Headers {
  const [, init] = mockFetch.mock.calls[call] ?? [];
  return new Headers(init?.headers);
}

describe("RiotService", () => {
  let logService: FakeLogService;
  let mockFetch: Mock<typeof fetch>;
  let riotService: RiotService;

  beforeEach(() => {
    logService = aFakeLogServiceWith();
    mockFetch = vi.fn<typeof fetch>().mockImplementation(async (input) => {
      const url = typeof input === "string" ? input : "";
      if (url.startsWith("https://europe.api.riotgames.com/riot/account/v1/accounts/by-riot-id/")) {
        return Promise.resolve(
          new Response(JSON.stringify({ puuid: "puuid-1", gameName: "Faker Fan", tagLine: "EUW" })),
        );
      }
      if (url.startsWith("https://euw1.api.riotgames.com/lol/summoner/v4/summoners/by-puuid/")) {
        return Promise.resolve(new Response(JSON.stringify({ id: "summoner-1", puuid: "puuid-1" })));
      }
      if (url.startsWith("https://europe.api.riotgames.com/lol/match/v5/matches/by-puuid/")) {
        return Promise.resolve(new Response(JSON.stringify(["EUW1_7000000002", "EUW1_7000000001"])));
      }
      if (url.startsWith("https://europe.api.riotgames.com/lol/match/v5/matches/")) {
        return Promise.resolve(new Response(JSON.stringify(aFakeMatchPayloadWith())));
      }

      return Promise.resolve(new Response("Not found", { status: 404 }));
    });
    riotService = new RiotService({ apiKey: "test-secret", logService, fetch: mockFetch, requestTimeoutMs: 5000 });
  });

  afterEach(async () => {
    await riotService.dispose();
  });

  describe("getAccountByRiotId()", () => {
    it("requests the account from the europe route with the api key", async () => {
      const account = await riotService.getAccountByRiotId("Faker Fan", "EUW");

      expect(requestedUrl(mockFetch)).toBe(
        "https://europe.api.riotgames.com/riot/account/v1/accounts/by-riot-id/Faker%20Fan/EUW",
      );
      expect(requestedHeaders(mockFetch).get("X-Riot-Token")).toBe("test-secret");
      expect(account).toEqual({ puuid: "puuid-1", gameName: "Faker Fan", tagLine: "EUW" });
    });

    it("passes a timeout signal to fetch", async () => {
      await riotService.getAccountByRiotId("Faker Fan", "EUW");

      const [, init] = mockFetch.mock.calls[0] ?? [];
      expect(init?.signal).toBeInstanceOf(AbortSignal);
    });
  });

  describe("getSummonerByPuuid()", () => {
    it("requests the summoner from the platform host", async () => {
      const summoner = await riotService.getSummonerByPuuid("euw1", "puuid-1");

      expect(requestedUrl(mockFetch)).toBe("https://euw1.api.riotgames.com/lol/summoner/v4/summoners/by-puuid/puuid-1");
      expect(summoner).toEqual({ id: "summoner-1", puuid: "puuid-1" });
    });
  });

  describe("getMatchIds()", () => {
    it("requests match ids from the regional route of the platform", async () => {
      const matchIds = await riotService.getMatchIds("euw1", "puuid-1", 2);

      expect(requestedUrl(mockFetch)).toBe(
        "https://europe.api.riotgames.com/lol/match/v5/matches/by-puuid/puuid-1/ids?start=0&count=2",
      );
      expect(matchIds).toEqual(["EUW1_7000000002", "EUW1_7000000001"]);
    });

    it("routes americas platforms to the americas host", async () => {
      mockFetch.mockResolvedValue(new Response("[]"));

      await riotService.getMatchIds("na1", "puuid-1", 1);

      expect(requestedUrl(mockFetch)).toBe(
        "https://americas.api.riotgames.com/lol/match/v5/matches/by-puuid/puuid-1/ids?start=0&count=1",
      );
    });
  });

  describe("getLatestMatchId()", () => {
    it("returns the first match id", async () => {
      expect(await riotService.getLatestMatchId("euw1", "puuid-1")).toBe("EUW1_7000000002");
    });

    it("returns null when the player has no matches", async () => {
      mockFetch.mockResolvedValue(new Response("[]"));

      expect(await riotService.getLatestMatchId("euw1", "puuid-1")).toBeNull();
    });
  });

  describe("getMatch()", () => {
    it("routes by the match id prefix and decodes the match", async () => {
      const match = await riotService.getMatch("EUW1_7000000002");

      expect(requestedUrl(mockFetch)).toBe("https://europe.api.riotgames.com/lol/match/v5/matches/EUW1_7000000002");
      expect(match).toEqual(aFakeMatchWith());
    });

    it("ties the request to the caller's signal", async () => {
      const controller = new AbortController();

      await riotService.getMatch("EUW1_7000000002", controller.signal);
      controller.abort();

      const [, init] = mockFetch.mock.calls[0] ?? [];
      expect(init?.signal?.aborted).toBe(true);
    });

    it("rejects without calling riot once the signal is aborted", async () => {
      const controller = new AbortController();
      controller.abort(new Error("shutting down"));

      await expect(riotService.getMatch("EUW1_7000000002", controller.signal)).rejects.toThrow("shutting down");
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it("rejects a match id without a known platform", async () => {
      await expect(riotService.getMatch("XX9_1")).rejects.toThrow('Unable to determine platform from match id "XX9_1"');
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe("getLeagueEntries()", () => {
    it("requests the ranked entries from the platform host", async () => {
      mockFetch.mockResolvedValueOnce(
        new Response(
          JSON.stringify([
            { queueType: "RANKED_SOLO_5x5", tier: "GOLD", rank: "II", leaguePoints: 57, wins: 30, losses: 20 },
          ]),
        ),
      );

      const entries = await riotService.getLeagueEntries("euw1", "puuid-1");

      expect(requestedUrl(mockFetch)).toBe("https://euw1.api.riotgames.com/lol/league/v4/entries/by-puuid/puuid-1");
      expect(entries).toEqual([
        { queueType: "RANKED_SOLO_5x5", tier: "GOLD", rank: "II", leaguePoints: 57, wins: 30, losses: 20 },
      ]);
    });
  });

  describe("getTopChampionMasteries()", () => {
    it("asks for the top ten champions by default", async () => {
      mockFetch.mockResolvedValueOnce(
        new Response(JSON.stringify([{ championId: 103, championLevel: 7, championPoints: 215000 }])),
      );

      const masteries = await riotService.getTopChampionMasteries("kr", "puuid-1");

      expect(requestedUrl(mockFetch)).toBe(
        "https://kr.api.riotgames.com/lol/champion-mastery/v4/champion-masteries/by-puuid/puuid-1/top?count=10",
      );
      expect(masteries).toEqual([{ championId: 103, championLevel: 7, championPoints: 215000 }]);
    });
  });

  describe("errors", () => {
    it("throws a RiotError for a non-2xx response", async () => {
      mockFetch.mockResolvedValue(new Response("Forbidden", { status: 403 }));

      const error = await riotService.getMatch("EUW1_1").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RiotError);
      expect(error).toMatchObject({ httpStatus: 403, body: "Forbidden" });
      expect(logService.entries.at(-1)).toMatchObject({ level: "warn", message: "Riot API Error (HTTP 403): Forbidden" });
    });

    it("retries once after a 429 response", async () => {
      mockFetch
        .mockResolvedValueOnce(new Response("Rate limited", { status: 429, headers: { "Retry-After": "0" } }))
        .mockResolvedValueOnce(new Response(JSON.stringify(["EUW1_3"])));

      const latest = await riotService.getLatestMatchId("euw1", "puuid-1");

      expect(latest).toBe("EUW1_3");
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it("gives up after a second 429 response", async () => {
      mockFetch.mockImplementation(async () =>
        Promise.resolve(new Response("Rate limited", { status: 429, headers: { "Retry-After": "0" } })),
      );

      await expect(riotService.getLatestMatchId("euw1", "puuid-1")).rejects.toMatchObject({
        httpStatus: 429,
        retryAfterMs: 0,
      });
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it("stops waiting out a 429 when the signal aborts", async () => {
      const controller = new AbortController();
      mockFetch.mockResolvedValueOnce(new Response("Rate limited", { status: 429, headers: { "Retry-After": "30" } }));
      vi.spyOn(logService, "warn").mockImplementation(() => {
        setTimeout(() => {
          controller.abort(new Error("shutting down"));
        }, 10);
      });

      await expect(riotService.getLatestMatchId("euw1", "puuid-1", controller.signal)).rejects.toThrow("shutting down");
      expect(mockFetch).toHaveBeenCalledOnce();
    });

    it("throws a ParseError for a body that is not JSON", async () => {
      mockFetch.mockResolvedValue(new Response("<html>"));

      await expect(riotService.getLatestMatchId("euw1", "puuid-1")).rejects.toBeInstanceOf(ParseError);
    });

    it("throws a ParseError for a body of the wrong shape", async () => {
      mockFetch.mockResolvedValue(new Response(JSON.stringify({ ids: [] })));

      await expect(riotService.getLatestMatchId("euw1", "puuid-1")).rejects.toThrow(
        "Expected match ids to be an array of strings",
      );
    });
  });
});
