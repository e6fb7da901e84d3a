import type { MockInstance } from "vitest";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { EndUserError } from "../../../base/end-user-error.mjs";
import { aFakeLogServiceWith } from "../../log/fakes/log.fake.mjs";
import type { RiotService } from "../../riot/riot.mjs";
import { RiotError } from "../../riot/riot-error.mjs";
import { aFakeRiotServiceWith } from "../../riot/fakes/riot.fake.mjs";
import { aFakeMatchWith } from "../../riot/fakes/data.mjs";
import { formatTimeElapsed, StatsService, toRankSummary, UNRANKED } from "../stats.mjs";

const gameEnd = 1_760_000_000_000;
const now = new Date(gameEnd + 2.5 * 60 * 60 * 1000);

describe("StatsService", () => {
  let riotService: RiotService;
  let statsService: StatsService;
  let getMatchIdsSpy: MockInstance<RiotService["getMatchIds"]>;

  beforeEach(() => {
    riotService = aFakeRiotServiceWith();
    statsService = new StatsService({ logService: aFakeLogServiceWith(), riotService });

    vi.spyOn(riotService, "getAccountByRiotId").mockResolvedValue({
      puuid: "puuid-blue-2",
      gameName: "Blue2",
      tagLine: "EUW",
    });
    vi.spyOn(riotService, "getLeagueEntries").mockResolvedValue([
      { queueType: "RANKED_SOLO_5x5", tier: "GOLD", rank: "II", leaguePoints: 57, wins: 30, losses: 20 },
    ]);
    vi.spyOn(riotService, "getTopChampionMasteries").mockResolvedValue([
      { championId: 103, championLevel: 7, championPoints: 215_000 },
    ]);
    getMatchIdsSpy = vi
      .spyOn(riotService, "getMatchIds")
      .mockResolvedValue(["EUW1_7000000003", "EUW1_7000000002", "EUW1_7000000001"]);
    vi.spyOn(riotService, "getMatch").mockImplementation(async (matchId) => {
      switch (matchId) {
        case "EUW1_7000000003": {
          return Promise.resolve(aFakeMatchWith({ matchId, queueId: 1700 }));
        }
        case "EUW1_7000000001": {
          return Promise.resolve(
            aFakeMatchWith({ matchId, queueId: 450, gameEndTimestamp: gameEnd - 3 * 24 * 60 * 60 * 1000 }),
          );
        }
        default: {
          return Promise.resolve(aFakeMatchWith({ matchId }));
        }
      }
    });
  });

  describe("getPlayerStats()", () => {
    it("collects ranks, masteries and the recent tracked matches", async () => {
      const stats = await statsService.getPlayerStats({ gameName: "blue2", tagLine: "euw", region: "euw1" }, now);

      expect(getMatchIdsSpy).toHaveBeenCalledWith("euw1", "puuid-blue-2", 5);
      expect(stats).toEqual({
        gameName: "Blue2",
        tagLine: "EUW",
        soloRank: { tier: "GOLD", division: "II", lp: 57, wins: 30, losses: 20, winrate: 60 },
        flexRank: UNRANKED,
        masteries: [{ championId: 103, championLevel: 7, championPoints: 215_000 }],
        recentMatches: [
          {
            matchId: "EUW1_7000000002",
            gameType: "Ranked Solo/Duo",
            championName: "Ahri",
            kda: "3/2/4",
            farm: 104,
            result: "Victory",
            duration: "30:34",
            timeElapsed: "2 hours ago",
          },
          {
            matchId: "EUW1_7000000001",
            gameType: "ARAM",
            championName: "Ahri",
            kda: "3/2/4",
            farm: 104,
            result: "Victory",
            duration: "30:34",
            timeElapsed: "3 days ago",
          },
        ],
      });
    });

    it("skips matches the player is not part of", async () => {
      vi.spyOn(riotService, "getAccountByRiotId").mockResolvedValue({
        puuid: "puuid-someone-else",
        gameName: undefined,
        tagLine: undefined,
      });

      const stats = await statsService.getPlayerStats({ gameName: "Someone", tagLine: "EUW", region: "euw1" }, now);

      expect(stats.gameName).toBe("Someone");
      expect(stats.recentMatches).toEqual([]);
    });

    it("asks for the requested number of matches", async () => {
      await statsService.getPlayerStats({ gameName: "Blue2", tagLine: "EUW", region: "euw1", matchCount: 10 }, now);

      expect(getMatchIdsSpy).toHaveBeenCalledWith("euw1", "puuid-blue-2", 10);
    });

    it("reports an unknown riot id to the user", async () => {
      vi.spyOn(riotService, "getAccountByRiotId").mockRejectedValue(new RiotError(404, "Data not found"));

      const error = await statsService
        .getPlayerStats({ gameName: "Nobody", tagLine: "euw", region: "euw1" }, now)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EndUserError);
      expect(error).toMatchObject({
        endUserMessage: "No player found for Nobody#euw",
        data: { "Riot ID": "Nobody#euw", Region: "euw1" },
      });
      expect(getMatchIdsSpy).not.toHaveBeenCalled();
    });

    it("propagates other riot failures", async () => {
      vi.spyOn(riotService, "getLeagueEntries").mockRejectedValue(new RiotError(503, "Service Unavailable"));

      await expect(
        statsService.getPlayerStats({ gameName: "Blue2", tagLine: "EUW", region: "euw1" }, now),
      ).rejects.toBeInstanceOf(RiotError);
    });
  });

  describe("toRankSummary()", () => {
    it("rounds the winrate to one decimal", () => {
      expect(
        toRankSummary({ queueType: "RANKED_FLEX_SR", tier: "SILVER", rank: "IV", leaguePoints: 0, wins: 20, losses: 15 }),
      ).toEqual({ tier: "SILVER", division: "IV", lp: 0, wins: 20, losses: 15, winrate: 57.1 });
    });

    it("gives a zero winrate without games", () => {
      expect(
        toRankSummary({ queueType: "RANKED_SOLO_5x5", tier: "IRON", rank: "I", leaguePoints: 0, wins: 0, losses: 0 })
          .winrate,
      ).toBe(0);
    });
  });

  describe("formatTimeElapsed()", () => {
    it("uses seconds under a minute", () => {
      expect(formatTimeElapsed(new Date(gameEnd), new Date(gameEnd + 30_000))).toBe("30 seconds ago");
    });

    it("rounds down to the whole unit", () => {
      expect(formatTimeElapsed(new Date(gameEnd), new Date(gameEnd + 59 * 60 * 1000 + 59_000))).toBe("59 minutes ago");
    });
  });
});
