import { formatDistanceStrict } from "date-fns";
import { EndUserError, EndUserErrorType } from "../../base/end-user-error.mjs";
import type { JsonAny, LogService } from "../log/types.mjs";
import type { RiotService } from "../riot/riot.mjs";
import { RiotError } from "../riot/riot-error.mjs";
import type { MatchResult } from "../riot/match-summary.mjs";
import { formatGameDuration } from "../riot/match-summary.mjs";
import { getQueueName, isTrackedQueue } from "../riot/queues.mjs";
import type { ChampionMastery, LeagueEntry, MatchDetail, PlatformId, RiotAccount } from "../riot/types.mjs";

export const SOLO_QUEUE_TYPE = "RANKED_SOLO_5x5";
export const FLEX_QUEUE_TYPE = "RANKED_FLEX_SR";

export interface StatsServiceOpts {
  logService: LogService;
  riotService: RiotService;
}

export interface PlayerStatsRequest {
  gameName: string;
  tagLine: string;
  region: PlatformId;
  /** How many of the latest match ids to look at; matches outside the tracked queues are dropped */
  matchCount?: number;
}

export interface RankSummary {
  tier: string;
  division: string;
  lp: number;
  wins: number;
  losses: number;
  /** percentage, one decimal */
  winrate: number;
}

export interface RecentMatch {
  matchId: string;
  gameType: string;
  championName: string;
  kda: string;
  farm: number;
  result: MatchResult;
  duration: string;
  timeElapsed: string;
}

export interface PlayerStats {
  gameName: string;
  tagLine: string;
  soloRank: RankSummary;
  flexRank: RankSummary;
  masteries: ChampionMastery[];
  recentMatches: RecentMatch[];
}

export const UNRANKED: Readonly<RankSummary> = { tier: "Unranked", division: "", lp: 0, wins: 0, losses: 0, winrate: 0 };

export function toRankSummary(entry: LeagueEntry | undefined): RankSummary {
  if (entry == null) {
    return { ...UNRANKED };
  }

  const games = entry.wins + entry.losses;

  return {
    tier: entry.tier,
    division: entry.rank,
    lp: entry.leaguePoints,
    wins: entry.wins,
    losses: entry.losses,
    winrate: games > 0 ? Math.round((entry.wins / games) * 1000) / 10 : 0,
  };
}

/**
 * "30 seconds ago", "2 hours ago", "5 days ago", "3 months ago"
 */
export function formatTimeElapsed(endedAt: Date, now: Date): string {
  return formatDistanceStrict(endedAt, now, { addSuffix: true, roundingMethod: "floor" });
}

export class StatsService {
  private readonly logService: LogService;
  private readonly riotService: RiotService;

  constructor({ logService, riotService }: StatsServiceOpts) {
    this.logService = logService;
    this.riotService = riotService;
  }

  async getPlayerStats(request: PlayerStatsRequest, now = new Date()): Promise<PlayerStats> {
    const { gameName, tagLine, region, matchCount = 5 } = request;

    const account = await this.getAccount(gameName, tagLine, region);
    const [entries, masteries, matchIds] = await Promise.all([
      this.riotService.getLeagueEntries(region, account.puuid),
      this.riotService.getTopChampionMasteries(region, account.puuid),
      this.riotService.getMatchIds(region, account.puuid, matchCount),
    ]);

    const recentMatches: RecentMatch[] = [];
    for (const matchId of matchIds) {
      const match = await this.riotService.getMatch(matchId);
      const recentMatch = this.toRecentMatch(match, account.puuid, now);
      if (recentMatch) {
        recentMatches.push(recentMatch);
      }
    }

    this.logService.debug(
      "Fetched player stats",
      new Map<string, JsonAny>([
        ["puuid", account.puuid],
        ["matches", recentMatches.length],
      ]),
    );

    return {
      gameName: account.gameName ?? gameName,
      tagLine: account.tagLine ?? tagLine,
      soloRank: toRankSummary(entries.find(({ queueType }) => queueType === SOLO_QUEUE_TYPE)),
      flexRank: toRankSummary(entries.find(({ queueType }) => queueType === FLEX_QUEUE_TYPE)),
      masteries,
      recentMatches,
    };
  }

  private toRecentMatch(match: MatchDetail, puuid: string, now: Date): RecentMatch | null {
    if (!isTrackedQueue(match.queueId)) {
      return null;
    }

    const participant = match.participants.find((p) => p.puuid === puuid);
    if (participant == null) {
      return null;
    }

    return {
      matchId: match.matchId,
      gameType: getQueueName(match.queueId),
      championName: participant.championName !== "" ? participant.championName : "Unknown",
      kda: `${participant.kills.toString()}/${participant.deaths.toString()}/${participant.assists.toString()}`,
      farm: participant.totalMinionsKilled + participant.neutralMinionsKilled,
      result: participant.win ? "Victory" : "Defeat",
      duration: formatGameDuration(match.gameDuration),
      timeElapsed:
        match.gameEndTimestamp == null ? "Unknown" : formatTimeElapsed(new Date(match.gameEndTimestamp), now),
    };
  }

  private async getAccount(gameName: string, tagLine: string, region: PlatformId): Promise<RiotAccount> {
    try {
      return await this.riotService.getAccountByRiotId(gameName, tagLine);
    } catch (error) {
      if (error instanceof RiotError && error.httpStatus === 404) {
        throw new EndUserError(`No player found for ${gameName}#${tagLine}`, {
          title: "Player not found",
          errorType: EndUserErrorType.WARNING,
          innerError: error,
          data: { "Riot ID": `${gameName}#${tagLine}`, Region: region },
        });
      }

      throw error;
    }
  }
}
