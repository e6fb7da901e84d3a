import type { JsonObject } from "../../../base/json.mjs";
import type { MatchDetail, MatchParticipant } from "../types.mjs";

// position, blue side champion, red side champion
const LINEUP = [
  ["TOP", "Garen", "Darius"],
  ["JUNGLE", "LeeSin", "Vi"],
  ["MIDDLE", "Ahri", "Zed"],
  ["BOTTOM", "Jinx", "Caitlyn"],
  ["UTILITY", "Thresh", "Lulu"],
] as const;

export function aFakeParticipantWith(opts: Partial<MatchParticipant> = {}): MatchParticipant {
  return {
    puuid: "puuid-blue-0",
    summonerId: "summoner-blue-0",
    summonerName: "",
    riotIdGameName: "Blue0",
    championName: "Garen",
    teamId: 100,
    teamPosition: "TOP",
    win: true,
    kills: 5,
    deaths: 2,
    assists: 7,
    totalMinionsKilled: 180,
    neutralMinionsKilled: 12,
    goldEarned: 12_345,
    visionScore: 21,
    ...opts,
  };
}

/**
 * Ten participants, one per position per team. Blue side (teamId 100) wins.
 */
export function aFakeMatchWith(opts: Partial<MatchDetail> = {}): MatchDetail {
  const participants = LINEUP.flatMap(([teamPosition, blueChampion, redChampion], index) => [
    aFakeParticipantWith({
      puuid: `puuid-blue-${index.toString()}`,
      summonerId: `summoner-blue-${index.toString()}`,
      riotIdGameName: `Blue${index.toString()}`,
      championName: blueChampion,
      teamId: 100,
      teamPosition,
      win: true,
      kills: index + 1,
      deaths: index,
      assists: index + 2,
      totalMinionsKilled: 100 + index,
      neutralMinionsKilled: index,
      goldEarned: 10_000 + index * 1000,
      visionScore: 10 + index,
    }),
    aFakeParticipantWith({
      puuid: `puuid-red-${index.toString()}`,
      summonerId: `summoner-red-${index.toString()}`,
      riotIdGameName: `Red${index.toString()}`,
      championName: redChampion,
      teamId: 200,
      teamPosition,
      win: false,
      kills: index,
      deaths: index + 1,
      assists: index,
      totalMinionsKilled: 90 + index,
      neutralMinionsKilled: 0,
      goldEarned: 900 + index * 50,
      visionScore: 5 + index,
    }),
  ]);

  return {
    matchId: "EUW1_7000000002",
    queueId: 420,
    gameDuration: 1834,
    gameEndTimestamp: 1_760_000_000_000,
    participants,
    ...opts,
  };
}

/**
 * The Match-V5 wire shape of a match, as the API returns it.
 */
export function aFakeMatchPayloadWith(match: MatchDetail = aFakeMatchWith()): JsonObject {
  return {
    metadata: {
      matchId: match.matchId,
      participants: match.participants.map(({ puuid }) => puuid),
    },
    info: {
      queueId: match.queueId,
      gameDuration: match.gameDuration,
      ...(match.gameEndTimestamp == null ? {} : { gameEndTimestamp: match.gameEndTimestamp }),
      participants: match.participants.map((participant) => ({
        ...participant,
        summonerId: participant.summonerId ?? null,
      })),
    },
  };
}
