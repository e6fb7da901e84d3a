import { getQueueName } from "./queues.mjs";
import type { MatchDetail, MatchParticipant, TeamPosition } from "./types.mjs";

export type MatchResult = "Victory" | "Defeat";

export interface ParticipantSummary {
  name: string;
  championName: string;
  kills: number;
  deaths: number;
  assists: number;
  farm: number;
  gold: number;
  visionScore: number;
}

export interface RoleMatchup {
  role: TeamPosition;
  team: ParticipantSummary;
  enemy: ParticipantSummary;
}

export interface MatchSummary {
  matchId: string;
  queueId: number;
  gameMode: string;
  result: MatchResult;
  duration: string;
  matchups: RoleMatchup[];
}

export interface SummaryPlayer {
  puuid: string;
  summonerId: string;
}

const ROLE_ORDER: readonly TeamPosition[] = ["TOP", "JUNGLE", "MIDDLE", "BOTTOM", "UTILITY"];

export function formatGameDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const minutes = Math.floor(seconds / 60);

  return `${minutes.toString()}:${(seconds % 60).toString().padStart(2, "0")}`;
}

/**
 * 950 → "950", 12000 → "12k", 12345 → "12,3k", 12999 → "13k"
 */
export function formatGold(gold: number): string {
  if (gold < 1000) {
    return gold.toString();
  }

  const tenths = Math.round(gold / 100);
  const thousands = Math.floor(tenths / 10).toString();
  if (tenths % 10 === 0) {
    return `${thousands}k`;
  }

  return `${thousands},${(tenths % 10).toString()}k`;
}

function summarizeParticipant(participant: MatchParticipant): ParticipantSummary {
  const name = participant.summonerName !== "" ? participant.summonerName : participant.riotIdGameName;

  return {
    name: name !== "" ? name : "Unknown",
    championName: participant.championName,
    kills: participant.kills,
    deaths: participant.deaths,
    assists: participant.assists,
    farm: participant.totalMinionsKilled + participant.neutralMinionsKilled,
    gold: participant.goldEarned,
    visionScore: participant.visionScore,
  };
}

function findPlayer(match: MatchDetail, player: SummaryPlayer): MatchParticipant | undefined {
  return (
    match.participants.find(({ puuid }) => puuid === player.puuid) ??
    match.participants.find(({ summonerId }) => player.summonerId !== "" && summonerId === player.summonerId)
  );
}

export function getMatchSummary(match: MatchDetail, player: SummaryPlayer): MatchSummary | null {
  const followed = findPlayer(match, player);
  if (followed == null) {
    return null;
  }

  const team = new Map<string, MatchParticipant>();
  const enemies = new Map<string, MatchParticipant>();
  for (const participant of match.participants) {
    const side = participant.teamId === followed.teamId ? team : enemies;
    side.set(participant.teamPosition, participant);
  }

  const matchups: RoleMatchup[] = [];
  for (const role of ROLE_ORDER) {
    const ally = team.get(role);
    const enemy = enemies.get(role);
    if (ally && enemy) {
      matchups.push({ role, team: summarizeParticipant(ally), enemy: summarizeParticipant(enemy) });
    }
  }

  return {
    matchId: match.matchId,
    queueId: match.queueId,
    gameMode: getQueueName(match.queueId),
    result: followed.win ? "Victory" : "Defeat",
    duration: formatGameDuration(match.gameDuration),
    matchups,
  };
}
