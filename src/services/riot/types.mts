export type PlatformId =
  | "euw1"
  | "eun1"
  | "tr1"
  | "ru"
  | "na1"
  | "br1"
  | "la1"
  | "la2"
  | "oc1"
  | "kr"
  | "jp1"
  | "ph2"
  | "sg2"
  | "th2"
  | "tw2"
  | "vn2";

/** Routing values used by Account-V1 and Match-V5 */
export type RegionalRoute = "europe" | "americas" | "asia" | "sea";

const PLATFORM_TO_REGIONAL_ROUTE: Readonly<Record<PlatformId, RegionalRoute>> = {
  euw1: "europe",
  eun1: "europe",
  tr1: "europe",
  ru: "europe",
  na1: "americas",
  br1: "americas",
  la1: "americas",
  la2: "americas",
  oc1: "sea",
  kr: "asia",
  jp1: "asia",
  ph2: "sea",
  sg2: "sea",
  th2: "sea",
  tw2: "sea",
  vn2: "sea",
};

export function isPlatformId(value: string): value is PlatformId {
  return Object.hasOwn(PLATFORM_TO_REGIONAL_ROUTE, value);
}

export function platformToRegionalRoute(platform: PlatformId): RegionalRoute {
  return PLATFORM_TO_REGIONAL_ROUTE[platform];
}

/**
 * Match ids carry their platform as a prefix, e.g. `EUW1_7012345678`.
 */
export function regionalRouteFromMatchId(matchId: string): RegionalRoute {
  const [prefix = ""] = matchId.split("_");
  const platform = prefix.toLowerCase();
  if (!isPlatformId(platform)) {
    throw new Error(`Unable to determine platform from match id "${matchId}"`);
  }

  return platformToRegionalRoute(platform);
}

export interface RiotAccount {
  puuid: string;
  gameName: string | undefined;
  tagLine: string | undefined;
}

export interface RiotSummoner {
  id: string | undefined;
  puuid: string;
}

export type TeamPosition = "TOP" | "JUNGLE" | "MIDDLE" | "BOTTOM" | "UTILITY";

export interface MatchParticipant {
  puuid: string;
  summonerId: string | undefined;
  summonerName: string;
  riotIdGameName: string;
  championName: string;
  teamId: number;
  teamPosition: string;
  win: boolean;
  kills: number;
  deaths: number;
  assists: number;
  totalMinionsKilled: number;
  neutralMinionsKilled: number;
  goldEarned: number;
  visionScore: number;
}

export interface MatchDetail {
  matchId: string;
  queueId: number;
  /** seconds */
  gameDuration: number;
  gameEndTimestamp: number | undefined;
  participants: MatchParticipant[];
}

/** One ranked queue entry from League-V4, e.g. `RANKED_SOLO_5x5` */
export interface LeagueEntry {
  queueType: string;
  tier: string;
  rank: string;
  leaguePoints: number;
  wins: number;
  losses: number;
}

export interface ChampionMastery {
  championId: number;
  championLevel: number;
  championPoints: number;
}
