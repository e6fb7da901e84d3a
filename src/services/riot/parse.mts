import type { JsonObject, JsonValue } from "../../base/json.mjs";
import {
  readBoolean,
  readJsonArray,
  readJsonObject,
  readNumber,
  readString,
  readStringArray,
} from "../../base/json-readers.mjs";
import { ParseError } from "./riot-error.mjs";
import type {
  ChampionMastery,
  LeagueEntry,
  MatchDetail,
  MatchParticipant,
  RiotAccount,
  RiotSummoner,
} from "./types.mjs";

function fail(message: string, value: JsonValue): never {
  throw new ParseError(message, JSON.stringify(value).slice(0, 500));
}

function requireObject(value: JsonValue | undefined, what: string): JsonObject {
  return readJsonObject(value) ?? fail(`Expected ${what} to be an object`, value ?? null);
}

function requireString(object: JsonObject, key: string, what: string): string {
  return readString(object[key]) ?? fail(`Expected ${what}.${key} to be a string`, object);
}

export function parseAccount(value: JsonValue): RiotAccount {
  const account = requireObject(value, "account");

  return {
    puuid: requireString(account, "puuid", "account"),
    gameName: readString(account["gameName"]) ?? undefined,
    tagLine: readString(account["tagLine"]) ?? undefined,
  };
}

export function parseSummoner(value: JsonValue): RiotSummoner {
  const summoner = requireObject(value, "summoner");

  return {
    id: readString(summoner["id"]) ?? undefined,
    puuid: requireString(summoner, "puuid", "summoner"),
  };
}

export function parseMatchIds(value: JsonValue): string[] {
  return readStringArray(value) ?? fail("Expected match ids to be an array of strings", value);
}

function parseParticipant(value: JsonValue): MatchParticipant {
  const participant = requireObject(value, "participant");
  const teamId = readNumber(participant["teamId"]) ?? fail("Expected participant.teamId to be a number", participant);
  const stat = (key: string): number => readNumber(participant[key]) ?? 0;

  return {
    puuid: requireString(participant, "puuid", "participant"),
    summonerId: readString(participant["summonerId"]) ?? undefined,
    summonerName: readString(participant["summonerName"]) ?? "",
    riotIdGameName: readString(participant["riotIdGameName"]) ?? "",
    championName: readString(participant["championName"]) ?? "",
    teamId,
    teamPosition: readString(participant["teamPosition"]) ?? "",
    win: readBoolean(participant["win"]) ?? false,
    kills: stat("kills"),
    deaths: stat("deaths"),
    assists: stat("assists"),
    totalMinionsKilled: stat("totalMinionsKilled"),
    neutralMinionsKilled: stat("neutralMinionsKilled"),
    goldEarned: stat("goldEarned"),
    visionScore: stat("visionScore"),
  };
}

export function parseMatch(value: JsonValue): MatchDetail {
  const match = requireObject(value, "match");
  const metadata = requireObject(match["metadata"], "match.metadata");
  const info = requireObject(match["info"], "match.info");
  const participants = readJsonArray(info["participants"]) ?? fail("Expected match.info.participants", info);
  const gameEndTimestamp = readNumber(info["gameEndTimestamp"]) ?? undefined;
  const rawDuration = readNumber(info["gameDuration"]) ?? 0;

  return {
    matchId: requireString(metadata, "matchId", "match.metadata"),
    queueId: readNumber(info["queueId"]) ?? -1,
    // older matches without gameEndTimestamp report the duration in milliseconds
    gameDuration: gameEndTimestamp == null ? Math.floor(rawDuration / 1000) : rawDuration,
    gameEndTimestamp,
    participants: participants.map(parseParticipant),
  };
}

function parseLeagueEntry(value: JsonValue): LeagueEntry {
  const entry = requireObject(value, "league entry");

  return {
    queueType: requireString(entry, "queueType", "league entry"),
    tier: readString(entry["tier"]) ?? "Unranked",
    rank: readString(entry["rank"]) ?? "",
    leaguePoints: readNumber(entry["leaguePoints"]) ?? 0,
    wins: readNumber(entry["wins"]) ?? 0,
    losses: readNumber(entry["losses"]) ?? 0,
  };
}

export function parseLeagueEntries(value: JsonValue): LeagueEntry[] {
  const entries = readJsonArray(value) ?? fail("Expected league entries to be an array", value);

  return entries.map(parseLeagueEntry);
}

function parseChampionMastery(value: JsonValue): ChampionMastery {
  const mastery = requireObject(value, "champion mastery");

  return {
    championId:
      readNumber(mastery["championId"]) ?? fail("Expected champion mastery.championId to be a number", mastery),
    championLevel: readNumber(mastery["championLevel"]) ?? 0,
    championPoints: readNumber(mastery["championPoints"]) ?? 0,
  };
}

export function parseChampionMasteries(value: JsonValue): ChampionMastery[] {
  const masteries = readJsonArray(value) ?? fail("Expected champion masteries to be an array", value);

  return masteries.map(parseChampionMastery);
}
