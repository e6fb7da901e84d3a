import type { PlatformId } from "../../riot/types.mjs";
import { isPlatformId } from "../../riot/types.mjs";

/**
 * One document per (player, guild) pair. The same player followed from two guilds is two documents.
 */
export interface FollowedPlayerDocument {
  puuid: string;
  summonerId: string;
  gameName: string;
  tagLine: string;
  region: PlatformId;
  /** Empty until the player has played at least one match */
  lastMatchId: string;
  expiresAt: Date;
  channelId: string;
  guildId: string;
}

export type FollowedPlayer = FollowedPlayerDocument;

export const FOLLOWED_PLAYERS_COLLECTION = "followed_players";

function readField(document: Readonly<Record<string, unknown>>, key: string): string | null {
  const value = document[key];
  return typeof value === "string" ? value : null;
}

/**
 * Documents are written by this service only, but older or hand-edited ones may not match the current shape.
 */
export function readFollowedPlayerDocument(document: Readonly<Record<string, unknown>>): FollowedPlayerDocument | null {
  const puuid = readField(document, "puuid");
  const summonerId = readField(document, "summonerId");
  const gameName = readField(document, "gameName");
  const tagLine = readField(document, "tagLine");
  const region = readField(document, "region");
  const lastMatchId = readField(document, "lastMatchId");
  const channelId = readField(document, "channelId");
  const guildId = readField(document, "guildId");
  const { expiresAt } = document;

  if (
    puuid == null ||
    summonerId == null ||
    gameName == null ||
    tagLine == null ||
    region == null ||
    !isPlatformId(region) ||
    lastMatchId == null ||
    channelId == null ||
    guildId == null ||
    !(expiresAt instanceof Date) ||
    Number.isNaN(expiresAt.getTime())
  ) {
    return null;
  }

  return { puuid, summonerId, gameName, tagLine, region, lastMatchId, expiresAt, channelId, guildId };
}
