import { addHours, differenceInMinutes, isAfter } from "date-fns";
import { EndUserError, EndUserErrorType } from "../../base/end-user-error.mjs";
import type { DatabaseService } from "../database/database.mjs";
import type { FollowedPlayer } from "../database/types/followed_player.mjs";
import type { LogService } from "../log/types.mjs";
import type { RiotService } from "../riot/riot.mjs";
import { RiotError } from "../riot/riot-error.mjs";
import type { PlatformId, RiotAccount } from "../riot/types.mjs";

export const MIN_FOLLOW_HOURS = 1;
export const MAX_FOLLOW_HOURS = 48;

export interface FollowServiceOpts {
  logService: LogService;
  databaseService: DatabaseService;
  riotService: RiotService;
}

export interface FollowPlayerRequest {
  gameName: string;
  tagLine: string;
  region: PlatformId;
  hours: number;
  guildId: string;
  channelId: string;
}

export interface GuildFollow {
  puuid: string;
  name: string;
  tag: string;
  expiresAt: Date;
  timeRemaining: string;
}

function plural(count: number, unit: string): string {
  return `${count.toString()} ${unit}${count === 1 ? "" : "s"}`;
}

export function formatTimeRemaining(expiresAt: Date, now: Date): string {
  if (!isAfter(expiresAt, now)) {
    return "Follow ended";
  }

  const totalMinutes = differenceInMinutes(expiresAt, now);

  const days = Math.floor(totalMinutes / (24 * 60));
  const hours = Math.floor(totalMinutes / 60) % 24;
  const minutes = totalMinutes % 60;

  if (days > 0) {
    return hours > 0 ? `in ${plural(days, "day")} and ${plural(hours, "hour")}` : `in ${plural(days, "day")}`;
  }
  if (hours > 0) {
    return `in ${plural(hours, "hour")}`;
  }
  if (minutes > 0) {
    return `in ${plural(minutes, "minute")}`;
  }

  return "less than a minute";
}

export class FollowService {
  private readonly logService: LogService;
  private readonly databaseService: DatabaseService;
  private readonly riotService: RiotService;

  constructor({ logService, databaseService, riotService }: FollowServiceOpts) {
    this.logService = logService;
    this.databaseService = databaseService;
    this.riotService = riotService;
  }

  /**
   * The stored match id is the player's latest match at follow time, so only matches finished afterwards are posted.
   */
  async followPlayer(request: FollowPlayerRequest, now = new Date()): Promise<FollowedPlayer> {
    const { gameName, tagLine, region, hours, guildId, channelId } = request;

    if (!Number.isInteger(hours) || hours < MIN_FOLLOW_HOURS || hours > MAX_FOLLOW_HOURS) {
      throw new EndUserError(
        `Follow duration must be a whole number of hours between ${MIN_FOLLOW_HOURS.toString()} and ${MAX_FOLLOW_HOURS.toString()}`,
        { title: "Invalid duration", data: { Hours: hours.toString() } },
      );
    }

    const account = await this.getAccount(gameName, tagLine, region);
    const summoner = await this.riotService.getSummonerByPuuid(region, account.puuid);
    const lastMatchId = await this.riotService.getLatestMatchId(region, account.puuid);

    const player: FollowedPlayer = {
      puuid: account.puuid,
      summonerId: summoner.id ?? "",
      gameName: account.gameName ?? gameName,
      tagLine: account.tagLine ?? tagLine,
      region,
      lastMatchId: lastMatchId ?? "",
      expiresAt: addHours(now, hours),
      channelId,
      guildId,
    };

    await this.databaseService.upsertFollowedPlayer(player);
    this.logService.info(
      "Followed player",
      new Map([
        ["puuid", player.puuid],
        ["guildId", guildId],
        ["expiresAt", player.expiresAt.toISOString()],
      ]),
    );

    return player;
  }

  async getGuildFollows(guildId: string, now = new Date()): Promise<GuildFollow[]> {
    const players = await this.databaseService.getFollowedPlayersForGuild(guildId);

    return players.map((player) => ({
      puuid: player.puuid,
      name: player.gameName,
      tag: player.tagLine,
      expiresAt: player.expiresAt,
      timeRemaining: formatTimeRemaining(player.expiresAt, now),
    }));
  }

  async unfollowPlayer(puuid: string, guildId: string): Promise<void> {
    await this.databaseService.deleteFollowedPlayer(puuid, guildId);
    this.logService.info(
      "Unfollowed player",
      new Map([
        ["puuid", puuid],
        ["guildId", guildId],
      ]),
    );
  }

  private async getAccount(
    gameName: string,
    tagLine: string,
    region: PlatformId,
  ): Promise<RiotAccount> {
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
