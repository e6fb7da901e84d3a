import { isAfter } from "date-fns";
import type { DatabaseService } from "../database/database.mjs";
import type { FollowedPlayer } from "../database/types/followed_player.mjs";
import type { DiscordService } from "../discord/discord.mjs";
import type { JsonAny, LogService } from "../log/types.mjs";
import type { RiotService } from "../riot/riot.mjs";
import type { MatchSummary } from "../riot/match-summary.mjs";
import { getMatchSummary } from "../riot/match-summary.mjs";
import { FollowMatchEmbed } from "../../embeds/follow-match-embed.mjs";
import { UnreachableError } from "../../base/unreachable-error.mjs";
import type { FollowOutcome, MatchCheck, NotificationResult, PassResult } from "./types.mjs";
import { anEmptyPassResult } from "./types.mjs";

export interface FollowTrackerServiceOpts {
  logService: LogService;
  databaseService: DatabaseService;
  riotService: RiotService;
  discordService: DiscordService;
}

export interface RunPassOpts {
  now?: Date;
  signal?: AbortSignal;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class FollowTrackerService {
  private readonly logService: LogService;
  private readonly databaseService: DatabaseService;
  private readonly riotService: RiotService;
  private readonly discordService: DiscordService;

  constructor({ logService, databaseService, riotService, discordService }: FollowTrackerServiceOpts) {
    this.logService = logService;
    this.databaseService = databaseService;
    this.riotService = riotService;
    this.discordService = discordService;
  }

  /**
   * One pass over every followed player. Players are handled one at a time and a failure only affects its own player.
   */
  async runPass({ now = new Date(), signal }: RunPassOpts = {}): Promise<PassResult> {
    const result = anEmptyPassResult();

    let players: FollowedPlayer[];
    try {
      players = await this.databaseService.getFollowedPlayers();
    } catch (error) {
      this.logService.error(toError(error), new Map([["stage", "enumerate"]]));
      return result;
    }

    for (const [index, player] of players.entries()) {
      if (signal?.aborted === true) {
        result.skipped = players.length - index;
        this.logService.info("Follow pass aborted", new Map([["skipped", result.skipped]]));
        break;
      }

      const outcome = await this.processFollowedPlayer(player, now, signal);
      result[outcome] += 1;
      result.processed += 1;
    }

    this.logService.info("Follow pass completed", new Map(Object.entries(result)));
    return result;
  }

  /**
   * An abort interrupts the Riot calls in flight, including a rate limit wait. The record is left as it was.
   */
  async processFollowedPlayer(player: FollowedPlayer, now: Date, signal?: AbortSignal): Promise<FollowOutcome> {
    const context = this.getLogContext(player);

    try {
      if (isAfter(now, player.expiresAt)) {
        await this.databaseService.deleteFollowedPlayer(player.puuid, player.guildId);
        this.logService.info("Follow expired", context);
        return "expired";
      }

      const check = await this.checkForNewMatch(player, signal);
      if (!check.changed) {
        return "unchanged";
      }

      const match = await this.riotService.getMatch(check.matchId, signal);
      const summary = getMatchSummary(match, player);
      if (summary == null) {
        this.logService.warn(
          "Followed player not found in their latest match",
          new Map<string, JsonAny>([...context, ["matchId", check.matchId]]),
        );
        await this.databaseService.updateLastMatchId(player.puuid, player.guildId, check.matchId);
        return "ignored";
      }

      return await this.notify(player, summary, context);
    } catch (error) {
      if (signal?.aborted === true) {
        this.logService.info("Follow check aborted", context);
        return "failed";
      }

      this.logService.error(toError(error), context);
      return "failed";
    }
  }

  async checkForNewMatch(player: FollowedPlayer, signal?: AbortSignal): Promise<MatchCheck> {
    const latestMatchId = await this.riotService.getLatestMatchId(player.region, player.puuid, signal);
    if (latestMatchId == null || latestMatchId === player.lastMatchId) {
      return { changed: false };
    }

    return { changed: true, matchId: latestMatchId };
  }

  async sendNotification(player: FollowedPlayer, summary: MatchSummary): Promise<NotificationResult> {
    const embed = new FollowMatchEmbed({ playerName: player.gameName, summary });

    try {
      const message = await this.discordService.createMessage(player.channelId, { embeds: [embed.embed] });
      return { status: "sent", messageId: message.id };
    } catch (error) {
      return { status: "failed", error: toError(error) };
    }
  }

  private async notify(
    player: FollowedPlayer,
    summary: MatchSummary,
    context: ReadonlyMap<string, JsonAny>,
  ): Promise<FollowOutcome> {
    const notification = await this.sendNotification(player, summary);

    switch (notification.status) {
      case "sent": {
        try {
          await this.databaseService.updateLastMatchId(player.puuid, player.guildId, summary.matchId);
        } catch (error) {
          // the next pass sees the same match as new and posts it again
          this.logService.error(toError(error), new Map<string, JsonAny>([...context, ["matchId", summary.matchId]]));
        }
        this.logService.info("Posted new match", new Map<string, JsonAny>([...context, ["matchId", summary.matchId]]));
        return "notified";
      }
      case "failed": {
        this.logService.error(notification.error, new Map<string, JsonAny>([...context, ["matchId", summary.matchId]]));
        return "failed";
      }
      default: {
        throw new UnreachableError(notification);
      }
    }
  }

  private getLogContext(player: FollowedPlayer): ReadonlyMap<string, JsonAny> {
    return new Map<string, JsonAny>([
      ["puuid", player.puuid],
      ["guildId", player.guildId],
      ["channelId", player.channelId],
      ["player", `${player.gameName}#${player.tagLine}`],
    ]);
  }
}
