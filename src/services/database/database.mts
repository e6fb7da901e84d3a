import type {
  CreateIndexesOptions,
  Filter,
  IndexSpecification,
  UpdateFilter,
  UpdateOptions,
} from "mongodb";
import type { LogService } from "../log/types.mjs";
import type { FollowedPlayer, FollowedPlayerDocument } from "./types/followed_player.mjs";
import { readFollowedPlayerDocument } from "./types/followed_player.mjs";

/**
 * The part of a MongoDB `Collection<FollowedPlayerDocument>` this service relies on.
 */
export interface FollowedPlayerCollection {
  find(filter: Filter<FollowedPlayerDocument>): { toArray(): Promise<Readonly<Record<string, unknown>>[]> };
  updateOne(
    filter: Filter<FollowedPlayerDocument>,
    update: UpdateFilter<FollowedPlayerDocument>,
    options?: UpdateOptions,
  ): Promise<unknown>;
  deleteOne(filter: Filter<FollowedPlayerDocument>): Promise<unknown>;
  createIndex(indexSpec: IndexSpecification, options?: CreateIndexesOptions): Promise<unknown>;
}

export interface DatabaseServiceOpts {
  logService: LogService;
  followedPlayers: FollowedPlayerCollection;
}

export class DatabaseService {
  private readonly logService: LogService;
  private readonly followedPlayers: FollowedPlayerCollection;

  constructor({ logService, followedPlayers }: DatabaseServiceOpts) {
    this.logService = logService;
    this.followedPlayers = followedPlayers;
  }

  async ensureIndexes(): Promise<void> {
    await this.followedPlayers.createIndex({ puuid: 1, guildId: 1 }, { unique: true, name: "puuid_guildId_unique" });
  }

  async getFollowedPlayers(): Promise<FollowedPlayer[]> {
    return this.findFollowedPlayers({});
  }

  async getFollowedPlayersForGuild(guildId: string): Promise<FollowedPlayer[]> {
    return this.findFollowedPlayers({ guildId });
  }

  /**
   * Following a player again from the same guild refreshes the existing document. The stored match id is only set
   * on insert, so a match played before the refresh is still reported.
   */
  async upsertFollowedPlayer(player: FollowedPlayer): Promise<void> {
    const { puuid, guildId, lastMatchId, ...fields } = player;

    await this.followedPlayers.updateOne(
      { puuid, guildId },
      { $set: fields, $setOnInsert: { lastMatchId } },
      { upsert: true },
    );
  }

  async updateLastMatchId(puuid: string, guildId: string, lastMatchId: string): Promise<void> {
    await this.followedPlayers.updateOne({ puuid, guildId }, { $set: { lastMatchId } });
  }

  async deleteFollowedPlayer(puuid: string, guildId: string): Promise<void> {
    await this.followedPlayers.deleteOne({ puuid, guildId });
  }

  private async findFollowedPlayers(filter: Filter<FollowedPlayerDocument>): Promise<FollowedPlayer[]> {
    const documents = await this.followedPlayers.find(filter).toArray();
    const players: FollowedPlayer[] = [];

    for (const document of documents) {
      const player = readFollowedPlayerDocument(document);
      if (player == null) {
        this.logService.warn("Skipping malformed followed player document", new Map([["id", String(document["_id"])]]));
        continue;
      }

      players.push(player);
    }

    return players;
  }
}
