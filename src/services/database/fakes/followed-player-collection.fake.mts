import type { Filter, UpdateFilter, UpdateOptions } from "mongodb";
import type { FollowedPlayerCollection } from "../database.mjs";
import type { FollowedPlayerDocument } from "../types/followed_player.mjs";

type StoredDocument = Record<string, unknown>;

/**
 * In-process stand-in for the MongoDB collection. Filters support field equality only.
 */
export class FakeFollowedPlayerCollection implements FollowedPlayerCollection {
  readonly documents: StoredDocument[] = [];
  readonly indexes: unknown[] = [];
  private nextId = 1;

  insert(...documents: StoredDocument[]): void {
    for (const document of documents) {
      this.documents.push({ _id: `fake-id-${(this.nextId++).toString()}`, ...document });
    }
  }

  find(filter: Filter<FollowedPlayerDocument>): { toArray(): Promise<StoredDocument[]> } {
    const matches = this.documents.filter((document) => this.matches(document, filter)).map((document) => ({ ...document }));

    return {
      toArray: async () => Promise.resolve(matches),
    };
  }

  async updateOne(
    filter: Filter<FollowedPlayerDocument>,
    update: UpdateFilter<FollowedPlayerDocument>,
    options: UpdateOptions = {},
  ): Promise<{ matchedCount: number; upsertedCount: number }> {
    const index = this.documents.findIndex((document) => this.matches(document, filter));
    const existing = this.documents[index];
    if (existing) {
      this.documents[index] = { ...existing, ...update.$set };
      return Promise.resolve({ matchedCount: 1, upsertedCount: 0 });
    }

    if (options.upsert === true) {
      this.insert({ ...Object.fromEntries(Object.entries(filter)), ...update.$setOnInsert, ...update.$set });
      return Promise.resolve({ matchedCount: 0, upsertedCount: 1 });
    }

    return Promise.resolve({ matchedCount: 0, upsertedCount: 0 });
  }

  async deleteOne(filter: Filter<FollowedPlayerDocument>): Promise<{ deletedCount: number }> {
    const index = this.documents.findIndex((document) => this.matches(document, filter));
    if (index === -1) {
      return Promise.resolve({ deletedCount: 0 });
    }

    this.documents.splice(index, 1);
    return Promise.resolve({ deletedCount: 1 });
  }

  async createIndex(indexSpec: unknown): Promise<string> {
    this.indexes.push(indexSpec);
    return Promise.resolve("fake-index");
  }

  private matches(document: StoredDocument, filter: Filter<FollowedPlayerDocument>): boolean {
    return Object.entries(filter).every(([key, value]) => document[key] === value);
  }
}
