import type { RESTError, RESTPostAPIChannelMessageJSONBody } from "discord-api-types/v10";
import { APIVersion, Routes } from "discord-api-types/v10";
import type { JsonValue } from "../../base/json.mjs";
import { parseJson } from "../../base/json.mjs";
import { readJsonObject, readNumber, readString } from "../../base/json-readers.mjs";
import type { JsonAny, LogService } from "../log/types.mjs";
import { DiscordError } from "./discord-error.mjs";

export interface DiscordServiceOpts {
  token: string;
  logService: LogService;
  fetch: typeof fetch;
  requestTimeoutMs: number;
}

export interface CreatedMessage {
  id: string;
  channelId: string;
}

/**
 * Rate limit information for a specific path
 * https://github.com/discord/discord-api-docs/blob/main/docs/topics/Rate_Limits.md
 */
interface RateLimit {
  /**
   * The number of remaining requests that can be made
   */
  remaining: number | undefined;

  /**
   * Epoch time (seconds since 00:00:00 UTC on January 1, 1970) at which the rate limit resets
   */
  reset: number | undefined;

  /**
   * Total time (in seconds) of when the current rate limit bucket will reset
   */
  resetAfter: number | undefined;
}

function readRestErrorBody(body: string): RESTError | null {
  let object: ReturnType<typeof readJsonObject>;
  try {
    object = readJsonObject(parseJson(body));
  } catch {
    // not every error body is JSON, e.g. from a proxy in front of the API
    return null;
  }

  const code = readNumber(object?.["code"]);
  const message = readString(object?.["message"]);
  if (code == null || message == null) {
    return null;
  }

  return { code, message };
}

export class DiscordService {
  private readonly token: string;
  private readonly logService: LogService;
  private readonly globalFetch: typeof fetch;
  private readonly requestTimeoutMs: number;
  private readonly rateLimits = new Map<string, RateLimit>();

  constructor({ token, logService, fetch, requestTimeoutMs }: DiscordServiceOpts) {
    this.token = token;
    this.logService = logService;
    this.globalFetch = fetch;
    this.requestTimeoutMs = requestTimeoutMs;
  }

  async createMessage(channel: string, data: RESTPostAPIChannelMessageJSONBody): Promise<CreatedMessage> {
    const response = await this.fetch(Routes.channelMessages(channel), {
      method: "POST",
      body: JSON.stringify(data),
    });

    const message = readJsonObject(response);
    return {
      id: readString(message?.["id"]) ?? "",
      channelId: readString(message?.["channel_id"]) ?? channel,
    };
  }

  private async fetch(
    path: string,
    options: { method: "GET" | "POST" | "PATCH" | "DELETE"; body?: string },
    retry = false,
  ): Promise<JsonValue> {
    const rateLimit = this.rateLimits.get(path);
    if (rateLimit?.remaining === 0 && rateLimit.reset != null) {
      const timeUntilReset = rateLimit.reset * 1000 - Date.now();
      if (timeUntilReset > 0) {
        this.logService.debug("Waiting for Discord rate limit reset", new Map([["timeUntilReset", timeUntilReset]]));
        await new Promise((resolve) => setTimeout(resolve, timeUntilReset));
      }
    }

    const url = new URL(`/api/v${APIVersion}${path}`, "https://discord.com");
    const headers = new Headers();
    headers.set("Authorization", `Bot ${this.token}`);
    headers.set("content-type", "application/json;charset=UTF-8");

    this.logService.debug(
      "Discord API request",
      new Map([
        ["method", options.method],
        ["url", url.toString()],
      ]),
    );

    const response = await this.globalFetch(url.toString(), {
      method: options.method,
      body: options.body ?? null,
      headers,
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });
    const rateLimitFromResponse = this.getRateLimitFromResponse(response);
    if (rateLimitFromResponse.reset != null) {
      this.rateLimits.set(path, rateLimitFromResponse);
    }

    const body = await response.text();
    if (!response.ok) {
      if (response.status === 429 && !retry) {
        this.logService.warn(
          "Discord API rate limit hit",
          new Map<string, JsonAny>([
            ["path", path],
            ["status", response.status],
          ]),
        );
        const waitMs = (rateLimitFromResponse.resetAfter ?? 1) * 1000;
        await new Promise((resolve) => setTimeout(resolve, waitMs));

        return this.fetch(path, options, true);
      }

      const restError = readRestErrorBody(body);
      const error =
        restError != null
          ? new DiscordError(response.status, restError)
          : new Error(`Failed to fetch data from Discord API (HTTP ${response.status.toString()}): ${body}`);
      this.logService.warn(error);

      throw error;
    }

    if (body === "") {
      return null;
    }

    const data = parseJson(body);
    this.logService.debug("Discord API response", new Map([["data", body]]));
    return data;
  }

  private getRateLimitFromHeader(headers: Headers, key: string): number | undefined {
    const value = headers.get(key);
    if (value == null) {
      return undefined;
    }

    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }

  private getRateLimitFromResponse(response: Response): RateLimit {
    const { headers } = response;

    return {
      remaining: this.getRateLimitFromHeader(headers, "X-RateLimit-Remaining"),
      reset: this.getRateLimitFromHeader(headers, "X-RateLimit-Reset"),
      resetAfter: this.getRateLimitFromHeader(headers, "X-RateLimit-Reset-After"),
    };
  }
}
