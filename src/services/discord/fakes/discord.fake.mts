import { aFakeLogServiceWith } from "../../log/fakes/log.fake.mjs";
import type { DiscordServiceOpts } from "../discord.mjs";
import { DiscordService } from "../discord.mjs";

async function fakeFetch(): Promise<Response> {
  return Promise.resolve(new Response(JSON.stringify({ id: "fake-message-id", channel_id: "fake-channel" })));
}

export function aFakeDiscordServiceWith(opts: Partial<DiscordServiceOpts> = {}): DiscordService {
  return new DiscordService({
    token: "DISCORD_TOKEN",
    logService: aFakeLogServiceWith(),
    fetch: fakeFetch,
    requestTimeoutMs: 5000,
    ...opts,
  });
}
