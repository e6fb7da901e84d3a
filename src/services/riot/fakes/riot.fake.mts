import { aFakeLogServiceWith } from "../../log/fakes/log.fake.mjs";
import type { RiotServiceOpts } from "../riot.mjs";
import { RiotService } from "../riot.mjs";

async function fakeFetch(): Promise<Response> {
  return Promise.resolve(new Response("[]"));
}

export function aFakeRiotServiceWith(opts: Partial<RiotServiceOpts> = {}): RiotService {
  return new RiotService({
    apiKey: "RIOT_API_KEY",
    logService: aFakeLogServiceWith(),
    fetch: fakeFetch,
    requestTimeoutMs: 5000,
    ...opts,
  });
}
