export class RiotError extends Error {
  public readonly httpStatus: number;
  public readonly body: string;
  public readonly retryAfterMs: number | undefined;

  public constructor(httpStatus: number, body: string, retryAfterMs?: number) {
    super(`Riot API Error (HTTP ${httpStatus.toString()}): ${body.slice(0, 300)}`);

    this.name = "RiotError";
    this.httpStatus = httpStatus;
    this.body = body;
    this.retryAfterMs = retryAfterMs;
  }
}

export class ParseError extends Error {
  public readonly payload: string;

  public constructor(message: string, payload: string) {
    super(message);

    this.name = "ParseError";
    this.payload = payload;
  }
}
