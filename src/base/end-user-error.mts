interface EndUserErrorOptions {
  title?: string;
  errorType?: EndUserErrorType;
  innerError?: Error;
  data?: Record<string, string>;
}

export enum EndUserErrorType {
  ERROR = "error",
  WARNING = "warning",
}

/**
 * An error whose message is safe to show to the person who made the request.
 */
export class EndUserError extends Error {
  readonly endUserMessage: string;
  readonly title: string;
  readonly errorType: EndUserErrorType;
  readonly data: Record<string, string>;

  constructor(
    endUserMessage: string,
    { title = "Something went wrong", errorType = EndUserErrorType.ERROR, innerError, data = {} }: EndUserErrorOptions = {},
  ) {
    super(innerError?.message ?? endUserMessage, { cause: innerError });
    this.name = "EndUserError";
    this.endUserMessage = endUserMessage;
    this.title = title;
    this.errorType = errorType;
    this.data = data;
  }
}
