export type FetchErrorOptions = {
  statusCode?: number;
  body?: string;
  cause?: unknown;
};

export class FetchError extends Error {
  readonly statusCode?: number;
  readonly body?: string;

  constructor(
    readonly trackingNumber: string,
    message: string,
    options: FetchErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.statusCode = options.statusCode;
    this.body = options.body;
  }
}

export function toFetchError(trackingNumber: string, error: unknown): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new FetchError(trackingNumber, message, { cause: error });
}
