/** Base class for every failure raised by the Caddy admin API client. */
export abstract class CaddyClientError extends Error {}

/** The HTTP exchange itself failed: connection refused, DNS, abort or timeout. */
export class TransportError extends CaddyClientError {
  readonly name = "TransportError" as const;
  constructor(
    public readonly method: string,
    public readonly url: string,
    cause: unknown,
  ) {
    super(`${method} ${url} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

/** A request body could not be serialized, or a response body was not the expected JSON. */
export class EncodingError extends CaddyClientError {
  readonly name = "EncodingError" as const;
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

/** Caddy answered with a non-2xx status that is not a documented not-found case. */
export class BackendError extends CaddyClientError {
  readonly name = "BackendError" as const;
  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`Caddy admin API returned status ${status}: ${body}`);
  }
}

/** The route, or the server's route array, does not exist. */
export class NotFoundError extends CaddyClientError {
  readonly name = "NotFoundError" as const;
  constructor(what: string) {
    super(`${what} not found`);
  }
}
