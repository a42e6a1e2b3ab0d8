/**
 * Non-2xx response from the Letta server.
 */
export class LettaApiError extends Error {
  public readonly status: number;
  public readonly body: string;

  constructor(status: number, body: string, operation: string) {
    super(`Letta ${operation} failed with HTTP ${status}: ${body.slice(0, 300)}`);
    this.name = "LettaApiError";
    this.status = status;
    this.body = body;
  }
}

/**
 * The request never produced a response: connection refused, DNS, timeout.
 */
export class LettaNetworkError extends Error {
  public readonly timedOut: boolean;

  constructor(message: string, timedOut: boolean, options?: { cause?: unknown }) {
    super(message);
    this.name = "LettaNetworkError";
    this.timedOut = timedOut;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
