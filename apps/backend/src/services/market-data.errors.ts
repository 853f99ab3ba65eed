const RATE_LIMIT_PATTERNS = [
  /\b429\b/,
  /too many requests/i,
  /unexpected token/i,
  /unexpected end of json/i,
  /is not valid json/i,
  /expecting value/i,
];

/**
 * The provider refused or garbled a request in a way that says "back off":
 * throttling, a non-JSON body, or no history at all. Ingestion switches to
 * synthetic data when it sees one.
 */
export class MarketDataUnavailableError extends Error {
  constructor(
    readonly symbol: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${symbol}: ${message}`, options);
    this.name = "MarketDataUnavailableError";
  }
}

function statusCodeOf(error: object): number | undefined {
  const candidate = "code" in error ? error.code : "status" in error ? error.status : undefined;
  return typeof candidate === "number" ? candidate : undefined;
}

export function isRateLimitLike(error: unknown): boolean {
  if (error instanceof MarketDataUnavailableError) {
    return true;
  }
  if (typeof error === "object" && error !== null && statusCodeOf(error) === 429) {
    return true;
  }
  const message = error instanceof Error ? error.message : String(error);
  return RATE_LIMIT_PATTERNS.some((pattern) => pattern.test(message));
}
