/**
 * Error taxonomy shared by the daemon and the client.
 *
 * Temporary errors are retried by the retry executor, permanent ones are
 * surfaced immediately. A circuit-open error is neither: it means the caller
 * was refused before any call was made.
 */

export class UpstreamApiError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(`API error: status ${statusCode} - ${message}`);
    this.name = "UpstreamApiError";
    this.statusCode = statusCode;
  }
}

export class NetworkTimeoutError extends Error {
  constructor(message = "Network request timed out") {
    super(message);
    this.name = "NetworkTimeoutError";
  }
}

export class CircuitOpenError extends Error {
  readonly circuit: string;

  constructor(circuit: string) {
    super(`Circuit breaker is open for ${circuit}`);
    this.name = "CircuitOpenError";
    this.circuit = circuit;
  }
}

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestValidationError";
  }
}

export class UnknownProviderError extends Error {
  readonly provider: string;
  readonly available: readonly string[];

  constructor(provider: string, available: readonly string[]) {
    super(
      `LLM provider '${provider}' is not supported or not configured. Available providers: ${
        available.length > 0 ? available.join(", ") : "none"
      }`
    );
    this.name = "UnknownProviderError";
    this.provider = provider;
    this.available = available;
  }
}

export function isTemporaryError(error: unknown): boolean {
  if (error instanceof NetworkTimeoutError) {
    return true;
  }
  if (error instanceof UpstreamApiError) {
    return (
      error.statusCode === 429 ||
      (error.statusCode >= 500 && error.statusCode < 600)
    );
  }
  return false;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
