// Classification failures are always absorbed by the keyword fallback.
export class ClassificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClassificationError';
  }
}

/** A delivery attempt failed in a way worth retrying. */
export class DeliveryError extends Error {
  constructor(
    message: string,
    readonly statusCode: number | null = null
  ) {
    super(message);
    this.name = 'DeliveryError';
  }
}

export class TransportError extends DeliveryError {
  constructor(message: string) {
    super(`Request error: ${message}`);
    this.name = 'TransportError';
  }
}

export class HttpStatusError extends DeliveryError {
  constructor(statusCode: number, responseText: string) {
    super(`HTTP error ${statusCode}: ${responseText}`, statusCode);
    this.name = 'HttpStatusError';
  }
}

export class CircuitOpenError extends Error {
  constructor(readonly endpoint: string) {
    super(`Circuit breaker open for ${endpoint}`);
    this.name = 'CircuitOpenError';
  }
}
