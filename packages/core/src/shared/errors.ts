/**
 * Error types surfaced to callers of the connector.
 *
 * Only configuration problems and failed venue requests interrupt an
 * operation; everything else is reported on the brokerage message channel.
 */
export class BrokerageError extends Error {
  constructor(message: string, public readonly venue?: string) {
    super(message);
    this.name = 'BrokerageError';
  }
}

/** Missing credentials, unknown symbols, malformed settings */
export class ConfigurationError extends BrokerageError {
  constructor(message: string, venue?: string) {
    super(message, venue);
    this.name = 'ConfigurationError';
  }
}

export class RequestFailedError extends BrokerageError {
  constructor(
    public readonly endpoint: string,
    public readonly status: number,
    public readonly body: string,
    public readonly transportError: string,
    venue?: string,
  ) {
    super(
      `${venue ?? 'venue'} request ${endpoint} failed: [${status}] ${transportError}, Content: ${body.slice(0, 200)}`,
      venue,
    );
    this.name = 'RequestFailedError';
  }
}

export class UnsupportedOperationError extends BrokerageError {
  constructor(message: string, venue?: string) {
    super(message, venue);
    this.name = 'UnsupportedOperationError';
  }
}

export class SessionError extends BrokerageError {
  constructor(message: string, venue?: string) {
    super(message, venue);
    this.name = 'SessionError';
  }
}
