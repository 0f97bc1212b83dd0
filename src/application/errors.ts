/**
 * Error kinds surfaced by the cache and its collaborators.
 *
 * Each kind maps to one recovery path: transport errors stop ingestion,
 * decode errors reject a single message, validation and registry errors
 * fail a single request.
 */

/** The broker connection, consumer group or a read/ack failed. */
export class BrokerTransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BrokerTransportError';
  }
}

/** A message body is not a valid event envelope. */
export class EventDecodeError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = 'EventDecodeError';
  }
}

/** Query input is malformed; distinct from a query that matches nothing. */
export class QueryValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'QueryValidationError';
  }
}

/** The device registry could not be reached or answered with garbage. */
export class DeviceRegistryError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DeviceRegistryError';
  }
}
