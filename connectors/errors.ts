/**
 * Connector error taxonomy
 *
 * Upper layers only ever see ConnectorError subclasses. Broker-wrapper errors
 * (BrokerAPIError, BrokerConnectionError) are raised by the HTTP clients and
 * translated at the connector boundary.
 */

export class ConnectorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Network or HTTP failure reaching a broker or its proxy */
export class ConnectionError extends ConnectorError {}

/** 401 / invalid credentials */
export class AuthenticationError extends ConnectorError {}

/** The platform cannot perform the requested action */
export class UnsupportedOperationError extends ConnectorError {}

/** Invalid settings or missing credential records */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Error status returned by a broker gateway */
export class BrokerAPIError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body?: unknown
  ) {
    super(message);
    this.name = 'BrokerAPIError';
  }
}

/** Timeout or transport failure talking to a broker gateway */
export class BrokerConnectionError extends Error {
  constructor(message: string, public readonly original?: unknown) {
    super(message);
    this.name = 'BrokerConnectionError';
  }
}

export interface HttpErrorResponse {
  status: number;
  body: {
    error_code: string;
    detail: Array<{ msg: string; type: string }>;
  };
}

/**
 * Map a connector-layer error to the JSON error shape returned by the API layer.
 * Broker messages are surfaced verbatim.
 */
export function toHttpError(err: unknown): HttpErrorResponse {
  const message = err instanceof Error ? err.message : String(err);

  let status = 500;
  let code = 'internal_error';
  if (err instanceof AuthenticationError) {
    status = 401;
    code = 'authentication_error';
  } else if (err instanceof UnsupportedOperationError) {
    status = 501;
    code = 'unsupported_operation';
  } else if (err instanceof ConnectionError) {
    status = 502;
    code = 'broker_connection_error';
  } else if (err instanceof ConfigurationError) {
    status = 400;
    code = 'configuration_error';
  }

  return {
    status,
    body: {
      error_code: code,
      detail: [{ msg: message, type: code }],
    },
  };
}
