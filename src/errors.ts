export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class ConnectError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectError';
  }
}

export class QueryError extends Error {
  constructor(
    message: string,
    readonly identity: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'QueryError';
  }
}

/**
 * The log service answered, but had nothing for the player. `body` is the raw
 * response text, kept for diagnostics.
 */
export class NoResultsError extends Error {
  constructor(
    readonly identity: string,
    readonly body: string,
  ) {
    super(`No logs found for player ${identity}`);
    this.name = 'NoResultsError';
  }
}

export class DeliveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeliveryError';
  }
}
