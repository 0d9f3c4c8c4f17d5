export class ListwatchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ListwatchError';
  }
}

export class ConfigError extends ListwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends ListwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class SourceError extends ListwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

export class FetchError extends ListwatchError {
  constructor(message: string, details?: Record<string, unknown>, code = 'FETCH_ERROR') {
    super(message, code, details);
    this.name = 'FetchError';
  }
}

/** The page did not answer within its budget. */
export class FetchTimeoutError extends FetchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'FETCH_TIMEOUT');
    this.name = 'FetchTimeoutError';
  }
}

/** The page loaded but held no listing cards. */
export class FetchEmptyError extends FetchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'FETCH_EMPTY');
    this.name = 'FetchEmptyError';
  }
}

export class DeliveryError extends ListwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DELIVERY_ERROR', details);
    this.name = 'DeliveryError';
  }
}
