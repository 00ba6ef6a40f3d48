export class UvcError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UvcError';
  }
}

export class ConfigurationError extends UvcError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidArgumentError extends UvcError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * A name the caller passed does not exist: an unknown channel, or a picture
 * setting the camera does not have.
 */
export class LookupError extends InvalidArgumentError {
  public readonly key: string;

  constructor(message: string, key: string) {
    super(message);
    this.name = 'LookupError';
    this.key = key;
  }
}

export class UvcApiError extends UvcError {
  public readonly statusCode?: number;
  public readonly body?: string;
  public readonly isAuthError: boolean;
  public readonly isNotFound: boolean;

  constructor(message: string, statusCode?: number, body?: string) {
    super(message);
    this.name = 'UvcApiError';
    this.statusCode = statusCode;
    this.body = body;
    this.isAuthError = statusCode === 401 || statusCode === 403;
    this.isNotFound = statusCode === 404;
  }
}

/** The NVR answered 2xx but the payload is not the shape the client reads. */
export class UvcResponseError extends UvcError {
  constructor(message: string) {
    super(message);
    this.name = 'UvcResponseError';
  }
}
