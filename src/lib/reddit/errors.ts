export class FetchError extends Error {
  public readonly code: string;
  public readonly url: string;

  constructor(code: string, message: string, url: string, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'FetchError';
    this.code = code;
    this.url = url;
  }
}

export class FetchConnectionError extends FetchError {
  constructor(url: string, cause?: Error) {
    super('thread.connection_error', `Unable to reach ${url}`, url, cause);
    this.name = 'FetchConnectionError';
  }
}

export class FetchStatusError extends FetchError {
  public readonly status: number;

  constructor(url: string, status: number) {
    super('thread.status_error', `Thread request to ${url} failed with status ${status}`, url);
    this.name = 'FetchStatusError';
    this.status = status;
  }
}

export class FetchParseError extends FetchError {
  constructor(url: string, cause?: Error) {
    super('thread.parse_error', `Thread response from ${url} is not valid JSON`, url, cause);
    this.name = 'FetchParseError';
  }
}

export class MissingFieldError extends Error {
  public readonly code = 'THREAD_MISSING_FIELD';
  public readonly field: string;

  constructor(field: string) {
    super(`Thread JSON is missing expected field "${field}"`);
    this.name = 'MissingFieldError';
    this.field = field;
    Object.setPrototypeOf(this, MissingFieldError.prototype);
  }
}
