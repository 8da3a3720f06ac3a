export class TransportError extends Error {
  url: string;
  status?: number;
  attempts: number;

  constructor(
    message: string,
    url: string,
    attempts: number,
    options?: { status?: number; cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'TransportError';
    this.url = url;
    this.attempts = attempts;
    this.status = options?.status;
  }
}

export class ConfigurationError extends Error {
  details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

export class MalformedLinkError extends Error {
  relationUrl: string;

  constructor(message: string, relationUrl: string) {
    super(message);
    this.name = 'MalformedLinkError';
    this.relationUrl = relationUrl;
  }
}

export class UnexpectedResponseError extends Error {
  url: string;

  constructor(message: string, url: string) {
    super(message);
    this.name = 'UnexpectedResponseError';
    this.url = url;
  }
}
