export class PaginationLimitError extends Error {
  override readonly name = 'PaginationLimitError';

  constructor(
    readonly limit: number,
    readonly url: string,
    message?: string,
  ) {
    super(
      message ??
        `Possible infinite loop detected: continuation link still present after ${limit} additional page fetches (next: ${url})`,
    );
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface ServiceRequestErrorDetails {
  url: string;
  status?: number;
  body?: string;
  cause?: unknown;
}

export class ServiceRequestError extends Error {
  override readonly name = 'ServiceRequestError';
  readonly url: string;
  readonly status: number | undefined;
  readonly body: string | undefined;
  override readonly cause: unknown;

  constructor(message: string, details: ServiceRequestErrorDetails) {
    super(message);
    this.url = details.url;
    this.status = details.status;
    this.body = details.body;
    this.cause = details.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ResponseFormatError extends Error {
  override readonly name = 'ResponseFormatError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
