export type NotFoundResource = 'character' | 'stories' | 'story';

export interface CommunicationErrorDetails {
  status?: number;
  cause?: unknown;
}

/**
 * Transport failure, timeout, non-2xx status, or a body that is not a
 * valid API envelope. `url` is the endpoint without signing parameters.
 */
export class CommunicationError extends Error {
  readonly kind = 'communication' as const;
  readonly status?: number;

  constructor(
    public readonly url: string,
    message: string,
    details: CommunicationErrorDetails = {},
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'CommunicationError';
    this.status = details.status;
  }
}

/** A well-formed response that matched nothing. */
export class NotFoundError extends Error {
  readonly kind = 'not-found' as const;

  constructor(
    public readonly resource: NotFoundResource,
    public readonly query: string | number,
  ) {
    super(notFoundMessage(resource, query));
    this.name = 'NotFoundError';
  }
}

function notFoundMessage(resource: NotFoundResource, query: string | number): string {
  switch (resource) {
    case 'character':
      return `No character found for ${JSON.stringify(query)}`;
    case 'stories':
      return `Character ${query} did not return any stories`;
    case 'story':
      return `Story ${query} does not exist`;
  }
}

export type ApiClientError = CommunicationError | NotFoundError;

export function isApiClientError(error: unknown): error is ApiClientError {
  return error instanceof CommunicationError || error instanceof NotFoundError;
}
