/**
 * Credentials were rejected or the token endpoint could not be reached.
 * Terminal for the request that needed the token.
 */
export class AuthenticationError extends Error {
  constructor(message: string = 'Failed to authenticate with the LLM service') {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/**
 * Network-level failure (connection refused, DNS, timeout). No HTTP status was received.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}
