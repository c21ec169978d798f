import axios from 'axios';

interface SpotifyErrorBody {
  error?: string | { status?: number; message?: string };
  error_description?: string;
}

/**
 * Raised for values outside an accepted set, before any request is made.
 */
export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    public readonly validValues?: readonly string[]
  ) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Raised when no access token could be obtained.
 */
export class AuthenticationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

/**
 * Wraps a failed Spotify API call with the operation that was attempted.
 */
export class RemoteOperationError extends Error {
  constructor(
    public readonly operation: string,
    cause: unknown
  ) {
    super(`Failed to ${operation}: ${describeError(cause)}`, { cause });
    this.name = 'RemoteOperationError';
  }
}

/**
 * Human-readable reason for an error, using the Spotify error payload when there is one.
 */
export function describeError(error: unknown): string {
  if (axios.isAxiosError<SpotifyErrorBody>(error) && error.response) {
    const body = error.response.data;
    const status = error.response.status;

    if (body && typeof body === 'object') {
      if (typeof body.error === 'object' && body.error.message) {
        return `${body.error.message} (${status})`;
      }
      if (typeof body.error === 'string') {
        return body.error_description
          ? `${body.error}: ${body.error_description} (${status})`
          : `${body.error} (${status})`;
      }
    }
    return `${error.message} (${status})`;
  }

  if (error instanceof Error) return error.message;
  return String(error);
}
