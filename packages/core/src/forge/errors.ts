/**
 * Custom Error Classes for the Forge collaborator
 */

/**
 * Semantic error codes that abstract HTTP status codes.
 */
export type ForgeApiErrorCode =
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'INVALID_RESPONSE';

/**
 * Typed error for forge API operations.
 */
export class ForgeApiError extends Error {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: ForgeApiErrorCode,
    /** HTTP status code (if applicable) */
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'ForgeApiError';
    Object.setPrototypeOf(this, ForgeApiError.prototype);
  }
}

/**
 * Error thrown when a named forge object does not exist
 * (milestone by title, release by tag).
 */
export class ForgeObjectNotFoundError extends ForgeApiError {
  constructor(kind: string, name: string) {
    super(`${kind} not found: ${name}`, 'NOT_FOUND', 404);
    this.name = 'ForgeObjectNotFoundError';
    Object.setPrototypeOf(this, ForgeObjectNotFoundError.prototype);
  }
}

type OctokitRequestErrorLike = Error & {
  status: number;
  response?: { data?: unknown };
};

/**
 * Type guard: checks if an error is an Octokit RequestError (duck-typing).
 * Avoids a runtime import of @octokit/request-error.
 */
export function isOctokitRequestError(error: unknown): error is OctokitRequestErrorLike {
  return error instanceof Error && 'status' in error && typeof error.status === 'number';
}

/**
 * Raw response body of a failed request, for logging.
 */
export function responseBody(error: unknown): string {
  if (!isOctokitRequestError(error) || error.response?.data === undefined) {
    return '';
  }
  const data = error.response.data;
  return typeof data === 'string' ? data : JSON.stringify(data);
}

/**
 * Maps Octokit RequestError (and unknown errors) to ForgeApiError.
 */
export function mapOctokitError(error: unknown, context: string): ForgeApiError {
  if (error instanceof ForgeApiError) {
    return error;
  }
  if (isOctokitRequestError(error)) {
    const status = error.status;

    if (status === 401 || status === 403) {
      return new ForgeApiError(`Permission denied: ${context}`, 'PERMISSION_DENIED', status);
    }
    if (status === 404) {
      return new ForgeApiError(`Not found: ${context}`, 'NOT_FOUND', status);
    }
    if (status === 409) {
      return new ForgeApiError(`Conflict: ${context}`, 'CONFLICT', status);
    }
    if (status === 422) {
      return new ForgeApiError(`Validation failed: ${context}`, 'CONFLICT', status);
    }
    if (status >= 500) {
      return new ForgeApiError(`Server error (${status}): ${context}`, 'SERVER_ERROR', status);
    }

    return new ForgeApiError(`GitHub API error (${status}): ${context}`, 'SERVER_ERROR', status);
  }

  // Network / unknown errors
  const message = error instanceof Error ? error.message : String(error);
  return new ForgeApiError(`Network error: ${message}`, 'NETWORK_ERROR');
}
