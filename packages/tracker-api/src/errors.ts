/**
 * Error taxonomy of the tracker client.
 *
 * Every public operation either resolves with a typed value or rejects with
 * one of these classes. Transport-level transience is retried inside the
 * Connection and only surfaces as ConnectionFailedError once retries run out.
 */

export type TrackerErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'AUTHENTICATION_ERROR'
  | 'SERVER_ERROR'
  | 'CONNECTION_FAILED'
  | 'SERVER_UNREACHABLE'
  | 'INCOMPATIBLE_SERVER'
  | 'GRAPHQL_ERROR'
  | 'INVALID_HIERARCHY'
  | 'INVALID_CHANGE'
  | 'ENTITY_NOT_FOUND'
  | 'CIRCULAR_DEPENDENCY'
  | 'SESSION_STATE'
  | 'FAILED_OPERATIONS';

/**
 * Base error class for client errors
 */
export class TrackerApiError extends Error {
  constructor(
    message: string,
    public readonly code: TrackerErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Missing or invalid server address or credential
 */
export class ConfigurationError extends TrackerApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

/**
 * 4xx response from a REST call, carries the server supplied detail
 */
export class ServerError extends TrackerApiError {
  constructor(
    public readonly status: number,
    public readonly detail: string,
    public readonly path: string,
    code: TrackerErrorCode = 'SERVER_ERROR'
  ) {
    super(`Server rejected request to '${path}' (${status}): ${detail}`, code, {
      status,
      detail,
      path,
    });
  }
}

/**
 * Credential rejected by the server (401/403)
 */
export class AuthenticationError extends ServerError {
  constructor(status: number, detail: string, path: string) {
    super(status, detail, path, 'AUTHENTICATION_ERROR');
  }
}

/**
 * Transient failures exhausted the retry policy
 */
export class ConnectionFailedError extends TrackerApiError {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastStatus: number | null,
    code: TrackerErrorCode = 'CONNECTION_FAILED'
  ) {
    super(message, code, { attempts, lastStatus });
  }
}

/**
 * Server could not be reached while connecting
 */
export class UnreachableServerError extends ConnectionFailedError {
  constructor(baseUrl: string, attempts: number, lastStatus: number | null) {
    super(`Server "${baseUrl}" can't be reached`, attempts, lastStatus, 'SERVER_UNREACHABLE');
  }
}

export class IncompatibleServerError extends TrackerApiError {
  constructor(
    public readonly serverVersion: string,
    public readonly minVersion: string
  ) {
    super(
      `Server version ${serverVersion} is older than required ${minVersion}`,
      'INCOMPATIBLE_SERVER',
      { serverVersion, minVersion }
    );
  }
}

export interface GraphQlErrorEntry {
  message: string;
  path?: Array<string | number>;
  locations?: Array<{ line: number; column: number }>;
}

/**
 * Logical query failure reported inside a 200 GraphQL response
 */
export class GraphQLError extends TrackerApiError {
  constructor(public readonly errors: GraphQlErrorEntry[]) {
    super(
      `GraphQL query failed: ${errors.map(error => error.message).join('; ')}`,
      'GRAPHQL_ERROR',
      { errors }
    );
  }
}

export class InvalidHierarchyError extends TrackerApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_HIERARCHY', details);
  }
}

/**
 * Change names a field the entity kind does not carry, or a value of the
 * wrong shape
 */
export class InvalidChangeError extends TrackerApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_CHANGE', details);
  }
}

export class EntityNotFoundError extends TrackerApiError {
  constructor(identifier: string) {
    super(`Entity not found: ${identifier}`, 'ENTITY_NOT_FOUND', { identifier });
  }
}

export class CircularDependencyError extends TrackerApiError {
  constructor(public readonly cycles: string[][]) {
    super(
      'Circular dependencies detected:\n' + cycles.map(cycle => cycle.join(' -> ')).join('\n'),
      'CIRCULAR_DEPENDENCY',
      { cycles }
    );
  }
}

export class SessionStateError extends TrackerApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SESSION_STATE', details);
  }
}

/**
 * Batch operations response did not contain per-operation results
 */
export class FailedOperationsError extends TrackerApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FAILED_OPERATIONS', details);
  }
}

/**
 * Extract a readable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
