/**
 * Client library for the production-tracking server
 */

export * from './errors';
export * from './constants';
export { LOG_PREFIX, LogChannel, consoleChannel, silentChannel, MemoryChannel, logLine, trackEvent } from './telemetry';

export * from './connection/contracts';
export { Connection, ConnectionOptions, ServerConnection, BatchOperationsOptions } from './connection/connection';
export { loadConnectionConfig, EnvironmentSource } from './connection/config';
export {
  DefaultConnectionAccessor,
  DefaultConnectionAccessorOptions,
  getDefault,
  setDefault,
  resetDefault,
  isDefaultSet,
} from './connection/defaultConnection';
export { RetryPolicy, DEFAULT_RETRY_POLICY, backoffDelay, resolveRetryPolicy } from './connection/retry';
export { parseServerVersion, compareVersions, validateServerVersion } from './connection/serverCompatibility';
export { Transport, TransportRequest, TransportResponse, TransportError, FetchTransport } from './connection/transport';

export * from './entities/hierarchy';
export * from './entities/models';
export { Entity, EntityState, EntityFailure, EntityChanges } from './entities/entity';
export { isTemporaryId, TemporaryIdAllocator } from './entities/identifiers';
export { ProjectEntity, ProjectNode, ProjectStatus } from './entities/project';

export { GraphQlQuery, QueryField, QueryVariable, QueryExecutor } from './graphql/query';
export { entitiesGraphqlQuery, queryEntities, EntityQueryFilters, EntityQueryOptions } from './graphql/queries';

export { Operation, createOperation, toOperationBody } from './operations/operations';
export { OperationsSession, OperationsSessionOptions, OperationResult } from './operations/session';

export { EntityHub, EntityHubOptions, FetchFilters, NewEntityOptions, PendingChanges } from './hub/entity-hub';

export * from './api';
