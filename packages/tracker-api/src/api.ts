/**
 * Convenience wrappers over the default connection.
 *
 * These are the only call sites of the Default Connection Accessor. Code
 * that manages its own Connection should call the Connection, EntityHub or
 * query helpers directly.
 */

import type { BatchOperationsOptions } from './connection/connection';
import type { OperationBody, OperationResultBody, ServerInfo } from './connection/contracts';
import { getDefault } from './connection/defaultConnection';
import type { EntityRecord } from './entities/models';
import { EntityQueryFilters, EntityQueryOptions, queryEntities } from './graphql/queries';
import { EntityHub, EntityHubOptions } from './hub/entity-hub';

export async function getServerInfo(): Promise<ServerInfo> {
  const connection = await getDefault();
  return connection.getServerInfo();
}

export async function getProject(projectName: string): Promise<Record<string, unknown>> {
  const connection = await getDefault();
  return connection.getProject(projectName);
}

export async function getFolders(
  projectName: string,
  filters?: EntityQueryFilters,
  options?: EntityQueryOptions
): Promise<EntityRecord[]> {
  return queryEntities(await getDefault(), projectName, 'folder', filters, options);
}

export async function getTasks(
  projectName: string,
  filters?: EntityQueryFilters,
  options?: EntityQueryOptions
): Promise<EntityRecord[]> {
  return queryEntities(await getDefault(), projectName, 'task', filters, options);
}

export async function getProducts(
  projectName: string,
  filters?: EntityQueryFilters,
  options?: EntityQueryOptions
): Promise<EntityRecord[]> {
  return queryEntities(await getDefault(), projectName, 'product', filters, options);
}

export async function getVersions(
  projectName: string,
  filters?: EntityQueryFilters,
  options?: EntityQueryOptions
): Promise<EntityRecord[]> {
  return queryEntities(await getDefault(), projectName, 'version', filters, options);
}

export async function getRepresentations(
  projectName: string,
  filters?: EntityQueryFilters,
  options?: EntityQueryOptions
): Promise<EntityRecord[]> {
  return queryEntities(await getDefault(), projectName, 'representation', filters, options);
}

/**
 * EntityHub bound to the default connection
 */
export async function createEntityHub(projectName: string, options?: EntityHubOptions): Promise<EntityHub> {
  return new EntityHub(await getDefault(), projectName, options);
}

export async function sendBatchOperations(
  projectName: string,
  operations: OperationBody[],
  options?: BatchOperationsOptions
): Promise<OperationResultBody[]> {
  const connection = await getDefault();
  return connection.sendBatchOperations(projectName, operations, options);
}
