/**
 * Operation Types
 *
 * Operations represent pending create/update/delete requests against the
 * server. They are queued in an OperationsSession and submitted together.
 */

import { v4 as uuidv4 } from 'uuid';
import type { OperationBody, OperationType } from '../connection/contracts';
import type { EntityKind } from '../entities/hierarchy';

/**
 * Fields of an operation payload that hold identifiers of other entities
 */
export const REFERENCE_FIELDS = ['parentId', 'folderId', 'productId', 'versionId', 'taskId'] as const;

export type ReferenceField = (typeof REFERENCE_FIELDS)[number];

export interface Operation {
  /** Unique identifier for this operation */
  id: string;

  /** ISO timestamp when operation was created */
  ts: string;

  type: OperationType;

  entityType: EntityKind;

  /** Target entity, a temporary identifier for creates of new entities */
  entityId: string;

  /** Operation-specific payload data, empty for deletes */
  data: Record<string, unknown>;
}

/**
 * Helper to create a new operation with defaults
 */
export function createOperation(
  type: OperationType,
  entityType: EntityKind,
  entityId: string,
  data: Record<string, unknown> = {},
  id?: string
): Operation {
  return {
    id: id ?? uuidv4().replace(/-/g, ''),
    ts: new Date().toISOString(),
    type,
    entityType,
    entityId,
    data,
  };
}

/**
 * Wire shape of an operation
 */
export function toOperationBody(operation: Operation): OperationBody {
  const body: OperationBody = {
    id: operation.id,
    type: operation.type,
    entityType: operation.entityType,
    entityId: operation.entityId,
  };
  if (operation.type !== 'delete') {
    body.data = operation.data;
  }
  return body;
}

/**
 * Identifiers of other entities the operation points at
 */
export function referencedIds(operation: Operation): string[] {
  const ids: string[] = [];
  for (const field of REFERENCE_FIELDS) {
    const value = operation.data[field];
    if (typeof value === 'string') {
      ids.push(value);
    }
  }
  return ids;
}

/**
 * Substitute an identifier in the target and reference fields
 */
export function rewriteOperationIdentifier(operation: Operation, previousId: string, nextId: string): void {
  if (operation.entityId === previousId) {
    operation.entityId = nextId;
  }
  for (const field of REFERENCE_FIELDS) {
    if (operation.data[field] === previousId) {
      operation.data[field] = nextId;
    }
  }
}
