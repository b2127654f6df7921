/**
 * Operations Session
 *
 * Ordered batch of create/update/delete operations submitted in one request.
 * The server executes each operation on its own, so a commit is best effort:
 * every operation gets an independent result and nothing is rolled back.
 *
 * A session is submitted once; afterwards it only serves as a record of
 * what was sent and what the server answered.
 */

import type { ServerConnection } from '../connection/connection';
import type { OperationResultBody, OperationType } from '../connection/contracts';
import { SessionStateError } from '../errors';
import type { EntityKind } from '../entities/hierarchy';
import { isTemporaryId, TemporaryIdAllocator } from '../entities/identifiers';
import { consoleChannel, LogChannel, trackEvent } from '../telemetry';
import {
  createOperation,
  Operation,
  referencedIds,
  rewriteOperationIdentifier,
  toOperationBody,
} from './operations';

export interface OperationsSessionOptions {
  /** Server keeps processing after a failed operation (default true) */
  canFail?: boolean;
  /** Allocator shared with the caller that hands out temporary identifiers */
  idAllocator?: TemporaryIdAllocator;
  log?: LogChannel;
}

export interface OperationResult {
  operationId: string;
  type: OperationType;
  entityType: EntityKind;
  /** Server identifier for successful creates, submitted identifier otherwise */
  entityId: string;
  /** Identifier the operation was submitted with */
  submittedEntityId: string;
  success: boolean;
  detail: string | null;
}

export class OperationsSession {
  readonly canFail: boolean;
  private readonly queue: Operation[] = [];
  private readonly createdIds = new Set<string>();
  private readonly assigned = new Map<string, string>();
  private readonly idAllocator: TemporaryIdAllocator;
  private readonly log: LogChannel;
  private submitted = false;
  private results: OperationResult[] | null = null;

  constructor(
    private readonly connection: ServerConnection,
    readonly projectName: string,
    options: OperationsSessionOptions = {}
  ) {
    this.canFail = options.canFail ?? true;
    this.idAllocator = options.idAllocator ?? new TemporaryIdAllocator();
    this.log = options.log ?? consoleChannel;
  }

  get operations(): readonly Operation[] {
    return this.queue;
  }

  get isSubmitted(): boolean {
    return this.submitted;
  }

  /**
   * Results of the submission, null before commit()
   */
  getResults(): OperationResult[] | null {
    return this.results ? [...this.results] : null;
  }

  /**
   * Server identifier assigned to a temporary identifier in this session
   */
  getAssignedId(temporaryId: string): string | undefined {
    return this.assigned.get(temporaryId);
  }

  /**
   * Queue a create. Without an identifier a temporary one is allocated.
   */
  create(entityType: EntityKind, data: Record<string, unknown>, entityId?: string): Operation {
    return this.add(createOperation('create', entityType, entityId ?? this.idAllocator.next(), data));
  }

  update(entityType: EntityKind, entityId: string, data: Record<string, unknown>): Operation {
    return this.add(createOperation('update', entityType, entityId, data));
  }

  delete(entityType: EntityKind, entityId: string): Operation {
    return this.add(createOperation('delete', entityType, entityId));
  }

  /**
   * Append an operation. Every temporary identifier it references must be
   * created by an operation already in the session.
   */
  add(operation: Operation): Operation {
    this.assertOpen();

    if (operation.type === 'create' && this.createdIds.has(operation.entityId)) {
      throw new SessionStateError(`Entity '${operation.entityId}' is already created in this session`, {
        operationId: operation.id,
        entityId: operation.entityId,
      });
    }

    const references = referencedIds(operation);
    if (operation.type !== 'create') {
      references.push(operation.entityId);
    }
    for (const reference of references) {
      if (isTemporaryId(reference) && !this.createdIds.has(reference)) {
        throw new SessionStateError(
          `Operation '${operation.type}' on ${operation.entityType} '${operation.entityId}' references ` +
            `'${reference}' before it is created`,
          { operationId: operation.id, reference }
        );
      }
    }

    if (operation.type === 'create') {
      this.createdIds.add(operation.entityId);
    }
    this.queue.push(operation);
    return operation;
  }

  /**
   * Submit all operations. Resolves with one result per operation in
   * submission order; failures are reported there, not thrown.
   */
  async commit(): Promise<OperationResult[]> {
    this.assertOpen();
    this.submitted = true;

    if (this.queue.length === 0) {
      this.results = [];
      return [];
    }

    const bodies = this.queue.map(toOperationBody);
    const responses = await this.connection.sendBatchOperations(this.projectName, bodies, {
      canFail: this.canFail,
    });
    const byId = new Map<string, OperationResultBody>(responses.map(response => [response.id, response]));

    const results: OperationResult[] = this.queue.map(operation => {
      const response = byId.get(operation.id);
      const success = response?.success ?? false;
      const assignedId = operation.type === 'create' && success ? response?.entityId : undefined;
      return {
        operationId: operation.id,
        type: operation.type,
        entityType: operation.entityType,
        entityId: assignedId ?? operation.entityId,
        submittedEntityId: operation.entityId,
        success,
        detail: response ? response.detail ?? null : 'Server returned no result for the operation',
      };
    });

    for (const result of results) {
      if (result.entityId !== result.submittedEntityId) {
        this.rewriteIdentifier(result.submittedEntityId, result.entityId);
      }
    }

    this.results = results;
    const failed = results.filter(result => !result.success).length;
    trackEvent(this.log, 'session.committed', {
      project: this.projectName,
      operations: results.length,
      failed,
    });
    return [...results];
  }

  /**
   * Replace a temporary identifier everywhere in the queued operations
   */
  rewriteIdentifier(temporaryId: string, assignedId: string): void {
    this.assigned.set(temporaryId, assignedId);
    for (const operation of this.queue) {
      rewriteOperationIdentifier(operation, temporaryId, assignedId);
    }
  }

  private assertOpen(): void {
    if (this.submitted) {
      throw new SessionStateError('Operations session was already submitted', {
        projectName: this.projectName,
      });
    }
  }
}
