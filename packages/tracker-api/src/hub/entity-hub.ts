/**
 * EntityHub
 *
 * Locally editable mirror of one project's entity tree. The hub fetches
 * entities through GraphQL, validates every structural edit against the
 * hierarchy table, and persists the accumulated diff as one operations
 * session.
 *
 * A hub is meant for a single owner; it has no internal locking.
 */

import type { ServerConnection } from '../connection/connection';
import {
  CircularDependencyError,
  EntityNotFoundError,
  InvalidHierarchyError,
  ServerError,
  SessionStateError,
} from '../errors';
import { Entity, EntityChanges } from '../entities/entity';
import { ENTITY_HIERARCHY, ENTITY_KINDS, EntityKind, PROJECT_ROOT } from '../entities/hierarchy';
import { isTemporaryId, TemporaryIdAllocator } from '../entities/identifiers';
import { emptyValues, EntityRecord, EntityValues, replaceReferences } from '../entities/models';
import { ProjectEntity, ProjectNode } from '../entities/project';
import { queryEntities } from '../graphql/queries';
import { DependencyGraph, DependencyType } from '../operations/dependency-graph';
import { createOperation } from '../operations/operations';
import { OperationResult, OperationsSession } from '../operations/session';
import { consoleChannel, LogChannel, trackEvent } from '../telemetry';

export interface EntityHubOptions {
  log?: LogChannel;
  /** Page size of GraphQL queries */
  pageSize?: number;
  /** Fields queried per kind, defaults are used for kinds not listed */
  fields?: Partial<Record<EntityKind, string[]>>;
}

export interface FetchFilters {
  /** Kinds to fetch, all by default */
  kinds?: EntityKind[];
  ids?: string[];
  parentIds?: string[];
}

export interface NewEntityOptions {
  label?: string | null;
  subtype?: string | null;
  status?: string | null;
  tags?: string[];
  active?: boolean;
  data?: Record<string, unknown>;
  assignees?: string[];
  version?: number | null;
  taskId?: string | null;
}

export interface PendingChanges {
  created: Entity[];
  updated: Entity[];
  deleted: Entity[];
}

export class EntityHub {
  private readonly entitiesById = new Map<string, Entity>();
  // parent id (null for project root) -> child ids in insertion order
  private readonly childrenIndex = new Map<string | null, Set<string>>();
  private readonly idAllocator = new TemporaryIdAllocator();
  // moved entity id -> (version id -> task link cleared by the move)
  private readonly clearedTaskLinks = new Map<string, Map<string, string>>();
  private projectEntity: ProjectEntity | null = null;
  private readonly log: LogChannel;
  private readonly pageSize: number | undefined;
  private readonly fields: Partial<Record<EntityKind, string[]>>;

  constructor(
    readonly connection: ServerConnection,
    readonly projectName: string,
    options: EntityHubOptions = {}
  ) {
    this.log = options.log ?? consoleChannel;
    this.pageSize = options.pageSize;
    this.fields = options.fields ?? {};
  }

  /**
   * Project anatomy, null until fetchProject() was called
   */
  get project(): ProjectEntity | null {
    return this.projectEntity;
  }

  /**
   * Load folder types, task types and statuses of the project. From then on
   * addNew() and updateEntity() validate subtypes and statuses against them.
   */
  async fetchProject(): Promise<ProjectEntity> {
    const data = await this.connection.getProject(this.projectName);
    const parsed = ProjectNode.safeParse(data);
    if (!parsed.success) {
      throw new ServerError(200, 'Malformed project response', `projects/${this.projectName}`);
    }
    const { features } = await this.connection.getServerInfo();
    this.projectEntity = new ProjectEntity(parsed.data, features.statusScope);
    return this.projectEntity;
  }

  // ---------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------

  get(id: string): Entity | undefined {
    return this.entitiesById.get(id);
  }

  /**
   * Direct children of an entity, or root folders for null
   */
  getChildren(id: string | null): Entity[] {
    const childIds = this.childrenIndex.get(id);
    if (!childIds) {
      return [];
    }
    const children: Entity[] = [];
    for (const childId of childIds) {
      const child = this.entitiesById.get(childId);
      if (child) {
        children.push(child);
      }
    }
    return children;
  }

  entities(): Entity[] {
    return [...this.entitiesById.values()];
  }

  /**
   * Entity by id, querying the server when it is not loaded yet
   */
  async getOrQuery(id: string): Promise<Entity | undefined> {
    const existing = this.entitiesById.get(id);
    if (existing || isTemporaryId(id)) {
      return existing;
    }
    for (const kind of ENTITY_KINDS) {
      const records = await this.queryKind(kind, { ids: [id] });
      const record = records.find(candidate => candidate.id === id);
      if (record) {
        return this.mergeRecord(record);
      }
    }
    return undefined;
  }

  /**
   * Path of the entity from the project root, e.g. "/shots/sh010/compositing".
   * Null when an ancestor is not loaded.
   */
  getPath(id: string): string | null {
    return this.resolvePath(this.requireEntity(id));
  }

  pendingChanges(): PendingChanges {
    const changes: PendingChanges = { created: [], updated: [], deleted: [] };
    for (const entity of this.entitiesById.values()) {
      switch (entity.state) {
        case 'new':
          changes.created.push(entity);
          break;
        case 'dirty':
          changes.updated.push(entity);
          break;
        case 'pending-delete':
          changes.deleted.push(entity);
          break;
        default:
          break;
      }
    }
    return changes;
  }

  hasChanges(): boolean {
    const { created, updated, deleted } = this.pendingChanges();
    return created.length + updated.length + deleted.length > 0;
  }

  /**
   * A folder with published content, or with such a folder below it, can't
   * be renamed or moved
   */
  isImmutableForHierarchy(id: string): boolean {
    const entity = this.requireEntity(id);
    return this.collectSubtree(entity, 'pre').some(node => node.kind === 'folder' && node.hasPublishedContent);
  }

  // ---------------------------------------------------------------------
  // Fetch
  // ---------------------------------------------------------------------

  /**
   * Load entities from the server and merge them into the hub.
   *
   * Clean entities are refreshed, entities with local edits keep them.
   * Entities in scope of the filters which the server did not return are
   * pruned together with their subtree, local edits included, unless a new
   * entity sits below them.
   */
  async fetch(filters: FetchFilters = {}): Promise<Entity[]> {
    const requested: readonly EntityKind[] = filters.kinds ?? ENTITY_KINDS;
    const kinds = ENTITY_KINDS.filter(kind => requested.includes(kind));
    const fetched: Entity[] = [];
    let pruned = 0;

    for (const kind of kinds) {
      const records = await this.queryKind(kind, { ids: filters.ids, parentIds: filters.parentIds });
      const returned = new Set<string>();
      for (const record of records) {
        returned.add(record.id);
        fetched.push(this.mergeRecord(record));
      }
      pruned += this.pruneMissing(kind, filters, returned);
    }

    trackEvent(this.log, 'hub.fetched', {
      project: this.projectName,
      kinds,
      entities: fetched.length,
      pruned,
    });
    return fetched;
  }

  // ---------------------------------------------------------------------
  // Local edits
  // ---------------------------------------------------------------------

  /**
   * Create an entity locally under a temporary identifier. Nothing is sent
   * to the server until commitChanges().
   */
  addNew(
    kind: EntityKind,
    name: string,
    parentId: string | null,
    attributes: Record<string, unknown> = {},
    options: NewEntityOptions = {}
  ): Entity {
    this.assertValidParent(kind, parentId);
    this.projectEntity?.validate(kind, { subtype: options.subtype, status: options.status });
    const taskId = options.taskId ?? null;
    if (taskId !== null) {
      this.assertValidTaskLink(parentId, taskId);
    }

    const values: EntityValues = {
      ...emptyValues(name, parentId),
      label: options.label ?? null,
      subtype: options.subtype ?? null,
      status: options.status ?? null,
      tags: options.tags ? [...options.tags] : [],
      active: options.active ?? true,
      attributes: Object.fromEntries(Object.entries(attributes).filter(([, value]) => value !== null)),
      data: options.data ?? {},
      assignees: options.assignees ? [...options.assignees] : [],
      version: options.version ?? null,
      taskId,
    };
    const entity = Entity.createNew(this.idAllocator.next(), kind, values);
    this.register(entity);
    return entity;
  }

  /**
   * Apply changes to an entity. A parent change is validated against the
   * hierarchy table and for cycles, then the tree is relinked and derived
   * context below the entity is invalidated.
   */
  updateEntity(id: string, changes: EntityChanges): Entity {
    const entity = this.requireEntity(id);
    if (entity.isPendingDelete) {
      throw new SessionStateError(`${entity.level.displayName} '${id}' is marked for deletion`, { entityId: id });
    }

    const previousParentId = entity.parentId;
    const nextParentId = changes.parentId !== undefined ? changes.parentId : previousParentId;
    const renamed = changes.name !== undefined && changes.name !== entity.name;
    if ((renamed || nextParentId !== previousParentId) && this.isImmutableForHierarchy(id)) {
      throw new InvalidHierarchyError(
        `${entity.level.displayName} '${id}' has published content and cannot be renamed or moved`,
        { entityId: id }
      );
    }
    if (nextParentId !== previousParentId) {
      this.assertValidParent(entity.kind, nextParentId);
      this.assertNoCycle(entity, nextParentId);
    }
    this.projectEntity?.validate(entity.kind, {
      subtype: changes.subtype !== entity.subtype ? changes.subtype : undefined,
      status: changes.status !== entity.status ? changes.status : undefined,
    });
    if (changes.taskId !== undefined && changes.taskId !== null) {
      this.assertValidTaskLink(nextParentId, changes.taskId);
    }

    const changed = entity.applyChanges(changes);
    if (changed.includes('parentId')) {
      this.unlink(entity.id, previousParentId);
      this.link(entity.id, entity.parentId);
      this.dropStaleTaskLinks(entity, changes.taskId !== undefined);
    }
    if (changed.includes('parentId') || changed.includes('name')) {
      this.invalidateSubtree(entity);
    }
    return entity;
  }

  /**
   * Local-only entities are dropped right away. Persisted ones are marked
   * for deletion together with all descendants.
   */
  deleteEntity(id: string): void {
    const entity = this.requireEntity(id);
    for (const node of this.collectSubtree(entity, 'post')) {
      if (node.isNew) {
        this.unregister(node);
      } else {
        node.markPendingDelete();
      }
    }
  }

  /**
   * Give up local changes of an entity: new entities are removed, edits are
   * reverted and a pending delete is withdrawn. Task links a reverted move
   * had cleared are put back.
   */
  discardChanges(id: string): void {
    const entity = this.requireEntity(id);
    entity.failure = null;

    if (entity.isNew) {
      this.discardNewSubtree(entity);
      return;
    }

    if (entity.isPendingDelete) {
      const parent = entity.parentId === null ? undefined : this.entitiesById.get(entity.parentId);
      if (parent?.isPendingDelete) {
        throw new SessionStateError(
          `Cannot restore '${id}' while its parent '${parent.id}' is marked for deletion`,
          { entityId: id, parentId: parent.id }
        );
      }
      for (const node of this.collectSubtree(entity, 'pre')) {
        node.restore();
      }
    }
    this.revertEntity(entity);
  }

  // ---------------------------------------------------------------------
  // Commit
  // ---------------------------------------------------------------------

  /**
   * Persist all pending changes in one operations session: creates (parents
   * first), then updates, then deletes (children first).
   *
   * Partial success is reported through the result list. Failed operations
   * leave their entity in its current set with a failure marker, so the next
   * commit submits them again.
   */
  async commitChanges(): Promise<OperationResult[]> {
    const { created, updated, deleted } = this.pendingChanges();
    if (created.length + updated.length + deleted.length === 0) {
      return [];
    }

    const session = new OperationsSession(this.connection, this.projectName, {
      canFail: true,
      idAllocator: this.idAllocator,
      log: this.log,
    });
    const submitted = new Map<string, EntityValues>();

    const createGraph = new DependencyGraph();
    for (const entity of created) {
      createGraph.addNode({
        id: entity.id,
        type: entity.kind,
        hierarchyLevel: this.depthOf(entity),
        operation: createOperation('create', entity.kind, entity.id, entity.toCreatePayload()),
      });
      submitted.set(entity.id, entity.getValues());
    }
    for (const entity of created) {
      if (entity.parentId !== null && createGraph.hasNode(entity.parentId)) {
        createGraph.addEdge(entity.id, entity.parentId, DependencyType.HIERARCHY);
      }
      if (entity.taskId !== null && createGraph.hasNode(entity.taskId)) {
        createGraph.addEdge(entity.id, entity.taskId, DependencyType.TASK_LINK);
      }
    }
    for (const operation of createGraph.topologicalSort()) {
      session.add(operation);
    }

    for (const entity of updated) {
      session.update(entity.kind, entity.id, entity.toUpdatePayload());
      submitted.set(entity.id, entity.getValues());
    }

    const deleteGraph = new DependencyGraph();
    for (const entity of deleted) {
      deleteGraph.addNode({
        id: entity.id,
        type: entity.kind,
        hierarchyLevel: this.depthOf(entity),
        operation: createOperation('delete', entity.kind, entity.id),
      });
    }
    for (const entity of deleted) {
      if (entity.parentId !== null && deleteGraph.hasNode(entity.parentId)) {
        deleteGraph.addEdge(entity.id, entity.parentId, DependencyType.HIERARCHY);
      }
    }
    for (const operation of deleteGraph.reverseTopologicalSort()) {
      session.add(operation);
    }

    const results = await session.commit();
    this.reconcile(results, submitted);

    trackEvent(this.log, 'hub.committed', {
      project: this.projectName,
      operations: results.length,
      failed: results.filter(result => !result.success).length,
    });
    return results;
  }

  private reconcile(results: OperationResult[], submitted: Map<string, EntityValues>): void {
    for (const result of results) {
      if (result.type === 'create' && result.success && result.entityId !== result.submittedEntityId) {
        this.replaceIdentifier(result.submittedEntityId, result.entityId);
        const values = submitted.get(result.submittedEntityId);
        if (values) {
          submitted.delete(result.submittedEntityId);
          submitted.set(result.entityId, values);
        }
        for (const snapshot of submitted.values()) {
          replaceReferences(snapshot, result.submittedEntityId, result.entityId);
        }
      }
    }

    for (const result of results) {
      const entity = this.entitiesById.get(result.entityId);
      if (!entity) {
        continue;
      }
      if (!result.success) {
        entity.failure = { operation: result.type, reason: result.detail ?? 'Operation failed' };
        continue;
      }
      if (result.type === 'delete') {
        this.unregister(entity);
        continue;
      }
      const values = submitted.get(entity.id);
      if (values) {
        entity.markPersisted(values);
        this.clearedTaskLinks.delete(entity.id);
      }
    }
  }

  // ---------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------

  private queryKind(kind: EntityKind, filters: { ids?: string[]; parentIds?: string[] }): Promise<EntityRecord[]> {
    return queryEntities(this.connection, this.projectName, kind, filters, {
      fields: this.fields[kind],
      pageSize: this.pageSize,
    });
  }

  private mergeRecord(record: EntityRecord): Entity {
    const existing = this.entitiesById.get(record.id);
    if (!existing) {
      const entity = Entity.fromRecord(record);
      this.register(entity);
      return entity;
    }
    if (existing.state !== 'persisted') {
      return existing;
    }

    const previousParentId = existing.parentId;
    const previousName = existing.name;
    existing.refreshFromServer(record);
    this.clearedTaskLinks.delete(existing.id);
    if (existing.parentId !== previousParentId) {
      this.unlink(existing.id, previousParentId);
      this.link(existing.id, existing.parentId);
    }
    if (existing.parentId !== previousParentId || existing.name !== previousName) {
      for (const descendant of this.collectSubtree(existing, 'pre')) {
        if (descendant !== existing) {
          descendant.clearDerivedContext();
        }
      }
    }
    return existing;
  }

  private pruneMissing(kind: EntityKind, filters: FetchFilters, returned: Set<string>): number {
    let pruned = 0;
    for (const entity of [...this.entitiesById.values()]) {
      if (entity.kind !== kind || entity.isNew || returned.has(entity.id)) {
        continue;
      }
      if (!this.entitiesById.has(entity.id)) {
        continue;
      }
      if (filters.ids && !filters.ids.includes(entity.id)) {
        continue;
      }
      const serverParentId = entity.serverParentId;
      if (filters.parentIds && (serverParentId === null || !filters.parentIds.includes(serverParentId))) {
        continue;
      }
      const subtree = this.collectSubtree(entity, 'post');
      if (subtree.every(node => !node.isNew)) {
        for (const node of subtree) {
          this.unregister(node);
          pruned += 1;
        }
      }
    }
    return pruned;
  }

  private requireEntity(id: string): Entity {
    const entity = this.entitiesById.get(id);
    if (!entity) {
      throw new EntityNotFoundError(id);
    }
    return entity;
  }

  private register(entity: Entity): void {
    this.entitiesById.set(entity.id, entity);
    this.link(entity.id, entity.parentId);
  }

  private unregister(entity: Entity): void {
    this.entitiesById.delete(entity.id);
    this.clearedTaskLinks.delete(entity.id);
    this.unlink(entity.id, entity.parentId);
    if (this.childrenIndex.get(entity.id)?.size === 0) {
      this.childrenIndex.delete(entity.id);
    }
  }

  private link(id: string, parentId: string | null): void {
    const children = this.childrenIndex.get(parentId) ?? new Set<string>();
    children.add(id);
    this.childrenIndex.set(parentId, children);
  }

  private unlink(id: string, parentId: string | null): void {
    this.childrenIndex.get(parentId)?.delete(id);
  }

  /**
   * Entity and all descendants, parents before children ('pre') or
   * children before parents ('post')
   */
  private collectSubtree(root: Entity, order: 'pre' | 'post'): Entity[] {
    const result: Entity[] = [];
    const visit = (entity: Entity): void => {
      if (order === 'pre') {
        result.push(entity);
      }
      for (const child of this.getChildren(entity.id)) {
        visit(child);
      }
      if (order === 'post') {
        result.push(entity);
      }
    };
    visit(root);
    return result;
  }

  private depthOf(entity: Entity): number {
    let depth = 0;
    let parentId = entity.parentId;
    const seen = new Set<string>();
    while (parentId !== null && !seen.has(parentId)) {
      seen.add(parentId);
      depth += 1;
      parentId = this.entitiesById.get(parentId)?.parentId ?? null;
    }
    return depth;
  }

  private resolvePath(entity: Entity): string | null {
    if (entity.path !== null) {
      return entity.path;
    }
    let path: string | null;
    if (entity.parentId === null) {
      path = `/${entity.name}`;
    } else {
      const parent = this.entitiesById.get(entity.parentId);
      const parentPath = parent ? this.resolvePath(parent) : null;
      path = parentPath === null ? null : `${parentPath}/${entity.name}`;
    }
    entity.setCachedPath(path);
    return path;
  }

  private invalidateSubtree(entity: Entity): void {
    for (const node of this.collectSubtree(entity, 'pre')) {
      node.clearDerivedContext();
    }
  }

  private revertEntity(entity: Entity): void {
    const previousParentId = entity.parentId;
    const reverted = entity.revert();
    if (reverted.includes('parentId')) {
      this.unlink(entity.id, previousParentId);
      this.link(entity.id, entity.parentId);
      this.restoreTaskLinks(entity);
    }
    if (reverted.includes('parentId') || reverted.includes('name')) {
      this.invalidateSubtree(entity);
    }
  }

  /**
   * Remove a new entity and the new entities below it. Persisted entities
   * moved below it go back to their server parent; only the move is undone.
   */
  private discardNewSubtree(root: Entity): void {
    const created: Entity[] = [];
    const visit = (node: Entity): void => {
      created.push(node);
      for (const child of this.getChildren(node.id)) {
        if (child.isNew) {
          visit(child);
        } else {
          this.returnToServerParent(child);
        }
      }
    };
    visit(root);
    for (const node of created.reverse()) {
      this.unregister(node);
    }
  }

  private returnToServerParent(entity: Entity): void {
    const previousParentId = entity.parentId;
    entity.applyChanges({ parentId: entity.serverParentId });
    this.unlink(entity.id, previousParentId);
    this.link(entity.id, entity.parentId);
    this.restoreTaskLinks(entity);
    this.invalidateSubtree(entity);
  }

  private assertValidParent(kind: EntityKind, parentId: string | null): void {
    if (parentId === null) {
      ENTITY_HIERARCHY.assertCanContain(PROJECT_ROOT, kind);
      return;
    }
    const parent = this.requireEntity(parentId);
    ENTITY_HIERARCHY.assertCanContain(parent.kind, kind);
    if (parent.isPendingDelete) {
      throw new InvalidHierarchyError(`Parent '${parentId}' is marked for deletion`, { parentId });
    }
  }

  private assertNoCycle(entity: Entity, parentId: string | null): void {
    const chain: string[] = [];
    let current = parentId;
    while (current !== null) {
      chain.push(current);
      if (current === entity.id) {
        throw new CircularDependencyError([[entity.id, ...chain]]);
      }
      current = this.entitiesById.get(current)?.parentId ?? null;
    }
  }

  /**
   * A version may only link a task from the folder of its product
   */
  private assertValidTaskLink(productId: string | null, taskId: string): void {
    const task = this.entitiesById.get(taskId);
    if (!task) {
      return;
    }
    if (task.kind !== 'task') {
      throw new InvalidHierarchyError(`Entity '${taskId}' is a ${task.kind}, not a task`, { taskId });
    }
    const product = productId === null ? undefined : this.entitiesById.get(productId);
    if (product && product.parentId !== task.parentId) {
      throw new InvalidHierarchyError(`Task '${taskId}' is not in the folder of product '${product.id}'`, {
        taskId,
        productId: product.id,
      });
    }
  }

  /**
   * After a reparent, clear task links of versions that would point at a
   * task outside the folder of their product. Unknown tasks count as
   * outside.
   */
  private dropStaleTaskLinks(moved: Entity, explicitTaskLink: boolean): void {
    let versions: Entity[] = [];
    if (moved.kind === 'version' && !explicitTaskLink) {
      versions = [moved];
    } else if (moved.kind === 'product') {
      versions = this.getChildren(moved.id);
    } else if (moved.kind === 'task') {
      versions = this.entities().filter(entity => entity.kind === 'version' && entity.taskId === moved.id);
    }

    for (const version of versions) {
      const taskId = version.taskId;
      if (taskId === null || version.isPendingDelete) {
        continue;
      }
      const task = this.entitiesById.get(taskId);
      const product = version.parentId === null ? undefined : this.entitiesById.get(version.parentId);
      if (!task || !product || task.parentId !== product.parentId) {
        version.applyChanges({ taskId: null });
        const cleared = this.clearedTaskLinks.get(moved.id) ?? new Map<string, string>();
        if (!cleared.has(version.id)) {
          cleared.set(version.id, taskId);
        }
        this.clearedTaskLinks.set(moved.id, cleared);
      }
    }
  }

  /**
   * Put back task links cleared when the entity was moved, where the
   * version is still unlinked and the task fits its folder again
   */
  private restoreTaskLinks(moved: Entity): void {
    const cleared = this.clearedTaskLinks.get(moved.id);
    if (!cleared) {
      return;
    }
    this.clearedTaskLinks.delete(moved.id);
    for (const [versionId, taskId] of cleared) {
      const version = this.entitiesById.get(versionId);
      if (!version || version.taskId !== null) {
        continue;
      }
      const task = this.entitiesById.get(taskId);
      const product = version.parentId === null ? undefined : this.entitiesById.get(version.parentId);
      if (task && product && task.parentId !== product.parentId) {
        continue;
      }
      version.applyChanges({ taskId });
    }
  }

  private replaceIdentifier(previousId: string, nextId: string): void {
    const entity = this.entitiesById.get(previousId);
    if (!entity) {
      return;
    }
    this.entitiesById.delete(previousId);
    for (const other of this.entitiesById.values()) {
      other.replaceIdentifier(previousId, nextId);
    }
    entity.replaceIdentifier(previousId, nextId);
    this.entitiesById.set(nextId, entity);
    this.replaceClearedLinkIds(previousId, nextId);

    const children = this.childrenIndex.get(previousId);
    if (children) {
      this.childrenIndex.delete(previousId);
      this.childrenIndex.set(nextId, children);
    }
    const siblings = this.childrenIndex.get(entity.parentId);
    if (siblings?.has(previousId)) {
      this.childrenIndex.set(
        entity.parentId,
        new Set([...siblings].map(siblingId => (siblingId === previousId ? nextId : siblingId)))
      );
    }
  }

  private replaceClearedLinkIds(previousId: string, nextId: string): void {
    const ownLinks = this.clearedTaskLinks.get(previousId);
    if (ownLinks) {
      this.clearedTaskLinks.delete(previousId);
      this.clearedTaskLinks.set(nextId, ownLinks);
    }
    for (const cleared of this.clearedTaskLinks.values()) {
      for (const [versionId, taskId] of [...cleared]) {
        const nextVersionId = versionId === previousId ? nextId : versionId;
        const nextTaskId = taskId === previousId ? nextId : taskId;
        if (nextVersionId !== versionId || nextTaskId !== taskId) {
          cleared.delete(versionId);
          cleared.set(nextVersionId, nextTaskId);
        }
      }
    }
  }
}
