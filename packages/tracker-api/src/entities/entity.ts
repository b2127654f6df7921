/**
 * Entity
 *
 * One node of the project graph. The entity keeps the last values known to
 * be on the server next to its current local values; its state is derived
 * from the two, so there is no separate dirty flag to get out of sync.
 *
 * Structural changes (parent, identifier) go through EntityHub, which owns
 * the tree index.
 */

import { isDeepStrictEqual } from 'util';
import type { OperationType } from '../connection/contracts';
import { InvalidChangeError } from '../errors';
import { ENTITY_HIERARCHY, EntityKind, HierarchyLevel } from './hierarchy';
import { cloneValues, EntityField, EntityRecord, EntityValues, replaceReferences } from './models';

export type EntityState = 'new' | 'persisted' | 'dirty' | 'pending-delete';

export interface EntityFailure {
  operation: OperationType;
  reason: string;
}

/**
 * Changes accepted by `EntityHub.updateEntity`. In `attributes` a null value
 * unsets the attribute; `data` replaces the whole map.
 */
export interface EntityChanges {
  name?: string;
  label?: string | null;
  subtype?: string | null;
  status?: string | null;
  tags?: string[];
  active?: boolean;
  attributes?: Record<string, unknown>;
  data?: Record<string, unknown>;
  assignees?: string[];
  version?: number | null;
  taskId?: string | null;
  parentId?: string | null;
}

export type EntityPayload = Record<string, unknown>;

function sameValue(left: unknown, right: unknown): boolean {
  return isDeepStrictEqual(left, right);
}

export class Entity {
  readonly kind: EntityKind;
  readonly level: HierarchyLevel;
  failure: EntityFailure | null = null;

  private currentId: string;
  private values: EntityValues;
  private serverValues: EntityValues | null;
  private pendingDelete = false;
  private cachedPath: string | null;
  private publishedContent = false;

  private constructor(
    id: string,
    kind: EntityKind,
    values: EntityValues,
    serverValues: EntityValues | null,
    path: string | null
  ) {
    this.currentId = id;
    this.kind = kind;
    this.level = ENTITY_HIERARCHY.getLevel(kind);
    this.values = values;
    this.serverValues = serverValues;
    this.cachedPath = path;
  }

  /**
   * Entity created locally, not yet known to the server
   */
  static createNew(id: string, kind: EntityKind, values: EntityValues): Entity {
    const entity = new Entity(id, kind, cloneValues(values), null, null);
    entity.validateValues(entity.values);
    return entity;
  }

  static fromRecord(record: EntityRecord): Entity {
    const entity = new Entity(record.id, record.kind, cloneValues(record.values), cloneValues(record.values), record.path);
    entity.publishedContent = record.hasPublishedContent ?? false;
    return entity;
  }

  get id(): string {
    return this.currentId;
  }

  get name(): string {
    return this.values.name;
  }

  get label(): string | null {
    return this.values.label;
  }

  get subtype(): string | null {
    return this.values.subtype;
  }

  get status(): string | null {
    return this.values.status;
  }

  get tags(): string[] {
    return [...this.values.tags];
  }

  get active(): boolean {
    return this.values.active;
  }

  get attributes(): Record<string, unknown> {
    return structuredClone(this.values.attributes);
  }

  get data(): Record<string, unknown> {
    return structuredClone(this.values.data);
  }

  get assignees(): string[] {
    return [...this.values.assignees];
  }

  get version(): number | null {
    return this.values.version;
  }

  get taskId(): string | null {
    return this.values.taskId;
  }

  get parentId(): string | null {
    return this.values.parentId;
  }

  /** Parent as last known on the server, null for new entities */
  get serverParentId(): string | null {
    return this.serverValues?.parentId ?? null;
  }

  get state(): EntityState {
    if (this.pendingDelete) {
      return 'pending-delete';
    }
    if (this.serverValues === null) {
      return 'new';
    }
    return this.changedFields().length > 0 ? 'dirty' : 'persisted';
  }

  get isNew(): boolean {
    return this.serverValues === null;
  }

  get isPendingDelete(): boolean {
    return this.pendingDelete;
  }

  /** Server reported published products below this folder */
  get hasPublishedContent(): boolean {
    return this.publishedContent;
  }

  get path(): string | null {
    return this.cachedPath;
  }

  setCachedPath(path: string | null): void {
    this.cachedPath = path;
  }

  clearDerivedContext(): void {
    this.cachedPath = null;
  }

  getValues(): EntityValues {
    return cloneValues(this.values);
  }

  /**
   * Fields whose local value differs from the server value
   */
  changedFields(): EntityField[] {
    const baseline = this.serverValues;
    if (baseline === null) {
      return [];
    }
    const fields: EntityField[] = [];
    for (const field of Object.keys(this.values)) {
      if (isEntityField(field) && !sameValue(this.values[field], baseline[field])) {
        fields.push(field);
      }
    }
    return fields;
  }

  /**
   * Apply changes to local values. Returns the fields that actually changed.
   */
  applyChanges(changes: EntityChanges): EntityField[] {
    const next = cloneValues(this.values);
    if (changes.name !== undefined) {
      next.name = changes.name;
    }
    if (changes.label !== undefined) {
      next.label = changes.label;
    }
    if (changes.subtype !== undefined) {
      next.subtype = changes.subtype;
    }
    if (changes.status !== undefined) {
      next.status = changes.status;
    }
    if (changes.tags !== undefined) {
      next.tags = [...changes.tags];
    }
    if (changes.active !== undefined) {
      next.active = changes.active;
    }
    if (changes.attributes !== undefined) {
      for (const [key, value] of Object.entries(changes.attributes)) {
        if (value === null) {
          delete next.attributes[key];
        } else {
          next.attributes[key] = structuredClone(value);
        }
      }
    }
    if (changes.data !== undefined) {
      next.data = structuredClone(changes.data);
    }
    if (changes.assignees !== undefined) {
      next.assignees = [...changes.assignees];
    }
    if (changes.version !== undefined) {
      next.version = changes.version;
    }
    if (changes.taskId !== undefined) {
      next.taskId = changes.taskId;
    }
    if (changes.parentId !== undefined) {
      next.parentId = changes.parentId;
    }

    this.validateValues(next);
    const changed: EntityField[] = [];
    for (const field of Object.keys(next)) {
      if (isEntityField(field) && !sameValue(next[field], this.values[field])) {
        changed.push(field);
      }
    }
    this.values = next;
    return changed;
  }

  markPendingDelete(): void {
    this.pendingDelete = true;
  }

  restore(): void {
    this.pendingDelete = false;
  }

  /**
   * Drop local edits. Returns the fields that were reverted.
   */
  revert(): EntityField[] {
    if (this.serverValues === null) {
      return [];
    }
    const reverted = this.changedFields();
    this.values = cloneValues(this.serverValues);
    return reverted;
  }

  /**
   * Values confirmed by the server become the new baseline
   */
  markPersisted(confirmed: EntityValues): void {
    this.serverValues = cloneValues(confirmed);
    this.failure = null;
  }

  /**
   * Replace both local and server values with a fresh server record
   */
  refreshFromServer(record: EntityRecord): void {
    this.values = cloneValues(record.values);
    this.serverValues = cloneValues(record.values);
    this.cachedPath = record.path;
    this.publishedContent = record.hasPublishedContent ?? false;
  }

  /**
   * Substitute an identifier in the entity's own id and reference fields
   */
  replaceIdentifier(previousId: string, nextId: string): void {
    if (this.currentId === previousId) {
      this.currentId = nextId;
    }
    replaceReferences(this.values, previousId, nextId);
    if (this.serverValues !== null) {
      replaceReferences(this.serverValues, previousId, nextId);
    }
  }

  /**
   * Body of the create operation
   */
  toCreatePayload(): EntityPayload {
    const payload: EntityPayload = { name: this.values.name };
    for (const [key, value] of Object.entries(this.toWireFields(this.values, allFields(this.values)))) {
      if (key !== 'name' && value !== null) {
        payload[key] = value;
      }
    }
    return payload;
  }

  /**
   * Body of the update operation, only fields that differ from the server.
   * Removed attributes are sent as null.
   */
  toUpdatePayload(): EntityPayload {
    const baseline = this.serverValues;
    if (baseline === null) {
      return {};
    }
    const fields = this.changedFields();
    const payload = this.toWireFields(this.values, fields.filter(field => field !== 'attributes'));
    if (fields.includes('attributes')) {
      const attrib: Record<string, unknown> = {};
      const keys = new Set([...Object.keys(baseline.attributes), ...Object.keys(this.values.attributes)]);
      for (const key of keys) {
        const value = key in this.values.attributes ? this.values.attributes[key] : null;
        if (!sameValue(value, baseline.attributes[key] ?? null)) {
          attrib[key] = value;
        }
      }
      payload.attrib = attrib;
    }
    return payload;
  }

  private toWireFields(values: EntityValues, fields: EntityField[]): EntityPayload {
    const payload: EntityPayload = {};
    for (const field of fields) {
      switch (field) {
        case 'attributes':
          payload.attrib = structuredClone(values.attributes);
          break;
        case 'subtype':
          if (this.level.subtypeField !== null) {
            payload[this.level.subtypeField] = values.subtype;
          }
          break;
        case 'parentId':
          payload[this.level.parentField] = values.parentId;
          break;
        case 'label':
          if (this.level.hasLabel) {
            payload.label = values.label;
          }
          break;
        case 'assignees':
          if (this.level.hasAssignees) {
            payload.assignees = [...values.assignees];
          }
          break;
        case 'version':
          if (this.level.hasVersionNumber) {
            payload.version = values.version;
          }
          break;
        case 'taskId':
          if (this.level.hasTaskLink) {
            payload.taskId = values.taskId;
          }
          break;
        case 'data':
          payload.data = structuredClone(values.data);
          break;
        case 'tags':
          payload.tags = [...values.tags];
          break;
        default:
          payload[field] = values[field];
      }
    }
    return payload;
  }

  private validateValues(values: EntityValues): void {
    const { level } = this;
    const problems: string[] = [];
    if (values.name.trim() === '') {
      problems.push('name must not be empty');
    }
    if (values.subtype !== null && level.subtypeField === null) {
      problems.push('kind has no subtype');
    }
    if (values.label !== null && !level.hasLabel) {
      problems.push('kind has no label');
    }
    if (values.assignees.length > 0 && !level.hasAssignees) {
      problems.push('kind has no assignees');
    }
    if (values.version !== null && !level.hasVersionNumber) {
      problems.push('kind has no version number');
    }
    if (values.version !== null && (!Number.isInteger(values.version) || values.version < 0)) {
      problems.push('version must be a non-negative integer');
    }
    if (values.taskId !== null && !level.hasTaskLink) {
      problems.push('kind has no task link');
    }
    if (problems.length > 0) {
      throw new InvalidChangeError(`Invalid ${level.displayName} '${values.name}': ${problems.join(', ')}`, {
        entityId: this.currentId,
        problems,
      });
    }
  }
}

const ENTITY_FIELDS: readonly EntityField[] = [
  'name',
  'label',
  'subtype',
  'status',
  'tags',
  'active',
  'attributes',
  'data',
  'assignees',
  'version',
  'taskId',
  'parentId',
];

function isEntityField(value: string): value is EntityField {
  return ENTITY_FIELDS.some(field => field === value);
}

function allFields(values: EntityValues): EntityField[] {
  return Object.keys(values).filter(isEntityField);
}
