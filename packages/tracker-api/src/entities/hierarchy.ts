/**
 * Entity Hierarchy Definitions
 *
 * Defines which entity kinds exist in a project and which kind may contain
 * which:
 * - Project root → Folder
 * - Folder → Folder/Task/Product
 * - Product → Version → Representation
 *
 * Validation is a lookup in this table, never a runtime type inspection.
 */

import { InvalidHierarchyError } from '../errors';

export type EntityKind = 'folder' | 'task' | 'product' | 'version' | 'representation';

export const ENTITY_KINDS: readonly EntityKind[] = ['folder', 'task', 'product', 'version', 'representation'];

/** Parent of root folders */
export const PROJECT_ROOT = 'project';

export type ParentKind = EntityKind | typeof PROJECT_ROOT;

export type ParentField = 'parentId' | 'folderId' | 'productId' | 'versionId';

export type SubtypeField = 'folderType' | 'taskType' | 'productType';

export interface HierarchyLevel {
  /** Internal name (e.g., "folder", "version") */
  kind: EntityKind;

  /** Display name for messages (e.g., "Folder") */
  displayName: string;

  /** Plural form, also the GraphQL field on a project (e.g., "folders") */
  pluralName: string;

  /** Kinds allowed as direct parent */
  parents: ParentKind[];

  /** Field holding the parent identifier on the wire */
  parentField: ParentField;

  /** Field holding the subtype on the wire, if the kind has one */
  subtypeField: SubtypeField | null;

  hasLabel: boolean;
  hasAssignees: boolean;
  hasVersionNumber: boolean;
  hasTaskLink: boolean;
}

export function isEntityKind(value: string): value is EntityKind {
  return ENTITY_KINDS.some(kind => kind === value);
}

export class Hierarchy {
  private readonly byKind: Map<EntityKind, HierarchyLevel>;

  constructor(public readonly levels: HierarchyLevel[]) {
    if (levels.length === 0) {
      throw new Error('Hierarchy must have at least one level');
    }
    this.byKind = new Map(levels.map(level => [level.kind, level]));
  }

  getLevel(kind: EntityKind): HierarchyLevel {
    const level = this.byKind.get(kind);
    if (!level) {
      throw new InvalidHierarchyError(`Unknown entity kind '${kind}'`, { kind });
    }
    return level;
  }

  getDepth(): number {
    return this.levels.length;
  }

  /**
   * Position of the kind in top-down order
   */
  getLevelDepth(kind: EntityKind): number {
    return this.levels.findIndex(level => level.kind === kind);
  }

  canContain(parentKind: ParentKind, childKind: EntityKind): boolean {
    return this.getLevel(childKind).parents.includes(parentKind);
  }

  /**
   * Kinds which may be created directly under the given parent kind
   */
  childKinds(parentKind: ParentKind): EntityKind[] {
    return this.levels.filter(level => level.parents.includes(parentKind)).map(level => level.kind);
  }

  isContainer(kind: EntityKind): boolean {
    return this.childKinds(kind).length > 0;
  }

  assertCanContain(parentKind: ParentKind, childKind: EntityKind): void {
    if (this.canContain(parentKind, childKind)) {
      return;
    }
    const child = this.getLevel(childKind);
    const parentName = parentKind === PROJECT_ROOT ? 'project root' : this.getLevel(parentKind).displayName;
    const allowed = child.parents
      .map(kind => (kind === PROJECT_ROOT ? 'project root' : this.getLevel(kind).displayName))
      .join(', ');
    throw new InvalidHierarchyError(
      `${child.displayName} cannot be placed under ${parentName}. Allowed parents: ${allowed}`,
      { parentKind, childKind }
    );
  }
}

export const ENTITY_HIERARCHY = new Hierarchy([
  {
    kind: 'folder',
    displayName: 'Folder',
    pluralName: 'folders',
    parents: [PROJECT_ROOT, 'folder'],
    parentField: 'parentId',
    subtypeField: 'folderType',
    hasLabel: true,
    hasAssignees: false,
    hasVersionNumber: false,
    hasTaskLink: false,
  },
  {
    kind: 'task',
    displayName: 'Task',
    pluralName: 'tasks',
    parents: ['folder'],
    parentField: 'folderId',
    subtypeField: 'taskType',
    hasLabel: true,
    hasAssignees: true,
    hasVersionNumber: false,
    hasTaskLink: false,
  },
  {
    kind: 'product',
    displayName: 'Product',
    pluralName: 'products',
    parents: ['folder'],
    parentField: 'folderId',
    subtypeField: 'productType',
    hasLabel: false,
    hasAssignees: false,
    hasVersionNumber: false,
    hasTaskLink: false,
  },
  {
    kind: 'version',
    displayName: 'Version',
    pluralName: 'versions',
    parents: ['product'],
    parentField: 'productId',
    subtypeField: null,
    hasLabel: false,
    hasAssignees: false,
    hasVersionNumber: true,
    hasTaskLink: true,
  },
  {
    kind: 'representation',
    displayName: 'Representation',
    pluralName: 'representations',
    parents: ['version'],
    parentField: 'versionId',
    subtypeField: null,
    hasLabel: false,
    hasAssignees: false,
    hasVersionNumber: false,
    hasTaskLink: false,
  },
]);
