/**
 * Entity records as returned by GraphQL, validated with zod and normalized
 * into one value shape shared by all kinds.
 */

import { z } from 'zod';
import { GraphQLError } from '../errors';
import { EntityKind } from './hierarchy';

export interface EntityValues {
  name: string;
  label: string | null;
  /** folderType, taskType or productType depending on kind */
  subtype: string | null;
  status: string | null;
  tags: string[];
  active: boolean;
  attributes: Record<string, unknown>;
  data: Record<string, unknown>;
  assignees: string[];
  version: number | null;
  taskId: string | null;
  parentId: string | null;
}

export type EntityField = keyof EntityValues;

export interface EntityRecord {
  id: string;
  kind: EntityKind;
  values: EntityValues;
  /** Server-reported folder path */
  path: string | null;
  /** Folder has published products below it */
  hasPublishedContent?: boolean;
}

function parseJsonString(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

// allAttrib and data arrive as JSON strings
const JsonMap = z
  .preprocess(parseJsonString, z.record(z.unknown()).nullish())
  .transform(value => value ?? {});

const BaseNode = z.object({
  id: z.string().min(1),
  name: z.string(),
  status: z.string().nullish(),
  tags: z.array(z.string()).nullish(),
  active: z.boolean().nullish(),
  allAttrib: JsonMap,
  data: JsonMap,
});

export const FolderNode = BaseNode.extend({
  label: z.string().nullish(),
  folderType: z.string().nullish(),
  parentId: z.string().nullish(),
  path: z.string().nullish(),
  hasProducts: z.boolean().nullish(),
});

export const TaskNode = BaseNode.extend({
  label: z.string().nullish(),
  taskType: z.string().nullish(),
  folderId: z.string(),
  assignees: z.array(z.string()).nullish(),
});

export const ProductNode = BaseNode.extend({
  productType: z.string().nullish(),
  folderId: z.string(),
});

export const VersionNode = BaseNode.extend({
  version: z.number().int(),
  productId: z.string(),
  taskId: z.string().nullish(),
});

export const RepresentationNode = BaseNode.extend({
  versionId: z.string(),
});

type BaseNode = z.infer<typeof BaseNode>;

export function emptyValues(name: string, parentId: string | null): EntityValues {
  return {
    name,
    label: null,
    subtype: null,
    status: null,
    tags: [],
    active: true,
    attributes: {},
    data: {},
    assignees: [],
    version: null,
    taskId: null,
    parentId,
  };
}

function baseValues(node: BaseNode, parentId: string | null): EntityValues {
  return {
    ...emptyValues(node.name, parentId),
    status: node.status ?? null,
    tags: node.tags ?? [],
    active: node.active ?? true,
    attributes: node.allAttrib,
    data: node.data,
  };
}

function parseNode<T extends z.ZodTypeAny>(schema: T, kind: EntityKind, node: unknown): z.infer<T> {
  const parsed = schema.safeParse(node);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new GraphQLError([{ message: `Malformed ${kind} record (${issues.join(', ')})` }]);
  }
  return parsed.data;
}

/**
 * Normalize one GraphQL node of the given kind
 */
export function parseEntityRecord(kind: EntityKind, node: unknown): EntityRecord {
  switch (kind) {
    case 'folder': {
      const folder = parseNode(FolderNode, kind, node);
      return {
        id: folder.id,
        kind,
        values: {
          ...baseValues(folder, folder.parentId ?? null),
          label: folder.label ?? null,
          subtype: folder.folderType ?? null,
        },
        path: folder.path ?? null,
        hasPublishedContent: folder.hasProducts ?? undefined,
      };
    }
    case 'task': {
      const task = parseNode(TaskNode, kind, node);
      return {
        id: task.id,
        kind,
        values: {
          ...baseValues(task, task.folderId),
          label: task.label ?? null,
          subtype: task.taskType ?? null,
          assignees: task.assignees ?? [],
        },
        path: null,
      };
    }
    case 'product': {
      const product = parseNode(ProductNode, kind, node);
      return {
        id: product.id,
        kind,
        values: { ...baseValues(product, product.folderId), subtype: product.productType ?? null },
        path: null,
      };
    }
    case 'version': {
      const version = parseNode(VersionNode, kind, node);
      return {
        id: version.id,
        kind,
        values: {
          ...baseValues(version, version.productId),
          version: version.version,
          taskId: version.taskId ?? null,
        },
        path: null,
      };
    }
    case 'representation': {
      const representation = parseNode(RepresentationNode, kind, node);
      return {
        id: representation.id,
        kind,
        values: baseValues(representation, representation.versionId),
        path: null,
      };
    }
  }
}

export function cloneValues(values: EntityValues): EntityValues {
  return {
    ...values,
    tags: [...values.tags],
    assignees: [...values.assignees],
    attributes: structuredClone(values.attributes),
    data: structuredClone(values.data),
  };
}

/**
 * Substitute an identifier in the reference fields of a value set
 */
export function replaceReferences(values: EntityValues, previousId: string, nextId: string): void {
  if (values.parentId === previousId) {
    values.parentId = nextId;
  }
  if (values.taskId === previousId) {
    values.taskId = nextId;
  }
}
