import { z } from 'zod';
import {
  DEFAULT_FOLDER_FIELDS,
  DEFAULT_PRODUCT_FIELDS,
  DEFAULT_REPRESENTATION_FIELDS,
  DEFAULT_TASK_FIELDS,
  DEFAULT_VERSION_FIELDS,
  GRAPHQL_PAGE_SIZE,
} from '../constants';
import { GraphQLError } from '../errors';
import { ENTITY_HIERARCHY, EntityKind } from '../entities/hierarchy';
import { EntityRecord, parseEntityRecord } from '../entities/models';
import { GraphQlQuery, QueryExecutor } from './query';

export interface EntityQueryFilters {
  /** Restrict to these identifiers; an empty list matches nothing */
  ids?: string[];
  /** Restrict to children of these parents; an empty list matches nothing */
  parentIds?: string[];
}

export interface EntityQueryOptions {
  fields?: string[];
  pageSize?: number;
}

export const DEFAULT_ENTITY_FIELDS: Record<EntityKind, string[]> = {
  folder: DEFAULT_FOLDER_FIELDS,
  task: DEFAULT_TASK_FIELDS,
  product: DEFAULT_PRODUCT_FIELDS,
  version: DEFAULT_VERSION_FIELDS,
  representation: DEFAULT_REPRESENTATION_FIELDS,
};

// Filter argument holding parent identifiers, per kind
const PARENT_FILTER_ARGUMENT: Record<EntityKind, string> = {
  folder: 'parentIds',
  task: 'folderIds',
  product: 'folderIds',
  version: 'productIds',
  representation: 'versionIds',
};

const EdgesResponse = z.object({
  edges: z.array(z.object({ node: z.unknown() })),
});

function uniqueValues(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Build a paginated query of one entity kind in one project
 */
export function entitiesGraphqlQuery(
  kind: EntityKind,
  fields: string[] = DEFAULT_ENTITY_FIELDS[kind],
  pageSize = GRAPHQL_PAGE_SIZE
): GraphQlQuery {
  const { pluralName, parentField, hasVersionNumber } = ENTITY_HIERARCHY.getLevel(kind);
  const query = new GraphQlQuery(pluralName);
  const projectName = query.addVariable('projectName', 'String!');
  const ids = query.addVariable('ids', '[String!]');
  const parentIds = query.addVariable('parentIds', '[String!]');

  const project = query.addField('project');
  project.setFilter('name', projectName);
  const entities = project.addFieldWithEdges(pluralName, pageSize);
  entities.setFilter('ids', ids);
  entities.setFilter(PARENT_FILTER_ARGUMENT[kind], parentIds);

  // Fields needed to place the record in the tree
  const fieldSet = new Set(['id', 'name', parentField, ...fields]);
  if (hasVersionNumber) {
    fieldSet.add('version');
  }
  for (const field of fieldSet) {
    entities.addFieldPath(field);
  }
  return query;
}

/**
 * Query all entities of a kind matching the filters, following pagination
 */
export async function queryEntities(
  executor: QueryExecutor,
  projectName: string,
  kind: EntityKind,
  filters: EntityQueryFilters = {},
  options: EntityQueryOptions = {}
): Promise<EntityRecord[]> {
  if (filters.ids?.length === 0 || filters.parentIds?.length === 0) {
    return [];
  }

  const query = entitiesGraphqlQuery(kind, options.fields, options.pageSize);
  query.setVariableValue('projectName', projectName);
  if (filters.ids !== undefined) {
    query.setVariableValue('ids', uniqueValues(filters.ids));
  }
  if (filters.parentIds !== undefined) {
    query.setVariableValue('parentIds', uniqueValues(filters.parentIds));
  }

  const { pluralName } = ENTITY_HIERARCHY.getLevel(kind);
  const ResponseShape = z.object({
    project: z.object({ [pluralName]: EdgesResponse }).nullable(),
  });

  const records: EntityRecord[] = [];
  for await (const data of query.continuousQuery(executor)) {
    const parsed = ResponseShape.safeParse(data);
    if (!parsed.success) {
      throw new GraphQLError([{ message: `Unexpected response shape of ${pluralName} query` }]);
    }
    if (parsed.data.project === null) {
      break;
    }
    const connection = parsed.data.project[pluralName];
    for (const edge of connection.edges) {
      records.push(parseEntityRecord(kind, edge.node));
    }
  }
  return records;
}
