/**
 * Project anatomy the hub validates edits against: folder types, task types
 * and statuses. Statuses may be limited to entity kinds (their scope); the
 * scope is honoured only by servers that support it.
 */

import { z } from 'zod';
import { InvalidChangeError } from '../errors';
import { EntityKind } from './hierarchy';

const NamedType = z.object({ name: z.string() });

const ProjectStatus = z.object({
  name: z.string(),
  scope: z.array(z.string()).nullish(),
});
export type ProjectStatus = z.infer<typeof ProjectStatus>;

export const ProjectNode = z.object({
  name: z.string(),
  code: z.string().nullish(),
  folderTypes: z.array(NamedType).nullish(),
  taskTypes: z.array(NamedType).nullish(),
  statuses: z.array(ProjectStatus).nullish(),
});
export type ProjectNode = z.infer<typeof ProjectNode>;

// Status names compare case-insensitively, ignoring separators
function statusKey(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]+/g, '');
}

export class ProjectEntity {
  readonly name: string;
  readonly code: string | null;
  readonly folderTypes: readonly string[];
  readonly taskTypes: readonly string[];
  readonly statuses: readonly ProjectStatus[];

  constructor(
    node: ProjectNode,
    readonly statusScopeSupported: boolean
  ) {
    this.name = node.name;
    this.code = node.code ?? null;
    this.folderTypes = (node.folderTypes ?? []).map(type => type.name);
    this.taskTypes = (node.taskTypes ?? []).map(type => type.name);
    this.statuses = node.statuses ?? [];
  }

  getStatus(name: string): ProjectStatus | undefined {
    const key = statusKey(name);
    return this.statuses.find(status => statusKey(status.name) === key);
  }

  /**
   * Check a subtype and a status for an entity kind. Null values and kinds
   * without typed subtypes pass.
   */
  validate(kind: EntityKind, values: { subtype?: string | null; status?: string | null }): void {
    const problems: string[] = [];
    const { subtype, status } = values;

    if (subtype !== undefined && subtype !== null) {
      const allowed = kind === 'folder' ? this.folderTypes : kind === 'task' ? this.taskTypes : null;
      if (allowed !== null && allowed.length > 0 && !allowed.includes(subtype)) {
        problems.push(`${kind} type '${subtype}' is not available on project`);
      }
    }

    if (status !== undefined && status !== null && this.statuses.length > 0) {
      const definition = this.getStatus(status);
      if (!definition) {
        problems.push(`status '${status}' is not available on project`);
      } else if (this.statusScopeSupported && definition.scope && !definition.scope.includes(kind)) {
        problems.push(`status '${status}' is not available for ${kind}`);
      }
    }

    if (problems.length > 0) {
      throw new InvalidChangeError(`Invalid ${kind} for project '${this.name}': ${problems.join(', ')}`, {
        project: this.name,
        kind,
        problems,
      });
    }
  }
}
