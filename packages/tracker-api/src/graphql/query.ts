/**
 * GraphQL query builder
 *
 * Queries are assembled from variables and nested fields instead of string
 * templates. A variable without a value is left out of the query header and
 * so is every filter argument referencing it, which lets one builder serve
 * both filtered and unfiltered fetches.
 *
 * One field may be paginated ("edges" field). `continuousQuery` follows its
 * cursor until the server reports no next page.
 */

import { z } from 'zod';

const INDENT = '  ';

export interface QueryExecutor {
  queryGraphql(document: string, variables?: Record<string, unknown>): Promise<Record<string, unknown>>;
}

export class QueryVariable {
  private currentValue: unknown = undefined;

  constructor(
    public readonly name: string,
    public readonly type: string
  ) {}

  get variableName(): string {
    return `$${this.name}`;
  }

  get value(): unknown {
    return this.currentValue;
  }

  get isSet(): boolean {
    return this.currentValue !== undefined;
  }

  setValue(value: unknown): void {
    this.currentValue = value;
  }
}

type ArgumentValue = QueryVariable | string | number | boolean;

const PageInfo = z.object({
  endCursor: z.string().nullish(),
  hasNextPage: z.boolean(),
});

export class QueryField {
  readonly children: QueryField[] = [];
  private readonly args = new Map<string, ArgumentValue>();
  private cursor: string | null = null;

  constructor(
    public readonly name: string,
    public readonly parent: QueryField | null,
    public readonly hasEdges = false,
    private readonly pageSize: number | null = null
  ) {}

  /** Field names from the query root down to this field */
  get path(): string[] {
    return this.parent ? [...this.parent.path, this.name] : [this.name];
  }

  getField(name: string): QueryField | undefined {
    return this.children.find(child => child.name === name);
  }

  addField(name: string): QueryField {
    const existing = this.getField(name);
    if (existing) {
      return existing;
    }
    const field = new QueryField(name, this);
    this.children.push(field);
    return field;
  }

  addFieldWithEdges(name: string, pageSize: number): QueryField {
    const field = new QueryField(name, this, true, pageSize);
    this.children.push(field);
    return field;
  }

  /**
   * Add a field by dotted path, e.g. "allAttrib" or "product.folder.name"
   */
  addFieldPath(path: string): QueryField {
    let current: QueryField = this;
    for (const part of path.split('.')) {
      current = current.addField(part);
    }
    return current;
  }

  setFilter(argument: string, value: ArgumentValue): void {
    this.args.set(argument, value);
  }

  setCursor(cursor: string | null): void {
    this.cursor = cursor;
  }

  /**
   * Read page info of this field from a response. Returns the cursor of the
   * next page, or null when there is none.
   */
  nextCursor(data: Record<string, unknown>): string | null {
    let node: unknown = data;
    for (const part of this.path) {
      const level = z.record(z.unknown()).safeParse(node);
      if (!level.success) {
        return null;
      }
      node = level.data[part];
    }
    const container = z.object({ pageInfo: PageInfo }).safeParse(node);
    if (!container.success || !container.data.pageInfo.hasNextPage) {
      return null;
    }
    return container.data.pageInfo.endCursor ?? null;
  }

  findEdgesField(): QueryField | null {
    if (this.hasEdges) {
      return this;
    }
    for (const child of this.children) {
      const found = child.findEdgesField();
      if (found) {
        return found;
      }
    }
    return null;
  }

  render(depth: number): string[] {
    const pad = INDENT.repeat(depth);
    const header = `${pad}${this.name}${this.renderArguments()}`;
    if (this.children.length === 0 && !this.hasEdges) {
      return [header];
    }
    const lines = [`${header} {`];
    const body = this.hasEdges ? this.renderEdges(depth + 1) : this.renderChildren(depth + 1);
    lines.push(...body, `${pad}}`);
    return lines;
  }

  private renderChildren(depth: number): string[] {
    return this.children.flatMap(child => child.render(depth));
  }

  private renderEdges(depth: number): string[] {
    const pad = INDENT.repeat(depth);
    const inner = INDENT.repeat(depth + 1);
    return [
      `${pad}pageInfo {`,
      `${inner}endCursor`,
      `${inner}hasNextPage`,
      `${pad}}`,
      `${pad}edges {`,
      `${inner}node {`,
      ...this.renderChildren(depth + 2),
      `${inner}}`,
      `${pad}}`,
    ];
  }

  private renderArguments(): string {
    const rendered: string[] = [];
    for (const [argument, value] of this.args) {
      if (value instanceof QueryVariable) {
        if (value.isSet) {
          rendered.push(`${argument}: ${value.variableName}`);
        }
      } else {
        rendered.push(`${argument}: ${JSON.stringify(value)}`);
      }
    }
    if (this.hasEdges && this.pageSize !== null) {
      rendered.push(`first: ${this.pageSize}`);
      if (this.cursor !== null) {
        rendered.push(`after: ${JSON.stringify(this.cursor)}`);
      }
    }
    return rendered.length > 0 ? `(${rendered.join(', ')})` : '';
  }
}

export class GraphQlQuery {
  readonly variables = new Map<string, QueryVariable>();
  readonly children: QueryField[] = [];

  constructor(public readonly name: string) {}

  addVariable(name: string, type: string, value?: unknown): QueryVariable {
    if (this.variables.has(name)) {
      throw new Error(`Variable '${name}' is already defined`);
    }
    const variable = new QueryVariable(name, type);
    if (value !== undefined) {
      variable.setValue(value);
    }
    this.variables.set(name, variable);
    return variable;
  }

  setVariableValue(name: string, value: unknown): void {
    const variable = this.variables.get(name);
    if (!variable) {
      throw new Error(`Variable '${name}' is not defined`);
    }
    variable.setValue(value);
  }

  addField(name: string): QueryField {
    const field = new QueryField(name, null);
    this.children.push(field);
    return field;
  }

  /**
   * Values of all set variables, as sent along with the document
   */
  getVariablesValues(): Record<string, unknown> {
    const values: Record<string, unknown> = {};
    for (const variable of this.variables.values()) {
      if (variable.isSet) {
        values[variable.name] = variable.value;
      }
    }
    return values;
  }

  calculateQuery(): string {
    const declarations = [...this.variables.values()]
      .filter(variable => variable.isSet)
      .map(variable => `${variable.variableName}: ${variable.type}`);
    const header = declarations.length > 0 ? `query ${this.name}(${declarations.join(', ')})` : `query ${this.name}`;
    const lines = [`${header} {`, ...this.children.flatMap(child => child.render(1)), '}'];
    return lines.join('\n');
  }

  /**
   * Execute the query page by page, yielding the data of each response
   */
  async *continuousQuery(executor: QueryExecutor): AsyncGenerator<Record<string, unknown>> {
    const edgesField = this.children.map(child => child.findEdgesField()).find(field => field !== null) ?? null;
    edgesField?.setCursor(null);
    while (true) {
      const data = await executor.queryGraphql(this.calculateQuery(), this.getVariablesValues());
      yield data;
      if (edgesField === null) {
        return;
      }
      const cursor = edgesField.nextCursor(data);
      if (cursor === null) {
        return;
      }
      edgesField.setCursor(cursor);
    }
  }
}
