import { z } from 'zod';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface RestResponse<T = unknown> {
  status: number;
  data: T;
  headers: Record<string, string>;
}

export interface RequestOptions {
  payload?: unknown;
  query?: Record<string, string | number | boolean | undefined>;
  /**
   * False for requests that must not reach the server twice. Only a refused
   * connection is retried then; timeouts, resets and 5xx responses fail
   * right away.
   */
  idempotent?: boolean;
}

export type ServerVersionTuple = [number, number, number, string, string];

export interface ServerFeatures {
  statusScope: boolean;
  [flag: string]: boolean;
}

export interface ServerInfo {
  version: string;
  versionTuple: ServerVersionTuple;
  uptime: number | null;
  features: ServerFeatures;
  user: string | null;
}

export const InfoResponse = z.object({
  version: z.string(),
  uptime: z.number().optional(),
  features: z.record(z.boolean()).optional(),
});
export type InfoResponse = z.infer<typeof InfoResponse>;

export const UserResponse = z.object({
  name: z.string(),
});

export const GraphQlResponseBody = z.object({
  data: z.record(z.unknown()).nullable().optional(),
  errors: z
    .array(
      z.object({
        message: z.string(),
        path: z.array(z.union([z.string(), z.number()])).optional(),
        locations: z.array(z.object({ line: z.number(), column: z.number() })).optional(),
      })
    )
    .optional(),
});
export type GraphQlResponseBody = z.infer<typeof GraphQlResponseBody>;

export type OperationType = 'create' | 'update' | 'delete';

/**
 * One operation as submitted in a batch request
 */
export interface OperationBody {
  id: string;
  type: OperationType;
  entityType: string;
  entityId: string;
  data?: Record<string, unknown>;
}

export const OperationResultBody = z.object({
  id: z.string(),
  success: z.boolean(),
  entityId: z.string().optional(),
  detail: z.string().optional(),
});
export type OperationResultBody = z.infer<typeof OperationResultBody>;

export const BatchOperationsResponse = z.object({
  success: z.boolean().optional(),
  operations: z.array(OperationResultBody).optional(),
  detail: z.string().optional(),
});
export type BatchOperationsResponse = z.infer<typeof BatchOperationsResponse>;

export const AttributeDefinition = z.object({
  name: z.string(),
  scope: z.array(z.string()).default([]),
  position: z.number().optional(),
  builtin: z.boolean().optional(),
  data: z.record(z.unknown()).default({}),
});
export type AttributeDefinition = z.infer<typeof AttributeDefinition>;

export const AttributesSchemaResponse = z.object({
  attributes: z.array(AttributeDefinition),
});
export type AttributesSchemaResponse = z.infer<typeof AttributesSchemaResponse>;
