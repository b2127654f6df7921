/**
 * Connection
 *
 * One authenticated channel to one server instance. Address and credential
 * are fixed for the lifetime of the object; pointing at another server or
 * using another token means constructing another Connection. Nothing here
 * touches process-wide state, so callers may hold as many connections as
 * they need.
 */

import { z } from 'zod';
import { DEFAULT_TIMEOUT_MS, MIN_SERVER_VERSION } from '../constants';
import {
  AuthenticationError,
  ConfigurationError,
  ConnectionFailedError,
  FailedOperationsError,
  GraphQLError,
  IncompatibleServerError,
  ServerError,
  UnreachableServerError,
} from '../errors';
import { consoleChannel, LogChannel, logLine, trackEvent } from '../telemetry';
import {
  AttributesSchemaResponse,
  BatchOperationsResponse,
  GraphQlResponseBody,
  HttpMethod,
  InfoResponse,
  OperationBody,
  OperationResultBody,
  RequestOptions,
  RestResponse,
  ServerInfo,
  UserResponse,
} from './contracts';
import { backoffDelay, isRetryableStatus, resolveRetryPolicy, RetryPolicy, Sleep, sleep } from './retry';
import { parseServerVersion, resolveServerFeatures, validateServerVersion } from './serverCompatibility';
import { FetchTransport, Transport, TransportError, TransportResponse } from './transport';

export interface ConnectionOptions {
  baseUrl: string;
  token: string;
  siteId?: string | null;
  clientVersion?: string | null;
  sender?: string | null;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  minServerVersion?: string;
  transport?: Transport;
  log?: LogChannel;
  /** Log every request when it is sent */
  verbose?: boolean;
  sleep?: Sleep;
}

export interface BatchOperationsOptions {
  /** Server keeps processing after a failed operation */
  canFail?: boolean;
}

/**
 * What EntityHub and OperationsSession need from a connection
 */
export interface ServerConnection {
  readonly baseUrl: string;
  getServerInfo(): Promise<ServerInfo>;
  request(method: HttpMethod, path: string, options?: RequestOptions): Promise<RestResponse>;
  queryGraphql(document: string, variables?: Record<string, unknown>): Promise<Record<string, unknown>>;
  getProject(projectName: string): Promise<Record<string, unknown>>;
  sendBatchOperations(
    projectName: string,
    operations: OperationBody[],
    options?: BatchOperationsOptions
  ): Promise<OperationResultBody[]>;
}

const BaseUrlSchema = z.string().trim().url();

const ObjectBody = z.record(z.unknown());

function parseBody(text: string): unknown {
  if (text.trim() === '') {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function extractDetail(data: unknown, fallback: string): string {
  const parsed = z.object({ detail: z.string() }).safeParse(data);
  if (parsed.success) {
    return parsed.data.detail;
  }
  if (typeof data === 'string' && data.trim() !== '') {
    return data;
  }
  return fallback;
}

export class Connection implements ServerConnection {
  readonly baseUrl: string;
  readonly restUrl: string;
  readonly graphqlUrl: string;
  readonly siteId: string | null;
  readonly clientVersion: string | null;
  readonly sender: string | null;
  readonly timeoutMs: number;
  readonly retryPolicy: RetryPolicy;
  readonly minServerVersion: string;

  private readonly token: string;
  private readonly transport: Transport;
  private readonly log: LogChannel;
  private readonly verbose: boolean;
  private readonly sleep: Sleep;
  private serverInfo: ServerInfo | null = null;
  private attributesSchema: AttributesSchemaResponse | null = null;

  constructor(options: ConnectionOptions) {
    const parsedUrl = BaseUrlSchema.safeParse(options.baseUrl);
    if (!parsedUrl.success) {
      throw new ConfigurationError(`Invalid server URL '${String(options.baseUrl)}'`, {
        baseUrl: options.baseUrl,
      });
    }
    if (!options.token) {
      throw new ConfigurationError(`Access token for server ${parsedUrl.data} is not set`);
    }

    this.baseUrl = parsedUrl.data.replace(/\/+$/, '');
    this.restUrl = `${this.baseUrl}/api`;
    this.graphqlUrl = `${this.baseUrl}/graphql`;
    this.token = options.token;
    this.siteId = options.siteId ?? null;
    this.clientVersion = options.clientVersion ?? null;
    this.sender = options.sender ?? null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryPolicy = resolveRetryPolicy(options.retry);
    this.minServerVersion = options.minServerVersion ?? MIN_SERVER_VERSION;
    this.transport = options.transport ?? new FetchTransport();
    this.log = options.log ?? consoleChannel;
    this.verbose = options.verbose ?? false;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Validate address and credential, cache server info.
   */
  async connect(): Promise<ServerInfo> {
    try {
      const info = await this.refreshServerInfo();
      const response = await this.request('GET', 'users/me');
      const user = UserResponse.safeParse(response.data);
      if (!user.success) {
        throw new AuthenticationError(response.status, 'Server did not return the current user', 'users/me');
      }
      this.serverInfo = { ...info, user: user.data.name };
      logLine(this.log, `Connected to ${this.baseUrl} (v${info.version}) as '${user.data.name}'`);
      return this.serverInfo;
    } catch (error) {
      if (error instanceof ConnectionFailedError && !(error instanceof UnreachableServerError)) {
        throw new UnreachableServerError(this.baseUrl, error.attempts, error.lastStatus);
      }
      throw error;
    }
  }

  /**
   * Cached server info. Network is used only if the cache was never filled.
   */
  async getServerInfo(): Promise<ServerInfo> {
    if (this.serverInfo !== null) {
      return this.serverInfo;
    }
    return this.refreshServerInfo();
  }

  hasServerInfo(): boolean {
    return this.serverInfo !== null;
  }

  async refreshServerInfo(): Promise<ServerInfo> {
    const response = await this.request('GET', 'info');
    const parsed = InfoResponse.safeParse(response.data);
    if (!parsed.success) {
      throw new ServerError(response.status, 'Malformed server info response', 'info');
    }
    const { version, uptime, features } = parsed.data;
    const compatibility = validateServerVersion(version, this.minServerVersion);
    const versionTuple = parseServerVersion(version);
    if (!compatibility.ok || versionTuple === null) {
      throw new IncompatibleServerError(version, this.minServerVersion);
    }
    this.serverInfo = {
      version,
      versionTuple,
      uptime: uptime ?? null,
      features: resolveServerFeatures(version, features),
      user: this.serverInfo?.user ?? null,
    };
    return this.serverInfo;
  }

  getHeaders(contentType = 'application/json'): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': contentType,
      Authorization: `Bearer ${this.token}`,
    };
    if (this.siteId !== null) {
      headers['x-site-id'] = this.siteId;
    }
    if (this.clientVersion !== null) {
      headers['x-client-version'] = this.clientVersion;
    }
    if (this.sender !== null) {
      headers['x-sender'] = this.sender;
    }
    return headers;
  }

  /**
   * Full url of a REST endpoint
   */
  endpointToUrl(endpoint: string, query?: RequestOptions['query']): string {
    const cleaned = endpoint.replace(/^\/+|\/+$/g, '');
    const url = cleaned.startsWith(this.baseUrl) ? cleaned : `${this.restUrl}/${cleaned}`;
    if (!query) {
      return url;
    }
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        params.append(key, String(value));
      }
    }
    const rendered = params.toString();
    return rendered ? `${url}?${rendered}` : url;
  }

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<RestResponse> {
    const url = this.endpointToUrl(path, options.query);
    const body = options.payload === undefined ? undefined : JSON.stringify(options.payload);
    const response = await this.send(method, url, body, path, options.idempotent ?? true);
    const data = parseBody(response.text);
    this.raiseForStatus(response.status, data, path);
    return { status: response.status, data, headers: response.headers };
  }

  get(path: string, query?: RequestOptions['query']): Promise<RestResponse> {
    return this.request('GET', path, { query });
  }

  post(path: string, payload?: unknown): Promise<RestResponse> {
    return this.request('POST', path, { payload });
  }

  put(path: string, payload?: unknown): Promise<RestResponse> {
    return this.request('PUT', path, { payload });
  }

  patch(path: string, payload?: unknown): Promise<RestResponse> {
    return this.request('PATCH', path, { payload });
  }

  delete(path: string, query?: RequestOptions['query']): Promise<RestResponse> {
    return this.request('DELETE', path, { query });
  }

  /**
   * Execute a GraphQL document. Errors reported in a 200 body are logical
   * failures of the query and are never retried.
   */
  async queryGraphql(document: string, variables: Record<string, unknown> = {}): Promise<Record<string, unknown>> {
    const body = JSON.stringify({ query: document, variables });
    const response = await this.send('POST', this.graphqlUrl, body, 'graphql', true);
    const data = parseBody(response.text);
    this.raiseForStatus(response.status, data, 'graphql');

    const parsed = GraphQlResponseBody.safeParse(data);
    if (!parsed.success) {
      throw new GraphQLError([{ message: 'Malformed GraphQL response body' }]);
    }
    const errors = parsed.data.errors ?? [];
    if (errors.length > 0) {
      throw new GraphQLError(errors);
    }
    return parsed.data.data ?? {};
  }

  async getProject(projectName: string): Promise<Record<string, unknown>> {
    const response = await this.get(`projects/${encodeURIComponent(projectName)}`);
    const parsed = ObjectBody.safeParse(response.data);
    if (!parsed.success) {
      throw new ServerError(response.status, 'Malformed project response', `projects/${projectName}`);
    }
    return parsed.data;
  }

  /**
   * Attribute definitions of the server, cached after the first call
   */
  async getAttributesSchema(useCache = true): Promise<AttributesSchemaResponse> {
    if (useCache && this.attributesSchema !== null) {
      return this.attributesSchema;
    }
    const response = await this.get('attributes');
    const parsed = AttributesSchemaResponse.safeParse(response.data);
    if (!parsed.success) {
      throw new ServerError(response.status, 'Malformed attributes schema response', 'attributes');
    }
    this.attributesSchema = parsed.data;
    return parsed.data;
  }

  /**
   * Post multiple create/update/delete operations in one request. Each
   * operation gets its own result; with `canFail` the server keeps going
   * after a failure.
   */
  async sendBatchOperations(
    projectName: string,
    operations: OperationBody[],
    options: BatchOperationsOptions = {}
  ): Promise<OperationResultBody[]> {
    if (operations.length === 0) {
      return [];
    }
    const path = `projects/${encodeURIComponent(projectName)}/operations`;
    // Created entities carry temporary ids, a repeated post would create them twice
    const response = await this.request('POST', path, {
      payload: { operations, canFail: options.canFail ?? true },
      idempotent: false,
    });
    const parsed = BatchOperationsResponse.safeParse(response.data);
    const results = parsed.success ? parsed.data.operations : undefined;
    if (!parsed.success || results === undefined) {
      const detail = parsed.success ? parsed.data.detail : undefined;
      throw new FailedOperationsError(
        detail ? `Operation failed. Detail: ${detail}` : 'Operation failed. Response has no operation results',
        { projectName, operationsCount: operations.length }
      );
    }
    return results;
  }

  private raiseForStatus(status: number, data: unknown, path: string): void {
    if (status < 400) {
      return;
    }
    const detail = extractDetail(data, `HTTP ${status}`);
    if (status === 401 || status === 403) {
      throw new AuthenticationError(status, detail, path);
    }
    throw new ServerError(status, detail, path);
  }

  /**
   * Send one request, retrying transport failures and 5xx responses with
   * exponential backoff. Any other response is returned as is.
   *
   * A non-idempotent request is retried only when the connection was
   * refused, since any other failure may come after the server applied it.
   */
  private async send(
    method: HttpMethod,
    url: string,
    body: string | undefined,
    label: string,
    idempotent: boolean
  ): Promise<TransportResponse> {
    const { maxAttempts } = this.retryPolicy;
    let lastFailure = 'no attempt made';
    let lastStatus: number | null = null;
    let attempts = 0;

    while (attempts < maxAttempts) {
      attempts += 1;
      if (this.verbose) {
        logLine(this.log, `Executing [${method}] ${url}`);
      }
      try {
        const response = await this.transport.send({
          method,
          url,
          headers: this.getHeaders(),
          body,
          timeoutMs: this.timeoutMs,
        });
        if (!isRetryableStatus(response.status) || !idempotent) {
          return response;
        }
        lastStatus = response.status;
        lastFailure = extractDetail(parseBody(response.text), `HTTP ${response.status}`);
      } catch (error) {
        if (!(error instanceof TransportError)) {
          throw error;
        }
        lastStatus = null;
        lastFailure = error.message;
        if (!idempotent && error.kind !== 'refused') {
          break;
        }
      }

      if (attempts < maxAttempts) {
        const delayMs = backoffDelay(this.retryPolicy, attempts);
        trackEvent(this.log, 'request.retry', { method, path: label, attempt: attempts, maxAttempts, delayMs });
        await this.sleep(delayMs);
      }
    }

    trackEvent(this.log, 'request.failed', { method, path: label, attempts, reason: lastFailure });
    throw new ConnectionFailedError(
      `[${method}] ${label} failed after ${attempts} attempt(s): ${lastFailure}`,
      attempts,
      lastStatus
    );
  }
}
