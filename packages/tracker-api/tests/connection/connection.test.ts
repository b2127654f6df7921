import { describe, expect, test } from '@jest/globals';

import { Connection } from '../../src/connection/connection';
import {
  AuthenticationError,
  ConfigurationError,
  ConnectionFailedError,
  FailedOperationsError,
  GraphQLError,
  IncompatibleServerError,
  ServerError,
  UnreachableServerError,
} from '../../src/errors';
import { MemoryChannel } from '../../src/telemetry';
import { createConnection, FakeServer, TOKEN } from '../helpers/fakeServer';

describe('Connection construction', () => {
  test('strips trailing slashes and derives endpoints', () => {
    const connection = new Connection({ baseUrl: 'http://tracker.test///', token: TOKEN });
    expect(connection.baseUrl).toBe('http://tracker.test');
    expect(connection.restUrl).toBe('http://tracker.test/api');
    expect(connection.graphqlUrl).toBe('http://tracker.test/graphql');
  });

  test('rejects an invalid address', () => {
    expect(() => new Connection({ baseUrl: 'not a url', token: TOKEN })).toThrow(ConfigurationError);
  });

  test('rejects a missing token', () => {
    expect(() => new Connection({ baseUrl: 'http://tracker.test', token: '' })).toThrow(ConfigurationError);
  });

  test('composes headers from optional identifiers', () => {
    const connection = createConnection(new FakeServer(), {
      siteId: 'site-a',
      clientVersion: '2.1.0',
      sender: 'compositor',
    });
    expect(connection.getHeaders()).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
      'x-site-id': 'site-a',
      'x-client-version': '2.1.0',
      'x-sender': 'compositor',
    });
  });

  test('builds endpoint urls with query parameters', () => {
    const connection = createConnection(new FakeServer());
    expect(connection.endpointToUrl('/projects/', { active: true, page: 2, name: undefined })).toBe(
      'http://tracker.test/api/projects?active=true&page=2'
    );
  });
});

describe('Connection.connect', () => {
  test('caches server info and current user', async () => {
    const server = new FakeServer();
    const connection = createConnection(server);

    const info = await connection.connect();

    expect(info).toEqual({
      version: '1.8.0',
      versionTuple: [1, 8, 0, '', ''],
      uptime: 12.5,
      features: { statusScope: true },
      user: 'artist',
    });
    expect(server.requests.map(request => `${request.method} ${request.url}`)).toEqual([
      'GET http://tracker.test/api/info',
      'GET http://tracker.test/api/users/me',
    ]);
  });

  test('derives features from an older server version', async () => {
    const connection = createConnection(new FakeServer({ version: '1.4.0', features: { webhooks: true } }));
    const info = await connection.connect();
    expect(info.features).toEqual({ webhooks: true, statusScope: false });
  });

  test('raises AuthenticationError for a rejected token', async () => {
    const connection = createConnection(new FakeServer(), { token: 'wrong-token' });
    const error = await connection.connect().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({ status: 401, detail: 'Invalid API key' });
  });

  test('raises UnreachableServerError when retries run out', async () => {
    const server = new FakeServer();
    server.failNext({ transportError: 'refused' }, { transportError: 'refused' }, { transportError: 'refused' });
    const connection = createConnection(server);

    const error = await connection.connect().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UnreachableServerError);
    expect(error).toBeInstanceOf(ConnectionFailedError);
    expect(error).toMatchObject({ attempts: 3, message: 'Server "http://tracker.test" can\'t be reached' });
  });

  test('raises IncompatibleServerError for an old server', async () => {
    const connection = createConnection(new FakeServer({ version: '0.9.0' }));
    await expect(connection.connect()).rejects.toThrow(IncompatibleServerError);
  });

  test('raises IncompatibleServerError for an unparsable version', async () => {
    const connection = createConnection(new FakeServer({ version: 'nightly' }));
    await expect(connection.connect()).rejects.toThrow('Server version nightly is older than required 1.0.0');
  });
});

describe('Connection.getServerInfo', () => {
  test('uses the cache after connect', async () => {
    const server = new FakeServer();
    const connection = createConnection(server);
    await connection.connect();

    const info = await connection.getServerInfo();

    expect(info.user).toBe('artist');
    expect(server.requests).toHaveLength(2);
  });

  test('fetches only once when the cache was never populated', async () => {
    const server = new FakeServer();
    const connection = createConnection(server);

    await connection.getServerInfo();
    await connection.getServerInfo();

    expect(server.requests).toHaveLength(1);
    expect(connection.hasServerInfo()).toBe(true);
  });

  test('refreshServerInfo always calls the server and keeps the user', async () => {
    const server = new FakeServer();
    const connection = createConnection(server);
    await connection.connect();

    const info = await connection.refreshServerInfo();

    expect(server.requests).toHaveLength(3);
    expect(info.user).toBe('artist');
  });
});

describe('Connection.request retries', () => {
  test('fails after exactly maxAttempts transient failures', async () => {
    const server = new FakeServer();
    server.failNext({ status: 503 }, { status: 503 }, { status: 503 }, { status: 503 });
    const delays: number[] = [];
    const log = new MemoryChannel();
    const connection = createConnection(server, {
      retry: { maxAttempts: 4 },
      log,
      sleep: async ms => {
        delays.push(ms);
      },
    });

    const error = await connection.get('projects/demo').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConnectionFailedError);
    expect(error).toMatchObject({ attempts: 4, lastStatus: 503 });
    expect(server.requests).toHaveLength(4);
    expect(delays).toEqual([100, 200, 400]);
    expect(log.lines[0]).toBe(
      '[TrackerApi] request.retry {"method":"GET","path":"projects/demo","attempt":1,"maxAttempts":4,"delayMs":100}'
    );
  });

  test('returns the response once a retry succeeds', async () => {
    const server = new FakeServer();
    server.failNext({ transportError: 'reset' }, { transportError: 'timeout' });
    const delays: number[] = [];
    const connection = createConnection(server, {
      sleep: async ms => {
        delays.push(ms);
      },
    });

    const response = await connection.get('projects/demo');

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ name: 'demo', code: 'dem' });
    expect(server.requests).toHaveLength(3);
    expect(delays).toEqual([100, 200]);
  });

  test('caps the backoff delay', async () => {
    const server = new FakeServer();
    server.failNext({ status: 500 }, { status: 500 }, { status: 500 });
    const delays: number[] = [];
    const connection = createConnection(server, {
      retry: { maxAttempts: 4, baseDelayMs: 300, maxDelayMs: 500 },
      sleep: async ms => {
        delays.push(ms);
      },
    });

    await connection.get('projects/demo');

    expect(delays).toEqual([300, 500, 500]);
  });

  test('does not retry client errors', async () => {
    const server = new FakeServer();
    const connection = createConnection(server);

    const error = await connection.get('projects/missing').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ServerError);
    expect(error).not.toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({ status: 404, detail: "Project 'missing' not found" });
    expect(server.requests).toHaveLength(1);
  });

  test('logs requests when verbose', async () => {
    const log = new MemoryChannel();
    const connection = createConnection(new FakeServer(), { verbose: true, log });

    await connection.get('projects/demo');

    expect(log.lines).toEqual(['[TrackerApi] Executing [GET] http://tracker.test/api/projects/demo']);
  });
});

describe('Connection.queryGraphql', () => {
  test('raises GraphQLError for errors in a 200 body without retrying', async () => {
    const server = new FakeServer();
    server.graphqlErrors = ['Cannot query field "bogus"'];
    const connection = createConnection(server);

    const error = await connection.queryGraphql('query { bogus }').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GraphQLError);
    expect(error).toMatchObject({ errors: [{ message: 'Cannot query field "bogus"' }] });
    expect(server.requests).toHaveLength(1);
  });

  test('posts document and variables to the GraphQL endpoint', async () => {
    const server = new FakeServer();
    const connection = createConnection(server);
    const document = 'query folders($projectName: String!) {\n  project(name: $projectName) {\n    folders {\n      id\n    }\n  }\n}';

    const data = await connection.queryGraphql(document, { projectName: 'demo' });

    expect(server.requests[0].url).toBe('http://tracker.test/graphql');
    expect(server.graphqlQueries[0].variables).toEqual({ projectName: 'demo' });
    expect(data).toEqual({
      project: { folders: { pageInfo: { endCursor: '0', hasNextPage: false }, edges: [] } },
    });
  });
});

describe('Connection REST helpers', () => {
  test('getProject returns the project record', async () => {
    const connection = createConnection(new FakeServer());
    await expect(connection.getProject('demo')).resolves.toEqual({ name: 'demo', code: 'dem' });
  });

  test('getAttributesSchema caches the schema', async () => {
    const server = new FakeServer();
    const connection = createConnection(server);

    const schema = await connection.getAttributesSchema();
    await connection.getAttributesSchema();

    expect(schema.attributes).toEqual([
      { name: 'fps', scope: ['folder', 'task'], data: { type: 'float', title: 'FPS' } },
    ]);
    expect(server.requests).toHaveLength(1);
  });

  test('sendBatchOperations skips the request for an empty list', async () => {
    const server = new FakeServer();
    const connection = createConnection(server);
    await expect(connection.sendBatchOperations('demo', [])).resolves.toEqual([]);
    expect(server.requests).toHaveLength(0);
  });

  test('sendBatchOperations raises when the response has no results', async () => {
    const server = new FakeServer();
    server.failNext({ status: 200, body: { success: false, detail: 'Project is locked' } });
    const connection = createConnection(server);

    await expect(
      connection.sendBatchOperations('demo', [
        { id: 'op-1', type: 'delete', entityType: 'folder', entityId: 'srv-1' },
      ])
    ).rejects.toThrow(FailedOperationsError);
  });

  test('sendBatchOperations does not repost a batch the server may have applied', async () => {
    const server = new FakeServer();
    server.failAfterHandling({ status: 503 });
    const connection = createConnection(server);

    const error = await connection
      .sendBatchOperations('demo', [
        { id: 'op-1', type: 'create', entityType: 'folder', entityId: 'tmp-1', data: { name: 'shots' } },
      ])
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ServerError);
    expect(error).toMatchObject({ status: 503, detail: 'Scripted failure' });
    expect(server.batches).toHaveLength(1);
    expect(server.records('demo').map(record => record.fields.name)).toEqual(['shots']);
  });

  test('sendBatchOperations stops after a reset once the request was sent', async () => {
    const server = new FakeServer();
    server.failAfterHandling({ transportError: 'reset' });
    const log = new MemoryChannel();
    const connection = createConnection(server, { log });

    const error = await connection
      .sendBatchOperations('demo', [
        { id: 'op-1', type: 'create', entityType: 'folder', entityId: 'tmp-1', data: { name: 'shots' } },
      ])
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConnectionFailedError);
    expect(error).toMatchObject({ attempts: 1, lastStatus: null });
    expect(server.batches).toHaveLength(1);
    expect(server.records('demo')).toHaveLength(1);
    expect(log.lines).toEqual([
      '[TrackerApi] request.failed {"method":"POST","path":"projects/demo/operations","attempts":1,"reason":"Scripted reset"}',
    ]);
  });

  test('sendBatchOperations retries a refused connection', async () => {
    const server = new FakeServer();
    server.failNext({ transportError: 'refused' });
    const connection = createConnection(server);

    const results = await connection.sendBatchOperations('demo', [
      { id: 'op-1', type: 'create', entityType: 'folder', entityId: 'tmp-1', data: { name: 'shots' } },
    ]);

    expect(results).toEqual([{ id: 'op-1', success: true, entityId: 'srv-1' }]);
    expect(server.requests).toHaveLength(2);
    expect(server.batches).toHaveLength(1);
  });

  test('sendBatchOperations returns per-operation results', async () => {
    const server = new FakeServer();
    const connection = createConnection(server);

    const results = await connection.sendBatchOperations('demo', [
      { id: 'op-1', type: 'create', entityType: 'folder', entityId: 'tmp-1', data: { name: 'shots' } },
      { id: 'op-2', type: 'delete', entityType: 'folder', entityId: 'missing' },
    ]);

    expect(results).toEqual([
      { id: 'op-1', success: true, entityId: 'srv-1' },
      { id: 'op-2', success: false, detail: "Entity 'missing' not found" },
    ]);
    expect(server.batches[0]).toHaveLength(2);
  });
});
