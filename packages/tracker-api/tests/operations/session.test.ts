import { describe, expect, test } from '@jest/globals';

import { SessionStateError } from '../../src/errors';
import { OperationsSession } from '../../src/operations/session';
import { MemoryChannel } from '../../src/telemetry';
import { createConnection, FakeServer, PROJECT } from '../helpers/fakeServer';

function sessionFor(server: FakeServer, canFail = true): { session: OperationsSession; log: MemoryChannel } {
  const log = new MemoryChannel();
  const session = new OperationsSession(createConnection(server), PROJECT, { canFail, log });
  return { session, log };
}

describe('OperationsSession', () => {
  test('creates a parent and a child in one batch', async () => {
    const server = new FakeServer();
    const { session, log } = sessionFor(server);
    const folder = session.create('folder', { name: 'shots' });
    session.create('task', { name: 'compositing', folderId: folder.entityId, taskType: 'Compositing' });

    const results = await session.commit();

    expect(results.map(result => [result.submittedEntityId, result.entityId, result.success])).toEqual([
      ['tmp-1', 'srv-1', true],
      ['tmp-2', 'srv-2', true],
    ]);
    expect(session.getAssignedId('tmp-2')).toBe('srv-2');
    expect(session.operations[1].data.folderId).toBe('srv-1');
    expect(server.record(PROJECT, 'srv-2')?.fields.folderId).toBe('srv-1');
    expect(log.lines).toEqual(['[TrackerApi] session.committed {"project":"demo","operations":2,"failed":0}']);
  });

  test('rejects a reference to an identifier created later', () => {
    const { session } = sessionFor(new FakeServer());
    expect(() => session.create('task', { name: 'layout', folderId: 'tmp-9' })).toThrow(
      "Operation 'create' on task 'tmp-1' references 'tmp-9' before it is created"
    );
    expect(session.operations).toHaveLength(0);
  });

  test('rejects updates of identifiers the session never created', () => {
    const { session } = sessionFor(new FakeServer());
    expect(() => session.update('folder', 'tmp-4', { label: 'Shots' })).toThrow(SessionStateError);
  });

  test('rejects a second create of the same identifier', () => {
    const { session } = sessionFor(new FakeServer());
    session.create('folder', { name: 'shots' }, 'tmp-5');
    expect(() => session.create('folder', { name: 'shots' }, 'tmp-5')).toThrow(
      "Entity 'tmp-5' is already created in this session"
    );
  });

  test('reports partial success per operation', async () => {
    const server = new FakeServer();
    server.rejectOperation = operation => (operation.data?.name === 'broken' ? 'Name is reserved' : null);
    const { session, log } = sessionFor(server);
    session.create('folder', { name: 'assets' });
    session.create('folder', { name: 'broken' });
    session.create('folder', { name: 'shots' });

    const results = await session.commit();

    expect(results.map(result => ({ entityId: result.entityId, success: result.success, detail: result.detail }))).toEqual([
      { entityId: 'srv-1', success: true, detail: null },
      { entityId: 'tmp-2', success: false, detail: 'Name is reserved' },
      { entityId: 'srv-2', success: true, detail: null },
    ]);
    expect(log.lines).toEqual(['[TrackerApi] session.committed {"project":"demo","operations":3,"failed":1}']);
  });

  test('stops after the first failure when the session cannot fail', async () => {
    const server = new FakeServer();
    server.rejectOperation = operation => (operation.data?.name === 'broken' ? 'Name is reserved' : null);
    const { session } = sessionFor(server, false);
    session.create('folder', { name: 'broken' });
    session.create('folder', { name: 'shots' });

    const results = await session.commit();

    expect(results.map(result => result.detail)).toEqual(['Name is reserved', 'Skipped after an earlier failure']);
    expect(server.records(PROJECT)).toEqual([]);
  });

  test('marks operations missing from the response as failed', async () => {
    const server = new FakeServer();
    const { session } = sessionFor(server);
    const first = session.create('folder', { name: 'assets' });
    session.create('folder', { name: 'shots' });
    server.failNext({
      status: 200,
      body: { success: false, operations: [{ id: first.id, success: true, entityId: 'srv-7' }] },
    });

    const results = await session.commit();

    expect(results[0]).toMatchObject({ entityId: 'srv-7', success: true });
    expect(results[1]).toMatchObject({
      entityId: 'tmp-2',
      success: false,
      detail: 'Server returned no result for the operation',
    });
  });

  test('can be submitted only once', async () => {
    const server = new FakeServer();
    const { session } = sessionFor(server);

    await expect(session.commit()).resolves.toEqual([]);
    expect(server.requests).toHaveLength(0);
    expect(session.isSubmitted).toBe(true);
    expect(session.getResults()).toEqual([]);
    expect(() => session.create('folder', { name: 'late' })).toThrow('Operations session was already submitted');
    await expect(session.commit()).rejects.toThrow(SessionStateError);
  });
});
