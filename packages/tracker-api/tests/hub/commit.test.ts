import { beforeEach, describe, expect, test } from '@jest/globals';

import { EntityHub } from '../../src/hub/entity-hub';
import { MemoryChannel } from '../../src/telemetry';
import { createConnection, FakeServer, PROJECT } from '../helpers/fakeServer';
import { seedShotTree, ShotTree } from '../helpers/projectTree';

describe('EntityHub.commitChanges with new entities', () => {
  let server: FakeServer;
  let log: MemoryChannel;
  let hub: EntityHub;

  beforeEach(() => {
    server = new FakeServer();
    log = new MemoryChannel();
    hub = new EntityHub(createConnection(server), PROJECT, { log });
  });

  test('replaces temporary identifiers everywhere', async () => {
    const folder = hub.addNew('folder', 'assets', null, { fps: 25 }, { subtype: 'Library' });
    const task = hub.addNew('task', 'modeling', folder.id, {}, { subtype: 'Modeling', assignees: ['artist'] });
    const product = hub.addNew('product', 'model', folder.id, {}, { subtype: 'model' });
    const version = hub.addNew('version', 'v001', product.id, {}, { version: 1, taskId: task.id });

    const results = await hub.commitChanges();

    expect(results.map(result => [result.type, result.submittedEntityId, result.entityId, result.success])).toEqual([
      ['create', 'tmp-1', 'srv-1', true],
      ['create', 'tmp-2', 'srv-2', true],
      ['create', 'tmp-3', 'srv-3', true],
      ['create', 'tmp-4', 'srv-4', true],
    ]);
    expect(version.id).toBe('srv-4');
    expect(version.parentId).toBe('srv-3');
    expect(version.taskId).toBe('srv-2');
    expect(version.state).toBe('persisted');
    expect(hub.get('tmp-1')).toBeUndefined();
    expect(hub.get('srv-1')).toBe(folder);
    expect(hub.getChildren(null).map(entity => entity.id)).toEqual(['srv-1']);
    expect(hub.getChildren('srv-1').map(entity => entity.id)).toEqual(['srv-2', 'srv-3']);
    expect(hub.hasChanges()).toBe(false);
    expect(server.record(PROJECT, 'srv-2')?.fields).toEqual({
      name: 'modeling',
      taskType: 'Modeling',
      tags: [],
      active: true,
      attrib: {},
      data: {},
      assignees: ['artist'],
      folderId: 'srv-1',
    });
    expect(server.record(PROJECT, 'srv-4')?.fields).toEqual({
      name: 'v001',
      tags: [],
      active: true,
      attrib: {},
      data: {},
      version: 1,
      taskId: 'srv-2',
      productId: 'srv-3',
    });
    expect(log.lines[log.lines.length - 1]).toBe(
      '[TrackerApi] hub.committed {"project":"demo","operations":4,"failed":0}'
    );
  });

  test('submits parents before children regardless of creation order', async () => {
    const child = hub.addNew('folder', 'sh010', null);
    const parent = hub.addNew('folder', 'shots', null);
    hub.updateEntity(child.id, { parentId: parent.id });

    await hub.commitChanges();

    expect(server.batches[0].map(operation => operation.entityId)).toEqual(['tmp-2', 'tmp-1']);
    expect(parent.id).toBe('srv-1');
    expect(child.id).toBe('srv-2');
    expect(child.parentId).toBe('srv-1');
    expect(hub.getPath(child.id)).toBe('/shots/sh010');
  });

  test('keeps failed creates pending with a failure marker', async () => {
    server.rejectOperation = operation => (operation.data?.name === 'props' ? 'Name is reserved' : null);
    const characters = hub.addNew('folder', 'characters', null);
    const props = hub.addNew('folder', 'props', null);
    const sets = hub.addNew('folder', 'sets', null);
    const modeling = hub.addNew('task', 'modeling', props.id);

    const results = await hub.commitChanges();

    expect(results.map(result => result.success)).toEqual([true, false, true, false]);
    expect(characters.id).toBe('srv-1');
    expect(sets.id).toBe('srv-2');
    expect(props.id).toBe('tmp-2');
    expect(props.state).toBe('new');
    expect(props.failure).toEqual({ operation: 'create', reason: 'Name is reserved' });
    expect(modeling.failure).toEqual({ operation: 'create', reason: "Referenced entity 'tmp-2' does not exist" });
    expect(hub.pendingChanges().created).toEqual([props, modeling]);
    expect(log.lines[log.lines.length - 1]).toBe(
      '[TrackerApi] hub.committed {"project":"demo","operations":4,"failed":2}'
    );

    server.rejectOperation = () => null;
    await hub.commitChanges();

    expect(props.id).toBe('srv-3');
    expect(modeling.parentId).toBe('srv-3');
    expect(props.failure).toBeNull();
    expect(hub.hasChanges()).toBe(false);
  });

  test('does nothing without pending changes', async () => {
    await expect(hub.commitChanges()).resolves.toEqual([]);
    expect(server.requests).toHaveLength(0);
  });
});

describe('EntityHub.commitChanges with persisted entities', () => {
  let server: FakeServer;
  let tree: ShotTree;
  let hub: EntityHub;

  beforeEach(async () => {
    server = new FakeServer();
    tree = seedShotTree(server);
    hub = new EntityHub(createConnection(server), PROJECT, { log: new MemoryChannel() });
    await hub.fetch();
  });

  test('sends attribute diffs and reads them back', async () => {
    hub.updateEntity(tree.sh010, { label: 'Shot 10', attributes: { fps: null, frameStart: 1001 } });

    await hub.commitChanges();

    expect(server.batches[0]).toEqual([
      expect.objectContaining({
        type: 'update',
        entityType: 'folder',
        entityId: tree.sh010,
        data: { label: 'Shot 10', attrib: { fps: null, frameStart: 1001 } },
      }),
    ]);
    expect(hub.get(tree.sh010)?.state).toBe('persisted');

    const reader = new EntityHub(createConnection(server), PROJECT, { log: new MemoryChannel() });
    await reader.fetch({ kinds: ['folder'], ids: [tree.sh010] });
    expect(reader.get(tree.sh010)?.attributes).toEqual({ frameStart: 1001 });
    expect(reader.get(tree.sh010)?.label).toBe('Shot 10');
  });

  test('orders creates, then updates, then deletes', async () => {
    hub.addNew('task', 'roto', tree.sh020, {}, { subtype: 'Roto' });
    hub.updateEntity(tree.plate, { subtype: 'render' });
    hub.deleteEntity(tree.lighting);

    await hub.commitChanges();

    expect(server.batches[0].map(operation => operation.type)).toEqual(['create', 'update', 'delete']);
    expect(server.record(PROJECT, tree.plate)?.fields.productType).toBe('render');
    expect(server.record(PROJECT, tree.lighting)).toBeUndefined();
  });

  test('deletes children before their parents', async () => {
    hub.deleteEntity(tree.sh010);

    const results = await hub.commitChanges();

    expect(server.batches[0].map(operation => operation.entityId)).toEqual([
      tree.compositing,
      tree.exr,
      tree.v001,
      tree.plate,
      tree.sh010,
    ]);
    expect(results.every(result => result.success)).toBe(true);
    expect(hub.entities().map(entity => entity.id)).toEqual([tree.shots, tree.sh020, tree.lighting]);
    expect(server.records(PROJECT).map(record => record.id)).toEqual([tree.shots, tree.sh020, tree.lighting]);
  });

  test('keeps failed deletes pending', async () => {
    server.rejectOperation = operation =>
      operation.type === 'delete' && operation.entityId === tree.exr ? 'Representation is locked' : null;
    hub.deleteEntity(tree.v001);

    await hub.commitChanges();

    expect(hub.get(tree.exr)?.state).toBe('pending-delete');
    expect(hub.get(tree.exr)?.failure).toEqual({ operation: 'delete', reason: 'Representation is locked' });
    expect(hub.get(tree.v001)?.failure).toEqual({
      operation: 'delete',
      reason: `Entity '${tree.v001}' has children`,
    });
  });
});
