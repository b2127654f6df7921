import { FakeServer, PROJECT } from './fakeServer';

export interface ShotTree {
  shots: string;
  sh010: string;
  compositing: string;
  plate: string;
  v001: string;
  exr: string;
  sh020: string;
  lighting: string;
}

/**
 * Seed a small shot tree:
 *
 * /shots/sh010 (task compositing, product plate/v001/exr linked to compositing)
 * /shots/sh020 (task lighting)
 */
export function seedShotTree(server: FakeServer): ShotTree {
  const shots = server.seed(PROJECT, 'folder', { name: 'shots', parentId: null, folderType: 'Sequence' });
  const sh010 = server.seed(PROJECT, 'folder', {
    name: 'sh010',
    parentId: shots,
    folderType: 'Shot',
    attrib: { fps: 24 },
  });
  const compositing = server.seed(PROJECT, 'task', {
    name: 'compositing',
    folderId: sh010,
    taskType: 'Compositing',
  });
  const plate = server.seed(PROJECT, 'product', { name: 'plate', folderId: sh010, productType: 'plate' });
  const v001 = server.seed(PROJECT, 'version', { name: 'v001', version: 1, productId: plate, taskId: compositing });
  const exr = server.seed(PROJECT, 'representation', { name: 'exr', versionId: v001 });
  const sh020 = server.seed(PROJECT, 'folder', { name: 'sh020', parentId: shots, folderType: 'Shot' });
  const lighting = server.seed(PROJECT, 'task', { name: 'lighting', folderId: sh020, taskType: 'Lighting' });
  return { shots, sh010, compositing, plate, v001, exr, sh020, lighting };
}
