import assert from 'node:assert/strict';
import { test } from 'node:test';

import { RegistrationConflictError } from '../src/errors';
import { InMemoryVersionRegistry, generateVersionId } from '../src/registry';

function steppingClock(startIso: string, stepMs = 1000): () => Date {
  let current = Date.parse(startIso);
  return () => {
    const value = new Date(current);
    current += stepMs;
    return value;
  };
}

test('registers versions as pending and rejects duplicates', async () => {
  const registry = new InMemoryVersionRegistry(steppingClock('2024-05-01T00:00:00.000Z'));
  const version = await registry.register({
    datasetId: 'd1',
    versionId: 'v1',
    userId: 'u1',
    filePath: '/data/u1/d1-vv1.csv'
  });

  assert.equal(version.status, 'pending');
  assert.equal(version.createdAt, '2024-05-01T00:00:00.000Z');

  await assert.rejects(
    registry.register({ datasetId: 'd1', versionId: 'v1', userId: 'u1', filePath: '/elsewhere' }),
    RegistrationConflictError
  );
  // same dataset and version under another user is a different key
  await registry.register({ datasetId: 'd1', versionId: 'v1', userId: 'u2', filePath: '/data/u2/d1-vv1.csv' });
});

test('resolves the latest version, optionally only ready ones', async () => {
  const registry = new InMemoryVersionRegistry(steppingClock('2024-05-01T00:00:00.000Z'));
  await registry.register({ datasetId: 'd1', versionId: 'old', userId: 'u1', filePath: '/a' });
  await registry.register({ datasetId: 'd1', versionId: 'new', userId: 'u1', filePath: '/b' });
  await registry.register({ datasetId: 'd2', versionId: 'other', userId: 'u1', filePath: '/c' });

  assert.equal((await registry.getLatest('d1', 'u1'))?.versionId, 'new');
  assert.equal(await registry.getLatest('d1', 'u1', { readyOnly: true }), null);

  const marked = await registry.markStatus({ datasetId: 'd1', versionId: 'old', userId: 'u1' }, 'ready');
  assert.equal(marked?.status, 'ready');
  assert.equal((await registry.getLatest('d1', 'u1', { readyOnly: true }))?.versionId, 'old');
  assert.equal(await registry.getLatest('d1', 'u2'), null);
  assert.equal(await registry.markStatus({ datasetId: 'd1', versionId: 'nope', userId: 'u1' }, 'failed'), null);
});

test('lists query logs newest first with a total count', async () => {
  const registry = new InMemoryVersionRegistry(steppingClock('2024-05-01T00:00:00.000Z'));
  for (const question of ['first?', 'second?', 'third?']) {
    await registry.logQuery({
      datasetId: 'd1',
      versionId: 'v1',
      userId: 'u1',
      question,
      generatedSql: 'SELECT 1 FROM "d1_vv1"',
      rowCount: 1
    });
  }
  await registry.logQuery({
    datasetId: 'd1',
    versionId: 'v1',
    userId: 'u2',
    question: 'not mine',
    generatedSql: 'SELECT 1',
    rowCount: 0
  });

  const history = await registry.listQueries('d1', 'u1', 2);
  assert.equal(history.totalCount, 3);
  assert.deepEqual(
    history.queries.map((entry) => entry.question),
    ['third?', 'second?']
  );
});

test('version ids are eight hex characters', () => {
  const ids = new Set(Array.from({ length: 20 }, () => generateVersionId()));
  for (const id of ids) {
    assert.match(id, /^[0-9a-f]{8}$/);
  }
  assert.ok(ids.size > 1);
});
