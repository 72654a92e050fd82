import assert from 'node:assert/strict';
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test, type TestContext } from 'node:test';

import { MissingChunkError } from '../src/errors';
import { assembleChunks } from '../src/ingestion/assembler';
import { ChunkStore } from '../src/staging/chunkStore';

async function makeStore(t: TestContext) {
  const root = await mkdtemp(path.join(os.tmpdir(), 'tabletalk-assemble-'));
  t.after(async () => {
    await rm(root, { recursive: true, force: true });
  });
  return { root, store: new ChunkStore(path.join(root, 'staging')) };
}

test('assembles chunks in index order regardless of arrival order', async (t) => {
  const { root, store } = await makeStore(t);
  const parts = ['id,name\n', '1,alpha\n', '2,beta\n', '3,gamma\n'];
  for (const index of [2, 0, 3, 1]) {
    await store.putChunk('u1', 'd1', index, Buffer.from(parts[index]));
  }

  const destination = path.join(root, 'data', 'u1', 'd1-vabc.csv');
  const result = await assembleChunks(store.stagingDirectory('u1', 'd1'), parts.length, destination);

  assert.equal(await readFile(destination, 'utf8'), parts.join(''));
  assert.equal(result.chunkCount, 4);
  assert.equal(result.bytesWritten, Buffer.byteLength(parts.join('')));
  assert.equal(result.destinationPath, destination);
});

test('reports the first missing chunk and leaves no destination file', async (t) => {
  const { root, store } = await makeStore(t);
  await store.putChunk('u1', 'd1', 0, Buffer.from('a\n'));
  await store.putChunk('u1', 'd1', 2, Buffer.from('c\n'));

  const destination = path.join(root, 'data', 'u1', 'd1-vabc.csv');
  await assert.rejects(assembleChunks(store.stagingDirectory('u1', 'd1'), 3, destination), (error: unknown) => {
    assert.ok(error instanceof MissingChunkError);
    assert.equal(error.chunkIndex, 1);
    assert.equal(error.message, 'Missing chunk 1');
    return true;
  });
  assert.equal(existsSync(destination), false);
});

test('removes a stale destination when a chunk is missing', async (t) => {
  const { root, store } = await makeStore(t);
  await store.putChunk('u1', 'd1', 1, Buffer.from('b\n'));
  const destination = path.join(root, 'stale.csv');
  await writeFile(destination, 'left over from an earlier attempt');

  await assert.rejects(assembleChunks(store.stagingDirectory('u1', 'd1'), 2, destination), MissingChunkError);
  assert.equal(existsSync(destination), false);
});

test('rejects a non-positive chunk count', async (t) => {
  const { root, store } = await makeStore(t);
  await assert.rejects(
    assembleChunks(store.stagingDirectory('u1', 'd1'), 0, path.join(root, 'out.csv')),
    RangeError
  );
});

test('stops before writing when the signal is already aborted', async (t) => {
  const { root, store } = await makeStore(t);
  await store.putChunk('u1', 'd1', 0, Buffer.from('a\n'));
  const destination = path.join(root, 'out.csv');
  const controller = new AbortController();
  controller.abort(new Error('stop'));

  await assert.rejects(
    assembleChunks(store.stagingDirectory('u1', 'd1'), 1, destination, { signal: controller.signal }),
    { message: 'stop' }
  );
  assert.equal(existsSync(destination), false);
});
