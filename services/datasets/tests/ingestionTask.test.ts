import assert from 'node:assert/strict';
import { existsSync } from 'node:fs';
import path from 'node:path';
import { test, type TestContext } from 'node:test';

import { SchemaInferenceError } from '../src/errors';
import { runIngestionAttempt, runIngestionTask, type IngestionTaskDependencies } from '../src/ingestion/task';
import type { IngestionJobPayload, IngestionOutcome, RetryPolicy } from '../src/ingestion/types';
import { InMemoryVersionRegistry } from '../src/registry';
import { ChunkStore } from '../src/staging/chunkStore';
import {
  DuckDbTableStore,
  type MaterializeOptions,
  type MaterializedTableInfo,
  type TableMaterializer
} from '../src/tables/materializer';
import { createTestWorkspace, silentLogger } from './utils/testConfig';

const CSV_PARTS = ['name,age,city\nalice,30,paris\n', 'bob,25,rome\ncarol,41,oslo\n'];

async function setup(t: TestContext) {
  const workspace = await createTestWorkspace('tabletalk-task-');
  t.after(workspace.cleanup);
  const chunks = new ChunkStore(workspace.config.storage.stagingRoot);
  const registry = new InMemoryVersionRegistry();
  const stage = async (parts: string[] = CSV_PARTS, indices?: number[]) => {
    for (const index of indices ?? parts.map((_, position) => position)) {
      await chunks.putChunk('u1', 'd1', index, Buffer.from(parts[index]));
    }
  };
  const payload: IngestionJobPayload = {
    userId: 'u1',
    datasetId: 'd1',
    versionId: 'v1',
    stagingDir: chunks.stagingDirectory('u1', 'd1'),
    destinationPath: path.join(workspace.config.storage.dataRoot, 'u1', 'd1-vv1.csv'),
    totalChunks: CSV_PARTS.length,
    attempt: 1,
    submittedAt: new Date().toISOString()
  };
  await registry.register({ datasetId: 'd1', versionId: 'v1', userId: 'u1', filePath: payload.destinationPath });
  return { workspace, chunks, registry, stage, payload };
}

function policy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return { maxRetries: 3, retryDelayMs: 60_000, timeoutMs: 30_000, ...overrides };
}

class FailingMaterializer implements TableMaterializer {
  calls = 0;

  async materialize(_userId: string, datasetId: string, versionId: string): Promise<MaterializedTableInfo> {
    this.calls += 1;
    throw new SchemaInferenceError(`${datasetId}_v${versionId}`, new Error('could not sniff dialect'));
  }

  async dropTable(): Promise<void> {
    return undefined;
  }

  async namespaceExists(): Promise<boolean> {
    return false;
  }

  namespacePath(userId: string): string {
    return `/nowhere/${userId}/db.duckdb`;
  }
}

class SlowMaterializer implements TableMaterializer {
  constructor(private readonly delayMs: number) {}

  async materialize(_userId: string, datasetId: string, versionId: string): Promise<MaterializedTableInfo> {
    await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    return { tableName: `${datasetId}_v${versionId}`, databasePath: '/nowhere', columns: [], rowCount: 0 };
  }

  async dropTable(): Promise<void> {
    return undefined;
  }

  async namespaceExists(): Promise<boolean> {
    return true;
  }

  namespacePath(userId: string): string {
    return `/nowhere/${userId}/db.duckdb`;
  }
}

/** Real store whose materialization keeps the attempt busy after the table exists. */
class LingeringMaterializer implements TableMaterializer {
  constructor(
    private readonly inner: DuckDbTableStore,
    private readonly lingerMs: number
  ) {}

  async materialize(
    userId: string,
    datasetId: string,
    versionId: string,
    sourceFilePath: string,
    options?: MaterializeOptions
  ): Promise<MaterializedTableInfo> {
    const table = await this.inner.materialize(userId, datasetId, versionId, sourceFilePath, options);
    await new Promise((resolve) => setTimeout(resolve, this.lingerMs));
    return table;
  }

  dropTable(userId: string, tableName: string): Promise<void> {
    return this.inner.dropTable(userId, tableName);
  }

  namespaceExists(userId: string): Promise<boolean> {
    return this.inner.namespaceExists(userId);
  }

  namespacePath(userId: string): string {
    return this.inner.namespacePath(userId);
  }
}

test('a successful attempt materializes the table and clears staging', async (t) => {
  const { workspace, registry, stage, payload } = await setup(t);
  await stage();
  const deps: IngestionTaskDependencies = {
    materializer: new DuckDbTableStore(workspace.config.storage.duckdbRoot),
    registry,
    logger: silentLogger,
    policy: policy()
  };

  const outcome = await runIngestionAttempt(payload, deps);

  assert.equal(outcome.status, 'succeeded');
  assert.ok(outcome.status === 'succeeded');
  assert.equal(outcome.table.tableName, 'd1_vv1');
  assert.equal(outcome.table.rowCount, 3);
  assert.equal(existsSync(payload.stagingDir), false);
  assert.equal(existsSync(payload.destinationPath), true);
  assert.equal((await registry.get({ datasetId: 'd1', versionId: 'v1', userId: 'u1' }))?.status, 'ready');
});

test('a deterministically failing materializer is retried three times then fails permanently', async (t) => {
  const { registry, stage, payload } = await setup(t);
  await stage();
  const materializer = new FailingMaterializer();
  const outcomes: IngestionOutcome[] = [];
  const stagingPresentAfterFailure: boolean[] = [];
  const sleeps: number[] = [];

  const final = await runIngestionTask(
    payload,
    { materializer, registry, logger: silentLogger, policy: policy() },
    {
      sleep: async (ms) => {
        sleeps.push(ms);
        // each attempt restarts from assembly, so put the chunks back
        await stage();
      },
      onOutcome: (outcome) => {
        outcomes.push(outcome);
        stagingPresentAfterFailure.push(existsSync(payload.stagingDir));
      }
    }
  );

  assert.deepEqual(
    outcomes.map((outcome) => [outcome.status, outcome.attempt]),
    [
      ['retrying', 1],
      ['retrying', 2],
      ['retrying', 3],
      ['failed_permanently', 4]
    ]
  );
  assert.equal(final.status, 'failed_permanently');
  assert.equal(materializer.calls, 4);
  assert.deepEqual(sleeps, [60_000, 60_000, 60_000]);
  assert.deepEqual(stagingPresentAfterFailure, [false, false, false, false]);
  assert.equal(existsSync(payload.destinationPath), false);
  assert.equal((await registry.get({ datasetId: 'd1', versionId: 'v1', userId: 'u1' }))?.status, 'failed');
});

test('without re-staged chunks later attempts fail at assembly', async (t) => {
  const { registry, stage, payload } = await setup(t);
  await stage();
  const materializer = new FailingMaterializer();
  const reasons: string[] = [];

  const final = await runIngestionTask(
    payload,
    { materializer, registry, logger: silentLogger, policy: policy({ maxRetries: 2 }) },
    {
      sleep: async () => undefined,
      onOutcome: (outcome) => {
        if (outcome.status !== 'succeeded') {
          reasons.push(outcome.errorName);
        }
      }
    }
  );

  assert.equal(final.status, 'failed_permanently');
  assert.equal(materializer.calls, 1);
  assert.deepEqual(reasons, ['SchemaInferenceError', 'MissingChunkError', 'MissingChunkError']);
});

test('a missing chunk fails the attempt without calling the materializer', async (t) => {
  const { registry, stage, payload } = await setup(t);
  await stage(['a\n', 'b\n', 'c\n'], [0, 2]);
  const materializer = new FailingMaterializer();

  const outcome = await runIngestionAttempt(
    { ...payload, totalChunks: 3 },
    { materializer, registry, logger: silentLogger, policy: policy({ maxRetries: 0 }) }
  );

  assert.deepEqual(outcome, {
    status: 'failed_permanently',
    attempt: 1,
    reason: 'Missing chunk 1',
    errorName: 'MissingChunkError'
  });
  assert.equal(materializer.calls, 0);
  assert.equal(existsSync(payload.stagingDir), false);
});

test('an attempt that exceeds the timeout fails permanently without retry', async (t) => {
  const { registry, stage, payload } = await setup(t);
  await stage();

  const outcome = await runIngestionAttempt(payload, {
    materializer: new SlowMaterializer(150),
    registry,
    logger: silentLogger,
    policy: policy({ timeoutMs: 20 })
  });

  assert.equal(outcome.status, 'failed_permanently');
  assert.ok(outcome.status === 'failed_permanently');
  assert.equal(outcome.errorName, 'TaskTimeoutError');
  assert.equal(outcome.reason, 'Ingestion attempt exceeded 20ms');
  assert.equal(existsSync(payload.stagingDir), false);
  assert.equal(existsSync(payload.destinationPath), false);
  assert.equal((await registry.get({ datasetId: 'd1', versionId: 'v1', userId: 'u1' }))?.status, 'failed');
});

test('a timed-out attempt leaves no table behind for the failed version', async (t) => {
  const { workspace, registry, stage, payload } = await setup(t);
  await stage();
  const store = new DuckDbTableStore(workspace.config.storage.duckdbRoot);

  const outcome = await runIngestionAttempt(payload, {
    materializer: new LingeringMaterializer(store, 300),
    registry,
    logger: silentLogger,
    policy: policy({ timeoutMs: 50 })
  });

  assert.equal(outcome.status, 'failed_permanently');
  assert.ok(outcome.status === 'failed_permanently');
  assert.equal(outcome.errorName, 'TaskTimeoutError');
  assert.equal((await registry.get({ datasetId: 'd1', versionId: 'v1', userId: 'u1' }))?.status, 'failed');
  assert.equal(await store.describe('u1', 'd1_vv1'), null);
  assert.equal(existsSync(payload.destinationPath), false);
});

test('aborting before materialization creates nothing', async (t) => {
  const { workspace } = await setup(t);
  const store = new DuckDbTableStore(workspace.config.storage.duckdbRoot);
  const controller = new AbortController();
  controller.abort(new Error('stopped'));

  await assert.rejects(
    store.materialize('u1', 'd1', 'v1', '/unused.csv', { signal: controller.signal }),
    { message: 'stopped' }
  );
  assert.equal(await store.namespaceExists('u1'), false);
});
