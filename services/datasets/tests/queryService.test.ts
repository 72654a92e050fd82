import assert from 'node:assert/strict';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { test, type TestContext } from 'node:test';

import { QueryExecutionError, SqlGenerationError, TableNotFoundError, VersionNotFoundError } from '../src/errors';
import { QueryService } from '../src/query/queryService';
import {
  OpenAiResultSummarizer,
  buildRawAnswer,
  truncateSummary,
  type ResultSummarizer,
  type SummaryRequest
} from '../src/query/summarizer';
import {
  OpenAiSqlGenerator,
  removeCodeFences,
  validateGeneratedSql,
  type SqlGenerationRequest,
  type SqlGenerator
} from '../src/query/textToSql';
import { InMemoryVersionRegistry } from '../src/registry';
import { DuckDbTableStore } from '../src/tables/materializer';
import { createTestWorkspace, silentLogger } from './utils/testConfig';

class StubGenerator implements SqlGenerator {
  readonly requests: SqlGenerationRequest[] = [];

  constructor(private readonly sql: string) {}

  async generate(request: SqlGenerationRequest): Promise<string> {
    this.requests.push(request);
    return this.sql;
  }
}

class StubSummarizer implements ResultSummarizer {
  readonly requests: SummaryRequest[] = [];

  async summarize(request: SummaryRequest): Promise<string> {
    this.requests.push(request);
    return `summary of ${request.preview.totalRows} rows`;
  }
}

class BrokenSummarizer implements ResultSummarizer {
  async summarize(): Promise<string> {
    throw new Error('model unavailable');
  }
}

const GROUPED_SQL = 'SELECT region, sum(amount)::INTEGER AS total FROM "sales_vv1" GROUP BY region ORDER BY region';

async function setup(t: TestContext, options: { generator?: SqlGenerator; summarizer?: ResultSummarizer } = {}) {
  const workspace = await createTestWorkspace('tabletalk-query-');
  t.after(workspace.cleanup);
  const registry = new InMemoryVersionRegistry();
  const tables = new DuckDbTableStore(workspace.config.storage.duckdbRoot);
  const source = path.join(workspace.root, 'sales.csv');
  await writeFile(source, 'region,amount\nnorth,10\nsouth,20\nnorth,5\n');
  await tables.materialize('u1', 'sales', 'v1', source);
  await registry.register({ datasetId: 'sales', versionId: 'v1', userId: 'u1', filePath: source });

  const generator = options.generator ?? new StubGenerator(GROUPED_SQL);
  const summarizer = options.summarizer ?? new StubSummarizer();
  const service = new QueryService({
    registry,
    tables,
    generator,
    summarizer,
    logger: silentLogger,
    previewRows: 10,
    sampleRows: 5
  });
  const markReady = () => registry.markStatus({ datasetId: 'sales', versionId: 'v1', userId: 'u1' }, 'ready');
  return { registry, tables, service, generator, summarizer, markReady };
}

test('answers a question against the latest ready version', async (t) => {
  const generator = new StubGenerator(GROUPED_SQL);
  const summarizer = new StubSummarizer();
  const { service, registry, markReady } = await setup(t, { generator, summarizer });
  await markReady();

  const result = await service.ask({ datasetId: 'sales', userId: 'u1', question: 'Total per region?' });

  assert.equal(result.versionId, 'v1');
  assert.equal(result.tableName, 'sales_vv1');
  assert.equal(result.generatedSql, GROUPED_SQL);
  assert.deepEqual(result.preview, {
    columns: ['region', 'total'],
    rows: [
      { region: 'north', total: 15 },
      { region: 'south', total: 20 }
    ],
    totalRows: 2
  });
  assert.equal(result.rawAnswer, 'Found 2 results.');
  assert.equal(result.answer, 'summary of 2 rows');

  assert.equal(generator.requests.length, 1);
  assert.deepEqual(
    generator.requests[0].columns.map((column) => column.name),
    ['region', 'amount']
  );
  assert.equal(generator.requests[0].sampleRows.length, 3);
  assert.equal(summarizer.requests[0].sql, GROUPED_SQL);

  const history = await registry.listQueries('sales', 'u1', 10);
  assert.equal(history.totalCount, 1);
  assert.equal(history.queries[0].question, 'Total per region?');
  assert.equal(history.queries[0].rowCount, 2);
});

test('latest ignores versions that are not ready', async (t) => {
  const { service } = await setup(t);
  await assert.rejects(service.ask({ datasetId: 'sales', userId: 'u1', question: 'anything' }), VersionNotFoundError);
});

test('an explicit version without a table is not found', async (t) => {
  const { service } = await setup(t);
  await assert.rejects(
    service.ask({ datasetId: 'sales', userId: 'u1', question: 'anything', versionId: 'v2' }),
    (error: unknown) => {
      assert.ok(error instanceof TableNotFoundError);
      assert.equal(error.message, "Table sales_vv2 not found in user's database");
      return true;
    }
  );
});

test('execution failures surface as QueryExecutionError', async (t) => {
  const { service, markReady } = await setup(t, { generator: new StubGenerator('SELECT nope FROM "sales_vv1"') });
  await markReady();
  await assert.rejects(service.ask({ datasetId: 'sales', userId: 'u1', question: 'q' }), QueryExecutionError);
});

test('falls back to the raw answer when summarization throws', async (t) => {
  const { service, markReady } = await setup(t, {
    generator: new StubGenerator('SELECT count(*)::INTEGER AS total FROM "sales_vv1"'),
    summarizer: new BrokenSummarizer()
  });
  await markReady();

  const result = await service.ask({ datasetId: 'sales', userId: 'u1', question: 'How many rows?' });
  assert.equal(result.rawAnswer, 'total: 3');
  assert.equal(result.answer, 'total: 3');
});

test('raw answers describe the result shape', () => {
  assert.equal(buildRawAnswer([]), 'No results found.');
  assert.equal(buildRawAnswer([{ total: 42 }]), 'total: 42');
  assert.equal(buildRawAnswer([{ city: 'oslo' }]), 'city: oslo');
  assert.equal(buildRawAnswer([{ a: 1, b: 2 }]), 'Found 1 result.');
  assert.equal(buildRawAnswer([{ a: 1 }, { a: 2 }, { a: 3 }]), 'Found 3 results.');
});

test('summaries are capped at 1500 characters', () => {
  const capped = truncateSummary('x'.repeat(1600));
  assert.equal(capped.length, 1500);
  assert.ok(capped.endsWith('...'));
  assert.equal(truncateSummary('short'), 'short');
});

test('generated SQL is unfenced and must reference the table', () => {
  assert.equal(removeCodeFences('```sql\nSELECT * FROM "t_v1"\n```'), 'SELECT * FROM "t_v1"');
  assert.equal(removeCodeFences('SELECT 1'), 'SELECT 1');
  assert.equal(validateGeneratedSql('```\nselect * from "t_v1"\n```', 't_v1'), 'select * from "t_v1"');
  assert.throws(() => validateGeneratedSql('DROP TABLE "t_v1"', 't_v1'), SqlGenerationError);
  assert.throws(() => validateGeneratedSql('SELECT * FROM other', 't_v1'), SqlGenerationError);
});

test('OpenAI generator posts a chat completion and cleans the reply', async () => {
  const calls: Array<{ url: string; authorization: string | null; body: unknown }> = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const headers = new Headers(init?.headers);
    calls.push({
      url: String(input),
      authorization: headers.get('authorization'),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : null
    });
    return new Response(
      JSON.stringify({ choices: [{ message: { content: '```sql\nSELECT * FROM "t_v1" LIMIT 10\n```' } }] }),
      { status: 200, headers: { 'content-type': 'application/json' } }
    );
  };
  const generator = new OpenAiSqlGenerator({
    apiKey: 'test-secret',
    baseUrl: 'http://llm.test/v1',
    model: 'gpt-4o-mini',
    timeoutMs: 1000,
    fetchImpl
  });

  const sql = await generator.generate({
    question: 'Show me everything',
    tableName: 't_v1',
    columns: [{ name: 'id', type: 'BIGINT' }],
    sampleRows: []
  });

  assert.equal(sql, 'SELECT * FROM "t_v1" LIMIT 10');
  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, 'http://llm.test/v1/chat/completions');
  assert.equal(calls[0].authorization, 'Bearer test-secret');
});

test('OpenAI generator failures become SqlGenerationError', async () => {
  const fetchImpl: typeof fetch = async () => new Response('rate limited', { status: 429 });
  const generator = new OpenAiSqlGenerator({
    apiKey: 'test-secret',
    baseUrl: 'http://llm.test/v1',
    model: 'gpt-4o-mini',
    timeoutMs: 1000,
    fetchImpl
  });

  await assert.rejects(
    generator.generate({ question: 'q', tableName: 't_v1', columns: [], sampleRows: [] }),
    (error: unknown) => {
      assert.ok(error instanceof SqlGenerationError);
      assert.equal(error.message, 'OpenAI request failed (429): rate limited');
      return true;
    }
  );
});

test('OpenAI summarizer falls back when the request fails', async () => {
  const fetchImpl: typeof fetch = async () => new Response('upstream down', { status: 503 });
  const summarizer = new OpenAiResultSummarizer(
    { apiKey: 'test-secret', baseUrl: 'http://llm.test/v1', model: 'gpt-4o-mini', timeoutMs: 1000, fetchImpl },
    silentLogger
  );

  const answer = await summarizer.summarize({
    question: 'How many?',
    sql: 'SELECT 1',
    preview: { columns: ['n'], rows: [{ n: 1 }], totalRows: 1 },
    rows: [{ n: 1 }]
  });
  assert.equal(answer, 'n: 1');
});
