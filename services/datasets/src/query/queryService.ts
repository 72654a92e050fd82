import type { DuckDbResultSet } from '@tabletalk/shared';
import { QueryExecutionError, TableNotFoundError, VersionNotFoundError } from '../errors';
import type { ServiceLogger } from '../logger';
import type { QueryHistory, VersionRegistry } from '../registry/types';
import { buildTableName, type ColumnInfo, type TableReader } from '../tables/materializer';
import { buildRawAnswer, type QueryPreview, type ResultSummarizer } from './summarizer';
import type { SqlGenerator } from './textToSql';

export const LATEST_VERSION = 'latest';

export interface QueryServiceOptions {
  registry: VersionRegistry;
  tables: TableReader;
  generator: SqlGenerator;
  summarizer: ResultSummarizer;
  logger: ServiceLogger;
  previewRows: number;
  sampleRows: number;
}

export interface AskRequest {
  datasetId: string;
  userId: string;
  question: string;
  versionId?: string;
}

export interface AskResult {
  versionId: string;
  tableName: string;
  answer: string;
  rawAnswer: string;
  generatedSql: string;
  preview: QueryPreview;
}

export interface TableSchema {
  tableName: string;
  columns: ColumnInfo[];
  rowCount: number;
}

export class QueryService {
  constructor(private readonly options: QueryServiceOptions) {}

  /** `latest` resolves to the newest version whose ingestion succeeded. */
  async resolveVersion(datasetId: string, userId: string, versionId: string = LATEST_VERSION): Promise<string> {
    if (versionId !== LATEST_VERSION) {
      return versionId;
    }
    const latest = await this.options.registry.getLatest(datasetId, userId, { readyOnly: true });
    if (!latest) {
      throw new VersionNotFoundError(datasetId);
    }
    return latest.versionId;
  }

  async describeTable(userId: string, datasetId: string, versionId: string): Promise<TableSchema> {
    const tableName = buildTableName(datasetId, versionId);
    const description = await this.options.tables.describe(userId, tableName);
    if (!description) {
      throw new TableNotFoundError(tableName);
    }
    return { tableName, ...description };
  }

  async ask(request: AskRequest): Promise<AskResult> {
    const { registry, tables, generator, summarizer, logger } = this.options;
    const versionId = await this.resolveVersion(request.datasetId, request.userId, request.versionId);
    const schema = await this.describeTable(request.userId, request.datasetId, versionId);

    const sample =
      this.options.sampleRows > 0
        ? await tables.sample(request.userId, schema.tableName, this.options.sampleRows)
        : { columns: [], rows: [] };

    const generatedSql = await generator.generate({
      question: request.question,
      tableName: schema.tableName,
      columns: schema.columns,
      sampleRows: sample.rows
    });
    logger.info({ tableName: schema.tableName, generatedSql }, '[tabletalk:query] generated SQL');

    let result: DuckDbResultSet;
    try {
      result = await tables.execute(request.userId, generatedSql);
    } catch (err) {
      throw new QueryExecutionError(err);
    }

    const preview: QueryPreview = {
      columns: result.columns,
      rows: result.rows.slice(0, this.options.previewRows),
      totalRows: result.rows.length
    };
    const rawAnswer = buildRawAnswer(result.rows);

    let answer: string;
    try {
      answer = await summarizer.summarize({
        question: request.question,
        sql: generatedSql,
        preview,
        rows: result.rows
      });
    } catch (err) {
      logger.error({ err }, '[tabletalk:query] failed to summarize results');
      answer = rawAnswer;
    }

    try {
      await registry.logQuery({
        datasetId: request.datasetId,
        versionId,
        userId: request.userId,
        question: request.question,
        generatedSql,
        rowCount: result.rows.length
      });
    } catch (err) {
      logger.warn({ err, datasetId: request.datasetId }, '[tabletalk:query] failed to record query log');
    }

    return { versionId, tableName: schema.tableName, answer, rawAnswer, generatedSql, preview };
  }

  async history(datasetId: string, userId: string, limit: number): Promise<QueryHistory> {
    return this.options.registry.listQueries(datasetId, userId, limit);
  }
}
