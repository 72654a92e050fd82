import type { DuckDbRow } from '@tabletalk/shared';
import { SqlGenerationError, describeError } from '../errors';
import type { ColumnInfo } from '../tables/materializer';
import { createChatCompletion, type OpenAiClientOptions } from './openAiClient';

export interface SqlGenerationRequest {
  question: string;
  tableName: string;
  columns: ColumnInfo[];
  sampleRows: DuckDbRow[];
}

export interface SqlGenerator {
  generate(request: SqlGenerationRequest): Promise<string>;
}

const MAX_RESULT_ROWS = 1000;

export function removeCodeFences(sql: string): string {
  const trimmed = sql.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }
  const lines = trimmed.split(/\r?\n/);
  if (lines.length > 0 && lines[0].trim().startsWith('```')) {
    lines.shift();
  }
  if (lines.length > 0 && lines[lines.length - 1].trim() === '```') {
    lines.pop();
  }
  return lines.join('\n').trim();
}

/** The generated statement must be a SELECT that names the dataset table. */
export function validateGeneratedSql(sql: string, tableName: string): string {
  const cleaned = removeCodeFences(sql);
  if (!cleaned.toUpperCase().includes('SELECT') || !cleaned.includes(tableName)) {
    throw new SqlGenerationError(`Generated SQL appears invalid: ${cleaned}`);
  }
  return cleaned;
}

function formatSampleRows(rows: DuckDbRow[]): string {
  if (rows.length === 0) {
    return 'No sample rows available.';
  }
  return rows
    .map((row, index) => {
      const fields = Object.entries(row).map(([key, value]) => `  ${key}: ${JSON.stringify(value)}`);
      return [`Row ${index + 1}:`, ...fields].join('\n');
    })
    .join('\n');
}

export function buildSqlSystemPrompt(request: SqlGenerationRequest): string {
  const columns = request.columns.map((column) => `- ${column.name} (${column.type})`).join('\n');
  return `You convert natural language questions into DuckDB SQL queries.
The table name is "${request.tableName}" with these columns:

${columns}

Sample data:
${formatSampleRows(request.sampleRows)}

Rules:
1. Return only the SQL query, without explanations.
2. Use the column names and types exactly as listed.
3. Always put column names in double quotes.
4. Limit results to ${MAX_RESULT_ROWS} rows unless asked for more.
5. Give aggregations meaningful column aliases.
6. If the question is unclear, return SELECT * FROM "${request.tableName}" LIMIT 10`;
}

export class OpenAiSqlGenerator implements SqlGenerator {
  constructor(private readonly options: OpenAiClientOptions) {}

  async generate(request: SqlGenerationRequest): Promise<string> {
    let raw: string;
    try {
      raw = await createChatCompletion(
        this.options,
        [
          { role: 'system', content: buildSqlSystemPrompt(request) },
          { role: 'user', content: `Convert this to SQL: ${request.question}` }
        ],
        { temperature: 0, maxTokens: 500 }
      );
    } catch (err) {
      throw new SqlGenerationError(describeError(err));
    }
    return validateGeneratedSql(raw, request.tableName);
  }
}

/** Used when no OpenAI key is configured. */
export class UnconfiguredSqlGenerator implements SqlGenerator {
  async generate(): Promise<string> {
    throw new SqlGenerationError('OPENAI_API_KEY is not configured');
  }
}
