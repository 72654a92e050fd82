import type { DuckDbRow } from '@tabletalk/shared';
import type { ServiceLogger } from '../logger';
import { createChatCompletion, type OpenAiClientOptions } from './openAiClient';

export const MAX_SUMMARY_LENGTH = 1500;

export interface QueryPreview {
  columns: string[];
  rows: DuckDbRow[];
  totalRows: number;
}

export interface SummaryRequest {
  question: string;
  sql: string;
  preview: QueryPreview;
  rows: DuckDbRow[];
}

export interface ResultSummarizer {
  summarize(request: SummaryRequest): Promise<string>;
}

/**
 * Deterministic answer: a single-cell result reads `column: value`,
 * anything else reports the row count.
 */
export function buildRawAnswer(rows: DuckDbRow[]): string {
  if (rows.length === 0) {
    return 'No results found.';
  }
  if (rows.length === 1) {
    const entries = Object.entries(rows[0]);
    if (entries.length === 1) {
      const [column, value] = entries[0];
      return `${column}: ${typeof value === 'string' ? value : JSON.stringify(value)}`;
    }
  }
  return `Found ${rows.length} ${rows.length === 1 ? 'result' : 'results'}.`;
}

export function truncateSummary(summary: string, limit = MAX_SUMMARY_LENGTH): string {
  if (summary.length <= limit) {
    return summary;
  }
  return `${summary.slice(0, limit - 3)}...`;
}

function formatPreviewRows(rows: DuckDbRow[], maxRows = 5): string {
  if (rows.length === 0) {
    return 'No data available';
  }
  return rows
    .slice(0, maxRows)
    .map((row) => `- ${Object.entries(row).map(([key, value]) => `${key}: ${JSON.stringify(value)}`).join(', ')}`)
    .join('\n');
}

const SUMMARY_SYSTEM_PROMPT = `You are a data analyst explaining query results.
Answer the user's question from the results in at most ${MAX_SUMMARY_LENGTH} characters.
Highlight the key figures, format numbers for readability and mention trends in time series.
If there are no results, explain likely reasons.`;

export class OpenAiResultSummarizer implements ResultSummarizer {
  constructor(
    private readonly options: OpenAiClientOptions,
    private readonly logger: ServiceLogger
  ) {}

  async summarize(request: SummaryRequest): Promise<string> {
    const userPrompt = [
      `Question: ${request.question}`,
      `SQL Query Used:\n${request.sql}`,
      `Columns: ${request.preview.columns.join(', ')}\nTotal Rows: ${request.preview.totalRows}`,
      `Sample Data:\n${formatPreviewRows(request.preview.rows)}`
    ].join('\n\n');

    try {
      const summary = await createChatCompletion(
        this.options,
        [
          { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
          { role: 'user', content: userPrompt }
        ],
        { temperature: 0.1, presencePenalty: 0.2, frequencyPenalty: 0.2 }
      );
      return truncateSummary(summary);
    } catch (err) {
      this.logger.warn({ err }, '[tabletalk:query] summarization failed; using fallback answer');
      return buildRawAnswer(request.rows);
    }
  }
}

export class FallbackResultSummarizer implements ResultSummarizer {
  async summarize(request: SummaryRequest): Promise<string> {
    return buildRawAnswer(request.rows);
  }
}
