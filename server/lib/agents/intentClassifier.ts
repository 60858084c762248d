import { z } from 'zod';
import {
  chartKindSchema,
  conditionOperatorSchema,
  intentCategorySchema,
  type ChartKind,
  type FilterCondition,
  type IntentCategory,
  type IntentSource,
} from '../../../shared/schema.js';
import type { Dataset } from '../datasetLoader.js';
import { ClassifierUnavailableError } from '../errors.js';
import { buildColumnContext, formatColumnContext } from './columnContext.js';
import { findMatchingColumn, resolveColumns } from './utils/columnMatcher.js';

/**
 * Classified question: category plus the parameters its executor reads
 */
export interface Intent {
  readonly category: IntentCategory;
  readonly columns: ReadonlySet<string>;
  readonly operations: ReadonlySet<string>;
  readonly chartKind?: ChartKind;
  readonly conditions?: readonly FilterCondition[];
}

/**
 * Ordered decision list: the first category with a keyword in the question wins.
 * The order is part of the behaviour ("average ... chart" is a summary question).
 */
export const KEYWORD_RULES: ReadonlyArray<readonly [IntentCategory, readonly string[]]> = [
  ['summary', ['average', 'mean', 'sum', 'total', 'count', 'minimum', 'maximum', 'min', 'max', 'median', 'std', 'standard deviation', 'statistics', 'how many', 'what is the']],
  ['visualization', ['chart', 'graph', 'plot', 'histogram', 'bar chart', 'line chart', 'scatter plot', 'pie chart', 'box plot', 'show', 'visualize', 'display', 'create a']],
  ['filter', ['where', 'filter', 'under', 'over', 'above', 'below', 'greater than', 'less than', 'equal to', 'customers who', 'records where']],
  ['comparison', ['compare', 'comparison', 'by', 'across', 'between', 'vs', 'versus']],
  ['correlation', ['correlation', 'relationship', 'related', 'correlated']],
];

export const OPERATION_KEYWORDS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['average', ['average', 'mean']],
  ['sum', ['sum', 'total']],
  ['count', ['count', 'how many']],
  ['min', ['minimum', 'min', 'lowest', 'smallest']],
  ['max', ['maximum', 'max', 'highest', 'largest']],
  ['median', ['median']],
  ['std', ['std', 'standard deviation']],
];

const CHART_KEYWORDS: ReadonlyArray<readonly [ChartKind, readonly string[]]> = [
  ['histogram', ['histogram', 'distribution']],
  ['line', ['line', 'trend']],
  ['scatter', ['scatter']],
  ['pie', ['pie']],
  ['box', ['box']],
];

// Keywords match as plain substrings of the lowercased text: "summarize" has "sum", "plotting" has "plot"
function firstMatch<T>(text: string, table: ReadonlyArray<readonly [T, readonly string[]]>): T | undefined {
  const lowered = text.toLowerCase();
  return table.find(([, keywords]) => keywords.some((keyword) => lowered.includes(keyword)))?.[0];
}

export function classifyByKeywords(question: string): IntentCategory {
  return firstMatch(question, KEYWORD_RULES) ?? 'general';
}

export function extractOperations(text: string): Set<string> {
  const lowered = text.toLowerCase();
  const operations = new Set<string>();
  for (const [operation, keywords] of OPERATION_KEYWORDS) {
    if (keywords.some((keyword) => lowered.includes(keyword))) {
      operations.add(operation);
    }
  }
  return operations;
}

export function detectChartKind(text: string): ChartKind {
  return firstMatch(text, CHART_KEYWORDS) ?? 'bar';
}

/**
 * Local classification: decision list, column resolver, operation and chart keywords
 */
export function classifyWithKeywords(question: string, dataset: Dataset): Intent {
  const category = classifyByKeywords(question);
  return {
    category,
    columns: resolveColumns(question, dataset),
    operations: extractOperations(question),
    ...(category === 'visualization' ? { chartKind: detectChartKind(question) } : {}),
  };
}

// ---------------------------------------------------------------------------
// Oracle
// ---------------------------------------------------------------------------

export interface OraclePrompt {
  system: string;
  user: string;
}

/**
 * External classifier transport; the OpenAI-backed client lives in ../openai.ts
 */
export interface OracleClient {
  complete(prompt: OraclePrompt): Promise<string | null>;
}

// Category names the model sometimes answers with instead of ours
const CATEGORY_ALIASES = new Map<string, IntentCategory>([
  ['summary_statistics', 'summary'],
  ['statistics', 'summary'],
  ['filtered_query', 'filter'],
  ['chart', 'visualization'],
]);

const oracleConditionSchema = z.object({
  column: z.string(),
  operator: z.preprocess((v) => (v === '==' ? '=' : v), conditionOperatorSchema),
  value: z.union([z.string(), z.number(), z.boolean()]),
});

/**
 * Oracle Intent Schema
 * Structured output expected from the external classifier
 */
export const oracleIntentSchema = z.object({
  type: z.preprocess(
    (v) => (typeof v === 'string' ? CATEGORY_ALIASES.get(v.toLowerCase()) ?? v.toLowerCase() : v),
    intentCategorySchema
  ),
  columns: z.array(z.string()).optional(),
  operations: z.array(z.string()).optional(),
  conditions: z.array(oracleConditionSchema).optional(),
  chart_type: z.string().optional(),
});

export type OracleIntent = z.infer<typeof oracleIntentSchema>;

/**
 * Recursively remove null values (zod rejects null for optional fields)
 */
export function removeNulls(value: unknown): unknown {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (Array.isArray(value)) {
    return value.map(removeNulls).filter((item) => item !== undefined);
  }
  if (typeof value === 'object') {
    const cleaned: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      const cleanedEntry = removeNulls(entry);
      if (cleanedEntry !== undefined) {
        cleaned[key] = cleanedEntry;
      }
    }
    return cleaned;
  }
  return value;
}

export function buildOraclePrompt(question: string, dataset: Dataset): OraclePrompt {
  const columnInfo = formatColumnContext(buildColumnContext(dataset));

  const system = `You are a data analysis assistant. Classify the user's question about a dataset.

DATASET COLUMNS:
${columnInfo}

QUERY TYPES:
1. summary: averages, sums, counts, minimum, maximum, median, standard deviation
2. filter: rows matching a condition (e.g. "customers under 30")
3. visualization: charts, graphs, plots
4. comparison: comparing groups or categories
5. correlation: relationships between variables
6. general: anything else about the data

OUTPUT FORMAT (JSON only, no markdown):
{
  "type": "summary" | "filter" | "visualization" | "comparison" | "correlation" | "general",
  "columns": ["normalized_column_name"] | null,
  "operations": ["average" | "sum" | "count" | "min" | "max" | "median" | "std"] | null,
  "conditions": [{"column": "normalized_column_name", "operator": "<" | "<=" | ">" | ">=" | "=" | "!=", "value": 30}] | null,
  "chart_type": "bar" | "histogram" | "line" | "scatter" | "pie" | "box" | null
}

Use the normalized column names listed above.`;

  return { system, user: question };
}

function parseOracleContent(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch (parseError) {
    // Some models wrap the object in a markdown code block
    const jsonMatch = content.match(/```(?:json)?\s*(\{[\s\S]*\})\s*```/);
    if (jsonMatch) {
      return JSON.parse(jsonMatch[1]);
    }
    throw parseError;
  }
}

function toChartKind(value: string | undefined): ChartKind | undefined {
  if (!value) return undefined;
  const parsed = chartKindSchema.safeParse(value.toLowerCase().replace(/\s*(chart|plot|graph)$/, '').trim());
  return parsed.success ? parsed.data : undefined;
}

/**
 * Map validated oracle output onto the dataset: unknown columns are dropped, empty fields
 * fall back to what the question text itself yields.
 */
export function intentFromOracle(output: OracleIntent, question: string, dataset: Dataset): Intent {
  const columns = new Set<string>();
  for (const name of output.columns ?? []) {
    const match = findMatchingColumn(name, dataset);
    if (match) columns.add(match);
  }

  const operations = new Set<string>();
  for (const op of output.operations ?? []) {
    extractOperations(op).forEach((canonical) => operations.add(canonical));
  }

  const conditions: FilterCondition[] = [];
  for (const condition of output.conditions ?? []) {
    const match = findMatchingColumn(condition.column, dataset);
    if (match) conditions.push({ ...condition, column: match });
  }

  const chartKind =
    output.type === 'visualization' ? toChartKind(output.chart_type) ?? detectChartKind(question) : toChartKind(output.chart_type);

  return {
    category: output.type,
    columns: columns.size > 0 ? columns : resolveColumns(question, dataset),
    operations: operations.size > 0 ? operations : extractOperations(question),
    ...(chartKind ? { chartKind } : {}),
    ...(conditions.length > 0 ? { conditions } : {}),
  };
}

/**
 * Single attempt at the external classifier. Any failure becomes ClassifierUnavailableError.
 */
export async function classifyWithOracle(question: string, dataset: Dataset, client: OracleClient): Promise<Intent> {
  let content: string | null;
  try {
    content = await client.complete(buildOraclePrompt(question, dataset));
  } catch (error) {
    throw new ClassifierUnavailableError(`Oracle request failed: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!content) {
    throw new ClassifierUnavailableError('Empty response from oracle');
  }

  let parsed: unknown;
  try {
    parsed = parseOracleContent(content);
  } catch {
    throw new ClassifierUnavailableError('Oracle response is not valid JSON');
  }

  const validated = oracleIntentSchema.safeParse(removeNulls(parsed));
  if (!validated.success) {
    throw new ClassifierUnavailableError(`Malformed oracle output: ${validated.error.errors[0]?.message ?? 'invalid'}`);
  }

  return intentFromOracle(validated.data, question, dataset);
}

export interface ClassificationResult {
  intent: Intent;
  source: IntentSource;
  // The oracle was configured but could not be used for this question
  degraded: boolean;
}

/**
 * Classify a question, preferring the oracle when one is configured and falling back to keywords
 */
export async function classifyIntent(
  question: string,
  dataset: Dataset,
  oracle: OracleClient | null
): Promise<ClassificationResult> {
  if (oracle) {
    try {
      const intent = await classifyWithOracle(question, dataset, oracle);
      console.log(`✅ Intent classified by oracle: ${intent.category}`);
      return { intent, source: 'oracle', degraded: false };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`⚠️ Oracle classification failed, using keyword classifier: ${message}`);
      return { intent: classifyWithKeywords(question, dataset), source: 'keyword', degraded: true };
    }
  }

  const intent = classifyWithKeywords(question, dataset);
  console.log(`✅ Intent classified by keywords: ${intent.category}`);
  return { intent, source: 'keyword', degraded: false };
}
