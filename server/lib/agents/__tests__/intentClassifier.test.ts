import { describe, it, expect, vi } from 'vitest';
import { customerRecords, datasetFromRecords } from '../../__tests__/fixtures.js';
import { ClassifierUnavailableError } from '../../errors.js';
import {
  buildOraclePrompt,
  classifyByKeywords,
  classifyIntent,
  classifyWithKeywords,
  classifyWithOracle,
  detectChartKind,
  extractOperations,
  removeNulls,
  type OracleClient,
} from '../intentClassifier.js';

const customers = () => datasetFromRecords(customerRecords());

function oracleReturning(content: string | null): OracleClient {
  return { complete: vi.fn(async () => content) };
}

function failingOracle(message: string): OracleClient {
  return {
    complete: vi.fn(async () => {
      throw new Error(message);
    }),
  };
}

describe('classifyByKeywords', () => {
  it('checks categories in priority order', () => {
    expect(classifyByKeywords('What is the average price, show it as a chart')).toBe('summary');
    expect(classifyByKeywords('Show me a chart of sales')).toBe('visualization');
    expect(classifyByKeywords('customers under 30')).toBe('filter');
    expect(classifyByKeywords('Compare sales across regions')).toBe('comparison');
    expect(classifyByKeywords('Is price correlated with quantity?')).toBe('correlation');
  });

  it('falls through to general', () => {
    expect(classifyByKeywords('Hello there')).toBe('general');
  });

  it('matches keywords inside longer words', () => {
    expect(classifyByKeywords('Summarize the sales data')).toBe('summary');
    expect(classifyByKeywords('Plotting price over time')).toBe('visualization');
    expect(classifyByKeywords('Sales compared with profit')).toBe('comparison');
  });
});

describe('extractOperations', () => {
  it('maps wording to canonical operations', () => {
    expect(extractOperations('total and average revenue')).toEqual(new Set(['average', 'sum']));
    expect(extractOperations('lowest price')).toEqual(new Set(['min']));
    expect(extractOperations('how many orders')).toEqual(new Set(['count']));
    expect(extractOperations('tell me about price').size).toBe(0);
  });
});

describe('detectChartKind', () => {
  it('reads the chart kind from the wording, bar by default', () => {
    expect(detectChartKind('show the sales trends')).toBe('line');
    expect(detectChartKind('distribution of age')).toBe('histogram');
    expect(detectChartKind('a pie of regions')).toBe('pie');
    expect(detectChartKind('plot sales')).toBe('bar');
    expect(detectChartKind('boxplots of price')).toBe('box');
  });
});

describe('classifyWithKeywords', () => {
  it('resolves columns and a chart kind for visualization questions', () => {
    const intent = classifyWithKeywords('show me a pie chart of region', customers());
    expect(intent).toEqual({
      category: 'visualization',
      columns: new Set(['region']),
      operations: new Set(),
      chartKind: 'pie',
    });
  });

  it('leaves the chart kind out for other categories', () => {
    const intent = classifyWithKeywords('average age', customers());
    expect(intent.category).toBe('summary');
    expect(intent.chartKind).toBeUndefined();
    expect(intent.operations).toEqual(new Set(['average']));
  });
});

describe('removeNulls', () => {
  it('drops null values at every depth', () => {
    expect(removeNulls({ a: null, b: [1, null], c: { d: null } })).toEqual({ b: [1], c: {} });
  });
});

describe('buildOraclePrompt', () => {
  it('lists columns with their types, samples and ranges', () => {
    const prompt = buildOraclePrompt('who is young', customers());
    expect(prompt.user).toBe('who is young');
    expect(prompt.system).toContain('- age (original: "Age", type: numeric), range: 25 to 42');
    expect(prompt.system).toContain(
      '- region (original: "Region", type: categorical), sample values: North, South, East'
    );
  });
});

describe('classifyWithOracle', () => {
  it('maps validated output onto dataset columns', async () => {
    const oracle = oracleReturning(
      '{"type":"filter","columns":["Age"],"operations":null,"conditions":[{"column":"age","operator":"<","value":30}],"chart_type":null}'
    );

    await expect(classifyWithOracle('who is young', customers(), oracle)).resolves.toEqual({
      category: 'filter',
      columns: new Set(['age']),
      operations: new Set(),
      conditions: [{ column: 'age', operator: '<', value: 30 }],
    });
  });

  it('accepts category aliases, "==" and operation synonyms', async () => {
    const oracle = oracleReturning(
      '{"type":"summary_statistics","columns":["age"],"operations":["mean"],"conditions":[{"column":"Region","operator":"==","value":"North"}]}'
    );
    const intent = await classifyWithOracle('tell me something', customers(), oracle);

    expect(intent.category).toBe('summary');
    expect(intent.operations).toEqual(new Set(['average']));
    expect(intent.conditions).toEqual([{ column: 'region', operator: '=', value: 'North' }]);
  });

  it('falls back to the question text for unknown columns', async () => {
    const oracle = oracleReturning('{"type":"summary","columns":["Salary"]}');
    const intent = await classifyWithOracle('average age', customers(), oracle);
    expect(intent.columns).toEqual(new Set(['age']));
    expect(intent.operations).toEqual(new Set(['average']));
  });

  it('reads JSON wrapped in a markdown block and normalizes chart names', async () => {
    const oracle = oracleReturning('```json\n{"type":"visualization","columns":["region"],"chart_type":"pie chart"}\n```');
    const intent = await classifyWithOracle('draw something', customers(), oracle);
    expect(intent.category).toBe('visualization');
    expect(intent.chartKind).toBe('pie');
  });

  it('rejects unusable output with ClassifierUnavailableError', async () => {
    const dataset = customers();
    await expect(classifyWithOracle('q', dataset, oracleReturning('sure!'))).rejects.toBeInstanceOf(
      ClassifierUnavailableError
    );
    await expect(classifyWithOracle('q', dataset, oracleReturning('{"type":"forecast"}'))).rejects.toBeInstanceOf(
      ClassifierUnavailableError
    );
    await expect(classifyWithOracle('q', dataset, oracleReturning(null))).rejects.toBeInstanceOf(
      ClassifierUnavailableError
    );
    await expect(classifyWithOracle('q', dataset, failingOracle('timeout'))).rejects.toThrow(
      'Oracle request failed: timeout'
    );
  });
});

describe('classifyIntent', () => {
  it('uses keywords without an oracle and is not degraded', async () => {
    const result = await classifyIntent('customers under 30', customers(), null);
    expect(result.source).toBe('keyword');
    expect(result.degraded).toBe(false);
    expect(result.intent.category).toBe('filter');
  });

  it('prefers the oracle when it answers', async () => {
    const oracle = oracleReturning('{"type":"correlation"}');
    const result = await classifyIntent('customers under 30', customers(), oracle);

    expect(result.source).toBe('oracle');
    expect(result.intent.category).toBe('correlation');
    expect(oracle.complete).toHaveBeenCalledTimes(1);
  });

  it('falls back to keywords, flagged as degraded, when the oracle fails', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const result = await classifyIntent('customers under 30', customers(), failingOracle('503'));

    expect(result.source).toBe('keyword');
    expect(result.degraded).toBe(true);
    expect(result.intent).toEqual(classifyWithKeywords('customers under 30', customers()));
  });
});
