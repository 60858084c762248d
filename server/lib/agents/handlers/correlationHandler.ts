import type { CellValue, ResponseEnvelope } from '../../../../shared/schema.js';
import { buildHeatmapSpec } from '../../chartGenerator.js';
import { columnsOfType, type Column } from '../../datasetLoader.js';
import { formatNumber } from '../../dataTransform.js';
import { InsufficientColumnsError } from '../../errors.js';
import { pearsonCorrelation, round2 } from '../../statisticalSummary.js';
import type { Intent } from '../intentClassifier.js';
import { BaseHandler, type HandlerContext } from './baseHandler.js';

/**
 * Pairwise Pearson matrix over pairwise-complete rows; null where undefined (constant column, < 2 rows)
 */
export function correlationMatrix(columns: readonly Column[]): Array<Array<number | null>> {
  return columns.map((a) => columns.map((b) => pearsonCorrelation(a.values, b.values)));
}

/**
 * Matrix table, heatmap and the strongest off-diagonal pair.
 * Shared by correlation questions and two-numeric comparisons.
 */
export function buildCorrelationResponse(columns: readonly Column[]): ResponseEnvelope {
  const names = columns.map((c) => c.originalName);
  const matrix = correlationMatrix(columns);

  const rows = names.map((rowName, r) => {
    const row: Record<string, CellValue> = { Column: rowName };
    names.forEach((name, c) => {
      const value = matrix[r][c];
      row[name] = value === null ? null : round2(value);
    });
    return row;
  });

  let strongest: { a: string; b: string; value: number } | null = null;
  for (let r = 0; r < names.length; r++) {
    for (let c = r + 1; c < names.length; c++) {
      const value = matrix[r][c];
      if (value !== null && (strongest === null || Math.abs(value) > Math.abs(strongest.value))) {
        strongest = { a: names[r], b: names[c], value };
      }
    }
  }

  let text = `Correlation matrix for ${names.length} numeric columns.`;
  if (strongest) {
    text += ` Strongest relationship: ${strongest.a} and ${strongest.b} (${formatNumber(strongest.value)}).`;
  }

  return {
    kind: 'composite',
    text,
    table: { columns: ['Column', ...names], rows },
    chart: buildHeatmapSpec(names, matrix),
  };
}

/**
 * Correlation Handler
 * Always covers every numeric column in the dataset, whatever the question names
 */
export class CorrelationHandler extends BaseHandler {
  readonly category = 'correlation' as const;

  protected handle(_intent: Intent, context: HandlerContext): ResponseEnvelope {
    const numeric = columnsOfType(context.dataset, 'numeric');
    console.log(`📈 CorrelationHandler: ${numeric.length} numeric columns`);

    if (numeric.length < 2) {
      throw new InsufficientColumnsError('I need at least two numeric columns to calculate correlations.');
    }
    return buildCorrelationResponse(numeric);
  }
}
