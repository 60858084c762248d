import type { CellValue, ResponseEnvelope } from '../../../../shared/schema.js';
import { groupedBarSpec } from '../../chartGenerator.js';
import type { Column } from '../../datasetLoader.js';
import { InsufficientColumnsError } from '../../errors.js';
import { crossTabulate, groupedMean } from '../../statisticalSummary.js';
import type { Intent } from '../intentClassifier.js';
import { BaseHandler, type HandlerContext } from './baseHandler.js';
import { buildCorrelationResponse } from './correlationHandler.js';

function groupedMeanResponse(group: Column, value: Column): ResponseEnvelope {
  const meanHeader = `Average ${value.originalName}`;
  const rows = groupedMean(group.values, value.values).map(
    (entry): Record<string, CellValue> => ({
      [group.originalName]: entry.label,
      [meanHeader]: entry.mean,
      Count: entry.count,
    })
  );

  return {
    kind: 'composite',
    text: `${meanHeader} by ${group.originalName}`,
    table: { columns: [group.originalName, meanHeader, 'Count'], rows },
    chart: groupedBarSpec(group, value),
  };
}

function crossTabResponse(rowsColumn: Column, columnsColumn: Column): ResponseEnvelope {
  const tab = crossTabulate(rowsColumn.values, columnsColumn.values);
  const rows = tab.rowLabels.map((label, r) => {
    const row: Record<string, CellValue> = { [rowsColumn.originalName]: label };
    tab.columnLabels.forEach((columnLabel, c) => {
      row[columnLabel] = tab.counts[r][c];
    });
    return row;
  });

  return {
    kind: 'composite',
    text: `${rowsColumn.originalName} by ${columnsColumn.originalName}`,
    table: { columns: [rowsColumn.originalName, ...tab.columnLabels], rows },
    chart: groupedBarSpec(rowsColumn, columnsColumn),
  };
}

/**
 * Comparison Handler
 * Categorical + numeric: grouped mean/count. Numerics only: correlation matrix. Two categoricals: cross-tab.
 */
export class ComparisonHandler extends BaseHandler {
  readonly category = 'comparison' as const;

  protected handle(intent: Intent, context: HandlerContext): ResponseEnvelope {
    const columns = this.resolvedColumns(intent, context);
    if (columns.length < 2) {
      throw new InsufficientColumnsError(
        'I need at least two columns to make a comparison. Please specify what you want to compare.'
      );
    }

    const categorical = columns.filter((c) => c.type === 'categorical' || c.type === 'binary');
    const numeric = columns.filter((c) => c.type === 'numeric');
    console.log(`⚖️ ComparisonHandler: ${categorical.length} categorical, ${numeric.length} numeric`);

    if (categorical.length > 0 && numeric.length > 0) {
      return groupedMeanResponse(categorical[0], numeric[0]);
    }
    if (numeric.length >= 2) {
      return buildCorrelationResponse(numeric);
    }
    if (categorical.length >= 2) {
      return crossTabResponse(categorical[0], categorical[1]);
    }

    throw new InsufficientColumnsError("I couldn't create a comparison chart with the specified columns.");
  }
}
