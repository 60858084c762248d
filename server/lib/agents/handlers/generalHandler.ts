import type { ResponseEnvelope } from '../../../../shared/schema.js';
import { getColumnInfo, getSummaryStatistics } from '../../metadataService.js';
import type { Intent } from '../intentClassifier.js';
import { getFallbackSuggestions } from '../utils/errorRecovery.js';
import { BaseHandler, type HandlerContext } from './baseHandler.js';

export const MAX_GENERAL_COLUMNS = 5;

/**
 * General Handler
 * Column metadata for named columns, otherwise a dataset overview with example questions
 */
export class GeneralHandler extends BaseHandler {
  readonly category = 'general' as const;

  protected handle(intent: Intent, context: HandlerContext): ResponseEnvelope {
    const { dataset } = context;
    const columns = this.resolvedColumns(intent, context).slice(0, MAX_GENERAL_COLUMNS);

    if (columns.length > 0) {
      const wanted = new Set(columns.map((c) => c.normalizedName));
      const info = getColumnInfo(dataset).filter((c) => wanted.has(c.normalizedName));
      return {
        kind: 'composite',
        text: `Here is what I found about ${info.map((c) => c.name).join(', ')}.`,
        table: {
          columns: ['Column', 'Type', 'Non-null', 'Unique'],
          rows: info.map((c) => ({
            Column: c.name,
            Type: c.type,
            'Non-null': c.nonNullCount,
            Unique: c.uniqueValues,
          })),
        },
      };
    }

    const summary = getSummaryStatistics(dataset);
    const lines = [
      `Your dataset has ${summary.rowCount} rows and ${summary.columnCount} columns ` +
        `(${summary.numericColumns} numeric, ${summary.categoricalColumns} categorical, ` +
        `${summary.binaryColumns} binary, ${summary.datetimeColumns} datetime).`,
      '',
      `Columns: ${dataset.columns.map((c) => c.originalName).join(', ')}`,
      '',
      'You can ask questions like:',
      ...getFallbackSuggestions(dataset).map((s) => `- ${s}`),
    ];
    return { kind: 'text', text: lines.join('\n') };
  }
}
