import type { ResponseEnvelope } from '../../../../shared/schema.js';
import { buildChartSpec } from '../../chartGenerator.js';
import { UnresolvedQueryError, UnsupportedChartError } from '../../errors.js';
import { detectChartKind, type Intent } from '../intentClassifier.js';
import { BaseHandler, type HandlerContext } from './baseHandler.js';

/**
 * Visualization Handler
 * Chart spec for the resolved columns; kind from the intent, else from the question's wording
 */
export class VisualizationHandler extends BaseHandler {
  readonly category = 'visualization' as const;

  protected handle(intent: Intent, context: HandlerContext): ResponseEnvelope {
    const columns = this.resolvedColumns(intent, context);
    if (columns.length === 0) {
      throw new UnresolvedQueryError(
        "I couldn't identify which columns to visualize. Please specify the data you want to see."
      );
    }

    const kind = intent.chartKind ?? detectChartKind(context.question);
    const chart = buildChartSpec(
      context.dataset,
      columns.map((c) => c.normalizedName),
      kind
    );
    if (!chart) {
      throw new UnsupportedChartError(
        `I couldn't create a ${kind} chart with the specified data. Please try a different visualization request.`
      );
    }

    return { kind: 'chart', chart };
  }
}
