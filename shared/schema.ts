import { z } from "zod";

// Column types
export const columnTypeSchema = z.enum(["numeric", "datetime", "binary", "categorical"]);

export type ColumnType = z.infer<typeof columnTypeSchema>;

// Table cells as they travel to the rendering layer (datetimes as ISO strings)
export const cellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export type CellValue = z.infer<typeof cellValueSchema>;

export const tableDataSchema = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.record(cellValueSchema)),
  totalRows: z.number().optional(), // full row count when rows were truncated for display
});

export type TableData = z.infer<typeof tableDataSchema>;

// Chart Specifications
export const chartKindSchema = z.enum(["bar", "histogram", "line", "scatter", "pie", "box"]);

export type ChartKind = z.infer<typeof chartKindSchema>;

export const chartSpecSchema = z.object({
  type: z.enum(["bar", "histogram", "line", "scatter", "pie", "box", "heatmap"]),
  title: z.string(),
  x: z.string(),
  y: z.string().optional(),
  // Optional third column used to colour scatter points
  color: z.string().optional(),
  xLabel: z.string().optional(),
  yLabel: z.string().optional(),
  aggregate: z.enum(["count", "mean", "bins", "none"]).optional(),
  data: z.array(z.record(cellValueSchema)),
});

export type ChartSpec = z.infer<typeof chartSpecSchema>;

// Response envelope handed to the rendering layer
export const responseEnvelopeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("text"), text: z.string() }),
  z.object({ kind: z.literal("table"), table: tableDataSchema }),
  z.object({ kind: z.literal("chart"), chart: chartSpecSchema }),
  z.object({
    kind: z.literal("composite"),
    text: z.string().optional(),
    table: tableDataSchema.optional(),
    chart: chartSpecSchema.optional(),
  }),
  z.object({ kind: z.literal("error"), error: z.string() }),
]);

export type ResponseEnvelope = z.infer<typeof responseEnvelopeSchema>;

// Query intent
export const intentCategorySchema = z.enum([
  "summary",
  "filter",
  "visualization",
  "comparison",
  "correlation",
  "general",
]);

export type IntentCategory = z.infer<typeof intentCategorySchema>;

export const conditionOperatorSchema = z.enum(["<", "<=", ">", ">=", "=", "!="]);

export type ConditionOperator = z.infer<typeof conditionOperatorSchema>;

export const filterConditionSchema = z.object({
  column: z.string(),
  operator: conditionOperatorSchema,
  value: z.union([z.string(), z.number(), z.boolean()]),
});

export type FilterCondition = z.infer<typeof filterConditionSchema>;

// Column metadata
export const columnInfoSchema = z.object({
  name: z.string(), // original display name
  normalizedName: z.string(),
  type: columnTypeSchema,
  nonNullCount: z.number(),
  nullCount: z.number(),
  uniqueValues: z.number(),
  min: cellValueSchema.optional(),
  max: cellValueSchema.optional(),
  mean: z.number().nullable().optional(),
  mostCommon: cellValueSchema.optional(),
});

export type ColumnInfo = z.infer<typeof columnInfoSchema>;

// Data Summary
export const dataSummarySchema = z.object({
  rowCount: z.number(),
  columnCount: z.number(),
  numericColumns: z.number(),
  categoricalColumns: z.number(),
  binaryColumns: z.number(),
  datetimeColumns: z.number(),
  missingValues: z.number(),
});

export type DataSummary = z.infer<typeof dataSummarySchema>;

// API Request/Response Types
export const uploadResponseSchema = z.object({
  sessionId: z.string(),
  fileName: z.string(),
  summary: dataSummarySchema,
  columns: z.array(columnInfoSchema),
  sampleRows: z.array(z.record(cellValueSchema)),
});

export type UploadResponse = z.infer<typeof uploadResponseSchema>;

export const chatRequestSchema = z.object({
  sessionId: z.string().min(1),
  message: z.string().trim().min(1).max(2000),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export const intentSourceSchema = z.enum(["oracle", "keyword"]);

export type IntentSource = z.infer<typeof intentSourceSchema>;

export const chatResponseSchema = z.object({
  sessionId: z.string(),
  category: intentCategorySchema,
  source: intentSourceSchema,
  response: responseEnvelopeSchema,
  notice: z.string().optional(),
});

export type ChatResponse = z.infer<typeof chatResponseSchema>;
