/**
 * Session Controller
 * Read, search and delete analysis sessions
 */
import type { Request, Response } from 'express';
import { z } from 'zod';
import type { UploadResponse } from '../../shared/schema.js';
import {
  getColumnInfo,
  getColumnSuggestions,
  getSampleRows,
  getSummaryStatistics,
  searchColumnsByContent,
} from '../lib/metadataService.js';
import { storage, type AnalysisSession } from '../storage.js';
import { sendNoContent, sendNotFound, sendSuccess, sendValidationError } from '../utils/responseFormatter.js';

const searchQuerySchema = z.object({
  term: z.string().trim().min(1, 'Search term is required'),
});

const suggestQuerySchema = z.object({
  keywords: z
    .string()
    .transform((value) => value.split(',').map((k) => k.trim()).filter(Boolean))
    .pipe(z.array(z.string()).min(1, 'At least one keyword is required')),
});

/**
 * Wire view of a session: counts, per-column metadata and the first rows by original name
 */
export function toUploadResponse(session: AnalysisSession): UploadResponse {
  return {
    sessionId: session.id,
    fileName: session.fileName,
    summary: getSummaryStatistics(session.dataset),
    columns: getColumnInfo(session.dataset),
    sampleRows: getSampleRows(session.dataset),
  };
}

export const getSessionDetailsEndpoint = (req: Request, res: Response) => {
  const session = storage.getSession(req.params.sessionId);
  if (!session) {
    return sendNotFound(res, 'Session not found');
  }
  sendSuccess(res, toUploadResponse(session));
};

export const searchSessionEndpoint = (req: Request, res: Response) => {
  const session = storage.getSession(req.params.sessionId);
  if (!session) {
    return sendNotFound(res, 'Session not found');
  }

  const parsed = searchQuerySchema.safeParse(req.query);
  if (!parsed.success) {
    return sendValidationError(res, parsed.error.errors[0]?.message ?? 'Invalid search term');
  }

  sendSuccess(res, { columns: searchColumnsByContent(session.dataset, parsed.data.term) });
};

export const suggestColumnsEndpoint = (req: Request, res: Response) => {
  const session = storage.getSession(req.params.sessionId);
  if (!session) {
    return sendNotFound(res, 'Session not found');
  }

  const parsed = suggestQuerySchema.safeParse(req.query);
  if (!parsed.success) {
    return sendValidationError(res, parsed.error.errors[0]?.message ?? 'Invalid keywords');
  }

  sendSuccess(res, { columns: getColumnSuggestions(session.dataset, parsed.data.keywords) });
};

export const deleteSessionEndpoint = (req: Request, res: Response) => {
  if (!storage.deleteSession(req.params.sessionId)) {
    return sendNotFound(res, 'Session not found');
  }
  console.log(`🗑️ Session deleted: ${req.params.sessionId}`);
  sendNoContent(res);
};
