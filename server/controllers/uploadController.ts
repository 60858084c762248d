/**
 * Upload Controller
 * Parses an uploaded spreadsheet into a dataset and stores it in a new or existing session
 */
import type { Request, Response } from 'express';
import { z } from 'zod';
import { loadDataset } from '../lib/datasetLoader.js';
import { SchemaError } from '../lib/errors.js';
import { parseFile } from '../lib/fileParser.js';
import { storage } from '../storage.js';
import { sendError, sendNotFound, sendSuccess, sendValidationError } from '../utils/responseFormatter.js';
import { toUploadResponse } from './sessionController.js';

const uploadBodySchema = z.object({
  sessionId: z.string().trim().min(1).optional(),
});

export const uploadFile = async (req: Request, res: Response) => {
  try {
    if (!req.file) {
      return sendValidationError(res, 'No file uploaded');
    }

    const body = uploadBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      return sendValidationError(res, 'Invalid sessionId');
    }
    const { sessionId } = body.data;
    if (sessionId && !storage.getSession(sessionId)) {
      return sendNotFound(res, 'Session not found');
    }

    console.log(`📤 Upload received: ${req.file.originalname} (${req.file.size} bytes)`);

    // Parse and load completely before touching the session
    const table = await parseFile(req.file.buffer, req.file.originalname);
    const dataset = loadDataset(table);

    const session = sessionId
      ? storage.replaceDataset(sessionId, req.file.originalname, dataset)
      : storage.createSession(req.file.originalname, dataset);
    if (!session) {
      return sendNotFound(res, 'Session not found');
    }

    console.log(`✅ Dataset loaded: ${dataset.rowCount} rows × ${dataset.columns.length} columns (session ${session.id})`);
    sendSuccess(res, toUploadResponse(session));
  } catch (error) {
    if (error instanceof SchemaError) {
      console.warn(`⚠️ Upload rejected: ${error.message}`);
      return sendValidationError(res, error);
    }
    console.error('❌ Upload error:', error);
    sendError(res, error instanceof Error ? error : 'Failed to process upload');
  }
};
