/**
 * Chat Controller
 * Answers one question against the session's dataset
 */
import type { Request, Response } from 'express';
import { chatRequestSchema, type ChatResponse } from '../../shared/schema.js';
import { getInitializedOrchestrator } from '../lib/agents/index.js';
import { getOracleClient } from '../lib/openai.js';
import { storage } from '../storage.js';
import { sendError, sendNotFound, sendSuccess, sendValidationError } from '../utils/responseFormatter.js';

export const chatWithSession = async (req: Request, res: Response) => {
  try {
    const parsed = chatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      console.log('❌ Invalid chat request');
      return sendValidationError(res, parsed.error.errors[0]?.message ?? 'Invalid request');
    }

    const { sessionId, message } = parsed.data;
    const session = storage.getSession(sessionId);
    if (!session) {
      return sendNotFound(res, 'Session not found');
    }

    const { notice, ...result } = await getInitializedOrchestrator().processQuery(message, session.dataset, {
      oracle: getOracleClient(),
      degradedNoticeShown: session.degradedNoticeShown,
    });
    // Another request in this session may have shown the notice while this one was classifying
    const showNotice = notice !== undefined && storage.markDegradedNoticeShown(sessionId);

    const response: ChatResponse = { sessionId, ...result, ...(showNotice ? { notice } : {}) };
    sendSuccess(res, response);
    console.log(`✅ Response sent: ${result.response.kind}`);
  } catch (error) {
    console.error('❌ Chat error:', error);
    sendError(res, error instanceof Error ? error : 'Failed to process message');
  }
};
