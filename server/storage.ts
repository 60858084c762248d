import { randomUUID } from 'crypto';
import type { Dataset } from './lib/datasetLoader.js';

/**
 * One uploaded dataset and the conversation state around it
 */
export interface AnalysisSession {
  id: string;
  fileName: string;
  uploadedAt: Date;
  dataset: Dataset;
  degradedNoticeShown: boolean;
}

export interface IStorage {
  createSession(fileName: string, dataset: Dataset): AnalysisSession;
  getSession(sessionId: string): AnalysisSession | undefined;
  replaceDataset(sessionId: string, fileName: string, dataset: Dataset): AnalysisSession | undefined;
  /** True only for the call that first marks the session */
  markDegradedNoticeShown(sessionId: string): boolean;
  deleteSession(sessionId: string): boolean;
}

export class MemStorage implements IStorage {
  private sessions: Map<string, AnalysisSession>;

  constructor() {
    this.sessions = new Map();
  }

  createSession(fileName: string, dataset: Dataset): AnalysisSession {
    const session: AnalysisSession = {
      id: randomUUID(),
      fileName,
      uploadedAt: new Date(),
      dataset,
      degradedNoticeShown: false,
    };
    this.sessions.set(session.id, session);
    return session;
  }

  getSession(sessionId: string): AnalysisSession | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Swap in a dataset that is already fully loaded; the old session object is replaced whole
   */
  replaceDataset(sessionId: string, fileName: string, dataset: Dataset): AnalysisSession | undefined {
    const existing = this.sessions.get(sessionId);
    if (!existing) return undefined;

    const session: AnalysisSession = { ...existing, fileName, dataset, uploadedAt: new Date() };
    this.sessions.set(sessionId, session);
    return session;
  }

  markDegradedNoticeShown(sessionId: string): boolean {
    const existing = this.sessions.get(sessionId);
    if (!existing || existing.degradedNoticeShown) {
      return false;
    }
    this.sessions.set(sessionId, { ...existing, degradedNoticeShown: true });
    return true;
  }

  deleteSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }
}

export const storage = new MemStorage();
