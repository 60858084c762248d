import type { Express } from 'express';
import uploadRoutes from './upload.js';
import sessionRoutes from './sessions.js';
import chatRoutes from './chat.js';

export function registerRoutes(app: Express): void {
  app.use('/api', uploadRoutes);
  app.use('/api', sessionRoutes);
  app.use('/api', chatRoutes);
}
