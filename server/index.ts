// Main server file
import express from 'express';
import { pathToFileURL } from 'url';
import { config, isOracleConfigured } from './config.js';
import { corsConfig } from './middleware/cors.js';
import { registerRoutes } from './routes/index.js';
import { getInitializedOrchestrator } from './lib/agents/index.js';

export function createApp(): express.Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false, limit: '1mb' }));

  // Handle preflight requests explicitly
  app.options('*', corsConfig);
  app.use(corsConfig);

  app.get('/api/health', (req, res) => {
    res.json({ status: 'OK' });
  });

  registerRoutes(app);
  getInitializedOrchestrator();

  return app;
}

// Start listening only when run directly, not when imported
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const app = createApp();
  app.listen(config.PORT, () => {
    console.log(`🚀 Server running on port ${config.PORT}`);
    console.log(
      isOracleConfigured(config)
        ? `🤖 Intent oracle: ${config.OPENAI_INTENT_MODEL}`
        : '🔤 Intent oracle not configured, using keyword classification'
    );
  });
}
