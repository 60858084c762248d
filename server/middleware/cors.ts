/**
 * CORS Middleware Configuration
 * Handles cross-origin resource sharing for the API
 */
import cors from 'cors';
import { config } from '../config.js';

/**
 * Get allowed origins: local dev ports plus FRONTEND_URL
 */
export const getAllowedOrigins = (frontendUrl: string | undefined = config.FRONTEND_URL): string[] => {
  const origins: string[] = [
    'http://localhost:3000',
    'http://localhost:3001',
    'http://localhost:3002',
    'http://localhost:3003',
    'http://localhost:5173',
  ];

  if (frontendUrl) {
    origins.push(frontendUrl);
  }

  return origins;
};

/**
 * CORS configuration
 */
export const corsConfig = cors({
  origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
    // Allow requests with no origin (curl, server-to-server)
    if (!origin) {
      return callback(null, true);
    }

    if (getAllowedOrigins().includes(origin)) {
      return callback(null, true);
    }

    console.warn('⚠️ CORS blocked origin:', origin);
    callback(new Error('Not allowed by CORS'));
  },
  methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Accept', 'Origin', 'X-Requested-With'],
  exposedHeaders: ['Content-Length'],
  optionsSuccessStatus: 200,
  preflightContinue: false,
});
