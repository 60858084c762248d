import { Router } from 'express';
import {
  deleteSessionEndpoint,
  getSessionDetailsEndpoint,
  searchSessionEndpoint,
  suggestColumnsEndpoint,
} from '../controllers/sessionController.js';

const router = Router();

// Dataset summary, column metadata and sample rows
router.get('/sessions/:sessionId', getSessionDetailsEndpoint);

// Columns whose values contain ?term=
router.get('/sessions/:sessionId/search', searchSessionEndpoint);

// Columns whose name contains one of ?keywords=a,b
router.get('/sessions/:sessionId/columns', suggestColumnsEndpoint);

router.delete('/sessions/:sessionId', deleteSessionEndpoint);

export default router;
