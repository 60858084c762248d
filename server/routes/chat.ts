import { Router } from 'express';
import { chatWithSession } from '../controllers/chatController.js';

const router = Router();

router.post('/chat', chatWithSession);

export default router;
