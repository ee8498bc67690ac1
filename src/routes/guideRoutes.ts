import { Router } from 'express';
import { handleBotEvent } from '../controllers/botController';
import { ask } from '../controllers/guideController';
import { requireAdminToken } from '../middlewares/adminAuth';
import { asyncHandler } from '../middlewares/asyncHandler';

const guideRouter = Router();

guideRouter.post('/ask', requireAdminToken, asyncHandler(ask));

const botRouter = Router();

botRouter.post('/events', requireAdminToken, asyncHandler(handleBotEvent));

export { botRouter, guideRouter };
