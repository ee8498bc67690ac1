import { Router } from 'express';
import {
  clearDocuments,
  createDocument,
  debugSearch,
  deleteAlias,
  deleteDocument,
  getStats,
  listAliases,
  listChunks,
  listDocuments,
  upsertAlias,
} from '../controllers/adminController';
import { requireAdminToken } from '../middlewares/adminAuth';
import { asyncHandler } from '../middlewares/asyncHandler';

const adminRouter = Router();

adminRouter.use(requireAdminToken);

adminRouter.get('/docs', asyncHandler(listDocuments));
adminRouter.post('/docs', asyncHandler(createDocument));
adminRouter.delete('/docs', asyncHandler(clearDocuments));
adminRouter.delete('/docs/:id', asyncHandler(deleteDocument));
adminRouter.get('/chunks', asyncHandler(listChunks));
adminRouter.post('/search', asyncHandler(debugSearch));
adminRouter.get('/aliases', asyncHandler(listAliases));
adminRouter.post('/aliases', asyncHandler(upsertAlias));
adminRouter.delete('/aliases/:alias', asyncHandler(deleteAlias));
adminRouter.get('/stats', asyncHandler(getStats));

export { adminRouter };
