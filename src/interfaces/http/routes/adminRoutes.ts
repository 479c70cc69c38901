/**
 * Admin Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1/admin`:
 *
 *   POST /update[?force=true]               →  update every collection
 *   POST /update/:collection[?force=true]   →  update one collection
 *   GET  /collections                       →  dataset state per collection
 *   GET  /scheduler                         →  scheduler status
 *   POST /scheduler/run-now                 →  202, update in background
 */
import { AdminController } from '@interfaces/http/controllers/AdminController';
import { Router } from 'express';

const router = Router();
const controller = new AdminController();

router.post('/update', controller.updateAll);
router.post('/update/:collection', controller.updateOne);
router.get('/collections', controller.collections);
router.get('/scheduler', controller.schedulerStatus);
router.post('/scheduler/run-now', controller.runNow);

export { router as adminRoutes };
