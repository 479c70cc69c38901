/**
 * Fund Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1/funds`:
 *
 *   GET /api/v1/funds               →  { [collection]: FundRecord[] }
 *   GET /api/v1/funds/all           →  every collection, flattened
 *   GET /api/v1/funds/:collection   →  one collection
 *   POST /api/v1/funds/simulate-dividend
 *        { ticker, investmentAmount, holdingPeriodMonths }  →  DividendSimulation
 *
 * `/all` is registered before `/:collection` so it is not read as a name.
 */
import { Router } from 'express';
import { FundController } from '@interfaces/http/controllers/FundController';

const router = Router();
const controller = new FundController();

router.get('/', controller.listByCollection);
router.get('/all', controller.listCombined);
router.get('/:collection', controller.getCollection);
router.post('/simulate-dividend', controller.simulateDividend);

export { router as fundRoutes };
