/**
 * Fund Controller — Read Side of the Data Lake
 * Layer: Interfaces (HTTP)
 *
 * Thin: validate path params, ask the orchestrator, send JSON. Collection
 * names go to the store as given; the store sanitizes them, so
 * `/funds/iShares` and `/funds/ishares` read the same dataset and
 * `/funds/..%2Fetc` is a 400 from InvalidNameError.
 */
import { DividendSimulator } from '@application/services/DividendSimulator';
import { UpdateOrchestrator } from '@application/services/UpdateOrchestrator';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { elapsedMs } from '@interfaces/http/middleware/requestTimer';
import {
  collectionParamsSchema,
  dividendSimulationSchema,
  parseInput,
} from '@interfaces/http/middleware/validation';
import { NotFoundError } from '@shared/errors/AppError';
import type { Request, Response } from 'express';

export class FundController {
  private orchestrator: UpdateOrchestrator;
  private simulator: DividendSimulator;

  constructor() {
    this.orchestrator = container.resolve<UpdateOrchestrator>(TOKENS.UpdateOrchestrator);
    this.simulator = container.resolve<DividendSimulator>(TOKENS.DividendSimulator);
  }

  listByCollection = async (req: Request, res: Response): Promise<void> => {
    const all = await this.orchestrator.getAll();
    const total = Object.values(all).reduce((sum, records) => sum + records.length, 0);

    res.status(200).json({
      status: 'success',
      data: all,
      meta: { collections: Object.keys(all).length, total, totalTimeMs: elapsedMs(req) },
    });
  };

  listCombined = async (req: Request, res: Response): Promise<void> => {
    const records = await this.orchestrator.getCombined();

    res.status(200).json({
      status: 'success',
      data: records,
      meta: { total: records.length, totalTimeMs: elapsedMs(req) },
    });
  };

  getCollection = async (req: Request, res: Response): Promise<void> => {
    const { collection } = parseInput(collectionParamsSchema, req.params);
    const records = await this.orchestrator.getCollection(collection);

    if (records.length === 0) {
      throw new NotFoundError('Collection', collection);
    }

    res.status(200).json({
      status: 'success',
      data: records,
      meta: { collection, total: records.length, totalTimeMs: elapsedMs(req) },
    });
  };

  simulateDividend = async (req: Request, res: Response): Promise<void> => {
    const input = parseInput(dividendSimulationSchema, req.body);
    const simulation = await this.simulator.simulate(input);

    res.status(200).json({
      status: 'success',
      data: simulation,
      meta: { totalTimeMs: elapsedMs(req) },
    });
  };
}
