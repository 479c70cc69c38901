/**
 * Admin Controller — HTTP Triggers for Updates and the Scheduler
 * Layer: Interfaces (HTTP)
 *
 * Update endpoints wait for the run and return its structured summary, even
 * when every adapter failed; only an unknown collection name is an HTTP
 * error. `run-now` does not wait: it answers 202 and the run continues in
 * the background on the scheduler.
 *
 * In production these routes belong behind admin authentication.
 */
import { UpdateOrchestrator } from '@application/services/UpdateOrchestrator';
import { UpdateScheduler } from '@application/services/UpdateScheduler';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import {
  collectionParamsSchema,
  forceQuerySchema,
  parseInput,
} from '@interfaces/http/middleware/validation';
import type { Request, Response } from 'express';

export class AdminController {
  private orchestrator: UpdateOrchestrator;
  private scheduler: UpdateScheduler;

  constructor() {
    this.orchestrator = container.resolve<UpdateOrchestrator>(TOKENS.UpdateOrchestrator);
    this.scheduler = container.resolve<UpdateScheduler>(TOKENS.UpdateScheduler);
  }

  updateAll = async (req: Request, res: Response): Promise<void> => {
    const { force } = parseInput(forceQuerySchema, req.query);
    const summary = await this.orchestrator.updateAll(force);
    res.status(200).json({ status: 'success', data: summary });
  };

  updateOne = async (req: Request, res: Response): Promise<void> => {
    const { collection } = parseInput(collectionParamsSchema, req.params);
    const { force } = parseInput(forceQuerySchema, req.query);
    const result = await this.orchestrator.updateByName(collection, force);
    res.status(200).json({ status: 'success', data: result });
  };

  collections = async (_req: Request, res: Response): Promise<void> => {
    const inventory = await this.orchestrator.inventory();
    res.status(200).json({ status: 'success', data: inventory });
  };

  schedulerStatus = (_req: Request, res: Response): void => {
    res.status(200).json({ status: 'success', data: this.scheduler.status() });
  };

  runNow = (_req: Request, res: Response): void => {
    const started = this.scheduler.runNow();
    res.status(202).json({
      status: 'accepted',
      data: {
        started,
        message: started ? 'Update started' : 'An update is already running',
      },
    });
  };
}
