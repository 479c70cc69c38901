/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * I keep result shapes here so no single layer owns them. RunResult is what
 * one adapter run ends in (the orchestrator never throws; it returns one of
 * these), UpdateSummary is the aggregate the scheduler, the admin endpoint
 * and the update script all report, and SchedulerStatus is what the admin
 * status endpoint returns.
 */
import type { DatasetManifest } from '@domain/entities/DatasetManifest';

/** Type + message of the error that ended a run. */
export interface RunError {
  type: string;
  message: string;
}

export type RunStatus = 'skipped' | 'succeeded' | 'failed';

export interface SkippedRun {
  collection: string;
  status: 'skipped';
  reason: string;
  count: 0;
}

export interface SucceededRun {
  collection: string;
  status: 'succeeded';
  count: number;
  dropped: number;
  warnings: string[];
  manifest: DatasetManifest;
  durationMs: number;
}

export interface FailedRun {
  collection: string;
  status: 'failed';
  error: RunError;
  count: 0;
  durationMs: number;
}

export type RunResult = SkippedRun | SucceededRun | FailedRun;

export interface UpdateSummary {
  timestamp: string;
  totalCollections: number;
  succeeded: number;
  skipped: number;
  failed: number;
  totalRecords: number;
  results: RunResult[];
}

export interface SchedulerStatus {
  running: boolean;
  /** True while an update (scheduled or run-now) is in flight. */
  updating: boolean;
  nextRun: string | null;
  timezone: string | null;
  scheduledTime: string | null;
  lastRun: { at: string; summary: UpdateSummary | null; error: RunError | null } | null;
}

/** Stored state of one registered collection's listing dataset. */
export interface CollectionState {
  collection: string;
  updatedAt: string | null;
  recordCount: number;
  chunked: boolean;
  fresh: boolean;
}

/**
 * Registered collections with their dataset state, plus directories under the
 * data root that no registered adapter writes any more.
 */
export interface CollectionInventory {
  registered: CollectionState[];
  unregistered: string[];
}

export interface DividendSimulationInput {
  ticker: string;
  /** Positive decimal string, e.g. "10000" or "2500.50". */
  investmentAmount: string;
  holdingPeriodMonths: number;
}

/** Every amount is a decimal string rounded to cents, half to even. */
export interface DividendSimulation {
  ticker: string;
  fundName: string;
  collection: string;
  investmentAmount: string;
  currentPrice: string;
  distributionYield: string;
  sharesPurchased: string;
  annualDividendEstimate: string;
  monthlyDividendEstimate: string;
  holdingPeriodMonths: number;
  totalDividendEstimate: string;
}
