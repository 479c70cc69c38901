/**
 * Update Orchestrator — Runs Every Source, Isolates Every Failure
 * Layer: Application
 * Pattern: Facade (over adapters + data lake)
 *
 * One adapter run walks a small state machine:
 *
 *   Pending → FreshnessCheck → Skipped
 *                            → Running → Succeeded | Failed
 *
 * FreshnessCheck skips a source whose `listing` manifest is younger than the
 * freshness window unless the caller forces the run. Running is bounded by
 * the run timeout. An empty parse result is a Failed run with type `NoData`
 * and nothing is written, so a flaky upstream cannot wipe yesterday's good
 * dataset.
 *
 * `updateOne()` never throws: whatever goes wrong inside it comes back as a
 * FailedRun. That is what lets `updateAll()` fan out with a plain
 * `Promise.all` and still report every source.
 *
 * Runs are single-flight per collection. The cron run, `POST /admin/update`
 * and `updateByName` can all ask for the same source at once; a second
 * caller joins the run in flight and gets its result, whatever `force` it
 * passed.
 *
 * Reads (`getCollection`, `getAll`, `getCombined`) re-validate stored items
 * against the FundRecord schema and drop the ones that no longer fit.
 */
import { inject, injectable } from 'tsyringe';

import { TOKENS } from '@core/types';
import type { Logger } from '@core/logger';
import type { SerializationFormat } from '@domain/entities/DatasetManifest';
import { type FundRecord, fundRecordSchema } from '@domain/entities/FundRecord';
import type { IDataSourceAdapter, ParseResult } from '@domain/interfaces/IDataSourceAdapter';
import type { IDatasetStore } from '@domain/interfaces/IDatasetStore';
import { LISTING_KIND } from '@shared/constants';
import { errorDetail, NotFoundError, TransportError } from '@shared/errors/AppError';
import type {
  CollectionInventory,
  CollectionState,
  FailedRun,
  RunError,
  RunResult,
  UpdateSummary,
} from '@shared/types';

/** Reported for an adapter whose `identity()` throws. */
const UNKNOWN_COLLECTION = '(unknown)';

export interface OrchestratorOptions {
  freshnessWindowMs: number;
  runTimeoutMs: number;
  format: SerializationFormat;
  /** Clock for freshness checks and summary timestamps; tests pin it. */
  now?: () => Date;
}

@injectable()
export class UpdateOrchestrator {
  private readonly now: () => Date;
  private readonly inFlight = new Map<string, Promise<RunResult>>();

  constructor(
    @inject(TOKENS.DatasetStore) private readonly store: IDatasetStore,
    @inject(TOKENS.AdapterRegistry) private readonly adapters: IDataSourceAdapter[],
    @inject(TOKENS.Logger) private readonly log: Logger,
    @inject(TOKENS.OrchestratorOptions) private readonly options: OrchestratorOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  collections(): string[] {
    return this.adapters.map((adapter) => adapter.identity());
  }

  /** True iff the dataset was saved less than `withinMs` ago. Never throws. */
  async isFresh(collection: string, kind: string, withinMs: number): Promise<boolean> {
    try {
      const manifest = await this.store.manifest(collection, kind);
      if (!manifest) return false;
      const age = this.now().getTime() - Date.parse(manifest.updatedAt);
      return age < withinMs;
    } catch (err) {
      this.log.warn({ collection, kind, err }, 'Freshness check failed; treating dataset as stale');
      return false;
    }
  }

  async updateOne(adapter: IDataSourceAdapter, force = false): Promise<RunResult> {
    let collection: string;
    try {
      collection = adapter.identity();
    } catch (err) {
      this.log.error({ err }, 'Adapter identity failed');
      return this.failed(UNKNOWN_COLLECTION, 0, errorDetail(err));
    }

    const key = collection.trim().toLowerCase();
    const inFlight = this.inFlight.get(key);
    if (inFlight) {
      this.log.info({ collection }, 'Update already in flight; joining it');
      return inFlight;
    }

    const run = this.runUpdate(adapter, collection, force).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, run);
    return run;
  }

  private async runUpdate(
    adapter: IDataSourceAdapter,
    collection: string,
    force: boolean,
  ): Promise<RunResult> {
    const startedAt = performance.now();
    const elapsed = (): number => Math.round(performance.now() - startedAt);

    if (!force && (await this.isFresh(collection, LISTING_KIND, this.options.freshnessWindowMs))) {
      this.log.info({ collection }, 'Dataset is fresh; skipping update');
      return {
        collection,
        status: 'skipped',
        reason: `Updated within the last ${this.windowLabel()}`,
        count: 0,
      };
    }

    try {
      this.log.info({ collection, force }, 'Running adapter');
      const result = await this.runWithTimeout(adapter, collection);

      if (result.records.length === 0) {
        this.log.warn(
          { collection, dropped: result.dropped, warnings: result.warnings },
          'Adapter returned no records; keeping the existing dataset',
        );
        return this.failed(collection, elapsed(), {
          type: 'NoData',
          message: 'Adapter returned no records; existing dataset left untouched',
        });
      }

      const manifest = await this.store.save(
        collection,
        LISTING_KIND,
        result.records,
        this.options.format,
      );

      this.log.info(
        {
          collection,
          count: result.records.length,
          dropped: result.dropped,
          chunked: manifest.chunked,
          totalBytes: manifest.totalBytes,
        },
        'Dataset updated',
      );
      if (result.warnings.length > 0) {
        this.log.warn({ collection, warnings: result.warnings }, 'Adapter reported warnings');
      }

      return {
        collection,
        status: 'succeeded',
        count: result.records.length,
        dropped: result.dropped,
        warnings: result.warnings,
        manifest,
        durationMs: elapsed(),
      };
    } catch (err) {
      this.log.error({ collection, err }, 'Update failed');
      return this.failed(collection, elapsed(), errorDetail(err));
    }
  }

  async updateAll(force = false): Promise<UpdateSummary> {
    const results = await Promise.all(
      this.adapters.map((adapter) => this.updateOne(adapter, force)),
    );
    const summary = this.summarize(results);

    this.log.info(
      {
        totalCollections: summary.totalCollections,
        succeeded: summary.succeeded,
        skipped: summary.skipped,
        failed: summary.failed,
        totalRecords: summary.totalRecords,
      },
      'Update run finished',
    );
    return summary;
  }

  async updateByName(name: string, force = false): Promise<RunResult> {
    return this.updateOne(this.findAdapter(name), force);
  }

  /** Stored records of one collection; `[]` when it was never written. */
  async getCollection(collection: string): Promise<FundRecord[]> {
    const items = await this.store.load(collection, LISTING_KIND);
    const records: FundRecord[] = [];
    let invalid = 0;

    for (const item of items) {
      const parsed = fundRecordSchema.safeParse(item);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        invalid++;
      }
    }

    if (invalid > 0) {
      this.log.warn({ collection, invalid }, 'Dropped stored items that fail the record schema');
    }
    return records;
  }

  async getAll(): Promise<Record<string, FundRecord[]>> {
    const names = this.collections();
    const lists = await Promise.all(names.map((name) => this.getCollection(name)));
    return Object.fromEntries(names.map((name, index) => [name, lists[index]]));
  }

  async getCombined(): Promise<FundRecord[]> {
    const all = await this.getAll();
    return Object.values(all).flat();
  }

  async inventory(): Promise<CollectionInventory> {
    const names = this.collections();
    const [registered, stored] = await Promise.all([
      Promise.all(names.map((name) => this.collectionState(name))),
      this.store.listCollections(),
    ]);
    const known = new Set(names.map((name) => name.trim().toLowerCase()));

    return { registered, unregistered: stored.filter((name) => !known.has(name)) };
  }

  private async collectionState(collection: string): Promise<CollectionState> {
    const manifest = await this.store.manifest(collection, LISTING_KIND);
    if (!manifest) {
      return { collection, updatedAt: null, recordCount: 0, chunked: false, fresh: false };
    }

    const age = this.now().getTime() - Date.parse(manifest.updatedAt);
    return {
      collection,
      updatedAt: manifest.updatedAt,
      recordCount: manifest.recordCount,
      chunked: manifest.chunked,
      fresh: age < this.options.freshnessWindowMs,
    };
  }

  private findAdapter(name: string): IDataSourceAdapter {
    const wanted = name.trim().toLowerCase();
    const adapter = this.adapters.find((candidate) => candidate.identity().toLowerCase() === wanted);
    if (!adapter) throw new NotFoundError('Collection', name);
    return adapter;
  }

  private async runWithTimeout(adapter: IDataSourceAdapter, collection: string): Promise<ParseResult> {
    const timeoutMs = this.options.runTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TransportError(`${collection} did not finish within ${timeoutMs}ms`));
      }, timeoutMs);
    });
    const work = (async () => adapter.run())();

    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private failed(collection: string, durationMs: number, error: RunError): FailedRun {
    return { collection, status: 'failed', error, count: 0, durationMs };
  }

  private summarize(results: RunResult[]): UpdateSummary {
    const count = (status: RunResult['status']): number =>
      results.filter((result) => result.status === status).length;

    return {
      timestamp: this.now().toISOString(),
      totalCollections: results.length,
      succeeded: count('succeeded'),
      skipped: count('skipped'),
      failed: count('failed'),
      totalRecords: results.reduce((sum, result) => sum + result.count, 0),
      results,
    };
  }

  private windowLabel(): string {
    const hours = this.options.freshnessWindowMs / 3_600_000;
    return Number.isInteger(hours) ? `${hours}h` : `${this.options.freshnessWindowMs}ms`;
  }
}
