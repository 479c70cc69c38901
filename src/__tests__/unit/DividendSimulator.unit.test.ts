/**
 * Unit Tests — DividendSimulator
 *
 * Real orchestrator and store on a temp directory; records are saved
 * straight into the store, no adapter runs.
 */
import { DividendSimulator } from '@application/services/DividendSimulator';
import { UpdateOrchestrator } from '@application/services/UpdateOrchestrator';
import { ChunkedFileStore } from '@infrastructure/storage/ChunkedFileStore';
import { NotFoundError, ValidationError } from '@shared/errors/AppError';

import { sampleRecord } from '../helpers/fixtures';
import { succeedingAdapter } from '../helpers/stubAdapters';
import { makeTempDir, removeTempDir, silentLogger } from '../helpers/testEnv';

describe('DividendSimulator', () => {
  let root: string;
  let store: ChunkedFileStore;
  let simulator: DividendSimulator;

  beforeEach(async () => {
    root = await makeTempDir();
    store = new ChunkedFileStore({ rootDir: root, maxSegmentBytes: 4096, defaultFormat: 'json' });
    const orchestrator = new UpdateOrchestrator(
      store,
      [succeedingAdapter('Alpha', []), succeedingAdapter('Beta', [])],
      silentLogger,
      { freshnessWindowMs: 1000, runTimeoutMs: 1000, format: 'json' },
    );
    simulator = new DividendSimulator(orchestrator);

    await store.save('alpha', 'listing', [
      sampleRecord({ ticker: 'YLD', fundName: 'Alpha Income ETF', distributionYield: '3.50' }),
      sampleRecord({ ticker: 'ZERO', distributionYield: '0.00' }),
      sampleRecord({ ticker: 'NONAV', navAmount: null, distributionYield: '2.00' }),
    ]);
    await store.save('beta', 'listing', [
      sampleRecord({ ticker: 'YLD', fundName: 'Beta Income ETF', distributionYield: '9.00' }),
      sampleRecord({ ticker: 'BONLY', distributionYield: '1.00' }),
    ]);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('findFund()', () => {
    it('should match tickers case-insensitively and prefer the first collection', async () => {
      const found = await simulator.findFund(' yld ');

      expect(found?.collection).toBe('Alpha');
      expect(found?.record.fundName).toBe('Alpha Income ETF');
    });

    it('should look in later collections too', async () => {
      await expect(simulator.findFund('BONLY')).resolves.toMatchObject({ collection: 'Beta' });
    });

    it('should return null for an unknown ticker', async () => {
      await expect(simulator.findFund('ZZZZ')).resolves.toBeNull();
    });
  });

  describe('simulate()', () => {
    it('should project shares and dividends in exact cents', async () => {
      const result = await simulator.simulate({
        ticker: 'yld',
        investmentAmount: '10000',
        holdingPeriodMonths: 7,
      });

      expect(result).toEqual({
        ticker: 'YLD',
        fundName: 'Alpha Income ETF',
        collection: 'Alpha',
        investmentAmount: '10000',
        currentPrice: '25.10',
        distributionYield: '3.50',
        sharesPurchased: '398.41',
        annualDividendEstimate: '350.00',
        monthlyDividendEstimate: '29.17',
        holdingPeriodMonths: 7,
        totalDividendEstimate: '204.17',
      });
    });

    it('should total from the unrounded monthly amount', async () => {
      const result = await simulator.simulate({
        ticker: 'BONLY',
        investmentAmount: '1000',
        holdingPeriodMonths: 5,
      });

      expect(result.monthlyDividendEstimate).toBe('0.83');
      expect(result.totalDividendEstimate).toBe('4.17');
      expect(result.sharesPurchased).toBe('39.84');
    });

    it('should throw NotFoundError for an unknown ticker', async () => {
      const run = simulator.simulate({ ticker: 'ZZZZ', investmentAmount: '100', holdingPeriodMonths: 1 });

      await expect(run).rejects.toThrow(NotFoundError);
      await expect(run).rejects.toThrow('Fund not found: ZZZZ');
    });

    it('should reject a fund with a zero yield', async () => {
      const run = simulator.simulate({ ticker: 'ZERO', investmentAmount: '100', holdingPeriodMonths: 1 });

      await expect(run).rejects.toThrow(ValidationError);
      await expect(run).rejects.toThrow('Fund ZERO has no distribution yield');
    });

    it('should reject a fund without a NAV', async () => {
      await expect(
        simulator.simulate({ ticker: 'NONAV', investmentAmount: '100', holdingPeriodMonths: 1 }),
      ).rejects.toThrow('Fund NONAV has no NAV');
    });
  });
});
