/**
 * Dividend Simulator — "What Would This Fund Have Paid Me?"
 * Layer: Application
 *
 * Looks a ticker up across every collection (first collection in registry
 * order wins) and projects distributions from the fund's current yield:
 *
 *   shares   = investment / NAV
 *   annual   = investment × yield / 100
 *   monthly  = annual / 12
 *   total    = monthly × holdingPeriodMonths
 *
 * All of it is exact fraction arithmetic (see shared/decimal.ts); each
 * figure is rounded to cents only when it is reported, so `total` is built
 * from the unrounded monthly amount.
 */
import { inject, injectable } from 'tsyringe';

import { UpdateOrchestrator } from '@application/services/UpdateOrchestrator';
import { TOKENS } from '@core/types';
import type { FundRecord } from '@domain/entities/FundRecord';
import {
  divide,
  fromInteger,
  isPositive,
  multiply,
  parseDecimal,
  toFixedDecimal,
} from '@shared/decimal';
import { NotFoundError, ValidationError } from '@shared/errors/AppError';
import type { DividendSimulation, DividendSimulationInput } from '@shared/types';

const HUNDRED = fromInteger(100);
const MONTHS_PER_YEAR = fromInteger(12);

@injectable()
export class DividendSimulator {
  constructor(
    @inject(TOKENS.UpdateOrchestrator) private readonly orchestrator: UpdateOrchestrator,
  ) {}

  async findFund(ticker: string): Promise<{ collection: string; record: FundRecord } | null> {
    const wanted = ticker.trim().toUpperCase();
    const all = await this.orchestrator.getAll();

    for (const [collection, records] of Object.entries(all)) {
      const record = records.find((candidate) => candidate.ticker === wanted);
      if (record) return { collection, record };
    }
    return null;
  }

  async simulate(input: DividendSimulationInput): Promise<DividendSimulation> {
    const found = await this.findFund(input.ticker);
    if (!found) throw new NotFoundError('Fund', input.ticker);

    const { collection, record } = found;
    const { distributionYield, navAmount } = record;
    if (distributionYield === null || !isPositive(parseDecimal(distributionYield))) {
      throw new ValidationError(`Fund ${record.ticker} has no distribution yield`);
    }
    if (navAmount === null || !isPositive(parseDecimal(navAmount))) {
      throw new ValidationError(`Fund ${record.ticker} has no NAV`);
    }

    const investment = parseDecimal(input.investmentAmount);
    const shares = divide(investment, parseDecimal(navAmount));
    const annual = divide(multiply(investment, parseDecimal(distributionYield)), HUNDRED);
    const monthly = divide(annual, MONTHS_PER_YEAR);
    const total = multiply(monthly, fromInteger(input.holdingPeriodMonths));

    return {
      ticker: record.ticker,
      fundName: record.fundName,
      collection,
      investmentAmount: input.investmentAmount,
      currentPrice: navAmount,
      distributionYield,
      sharesPurchased: toFixedDecimal(shares),
      annualDividendEstimate: toFixedDecimal(annual),
      monthlyDividendEstimate: toFixedDecimal(monthly),
      holdingPeriodMonths: input.holdingPeriodMonths,
      totalDividendEstimate: toFixedDecimal(total),
    };
  }
}
