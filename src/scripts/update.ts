/**
 * Manual Update CLI
 * Layer: Entry Point (CLI, not HTTP)
 *
 *   npm run update -- [--force] [--provider <name>]
 *
 * Runs the same orchestrator the scheduler and the admin endpoints use,
 * through the same container, then prints one line per collection. Without
 * --force, collections updated inside the freshness window are skipped.
 * Exits 1 when any collection failed.
 */
import { UpdateOrchestrator } from '@application/services/UpdateOrchestrator';
import { config } from '@core/config';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { UpdateSummary } from '@shared/types';

import { formatRun, formatSummary, parseUpdateArgs } from './updateCli';

async function main(): Promise<void> {
  // eslint-disable-next-line no-console
  const log = console.log;
  const args = parseUpdateArgs(process.argv.slice(2));
  const orchestrator = container.resolve<UpdateOrchestrator>(TOKENS.UpdateOrchestrator);

  log('');
  log('  Fundlake: manual update');
  log(`  Data dir:   ${config.store.dataDir}`);
  log(`  Format:     ${config.store.format}`);
  log(`  Force:      ${args.force ? 'yes' : 'no'}`);
  log(`  Provider:   ${args.provider ?? 'all'}`);
  log('');

  if (args.provider) {
    const result = await orchestrator.updateByName(args.provider, args.force);
    log(`  ${formatRun(result)}`);
    log('');
    if (result.status === 'failed') process.exitCode = 1;
    return;
  }

  const summary: UpdateSummary = await orchestrator.updateAll(args.force);
  for (const line of formatSummary(summary)) log(line ? `  ${line}` : '');
  log('');
  if (summary.failed > 0) process.exitCode = 1;
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Update failed:', err);
  process.exit(1);
});
