/**
 * Argument parsing and summary formatting for the update script, kept apart
 * from the script itself so they can be tested without running an update.
 */
import { formatDuration } from '@shared/format';
import type { RunResult, UpdateSummary } from '@shared/types';

export interface UpdateArgs {
  force: boolean;
  provider: string | null;
}

export function parseUpdateArgs(argv: readonly string[]): UpdateArgs {
  const idx = argv.indexOf('--provider');
  const value = idx !== -1 ? argv[idx + 1] : undefined;
  if (idx !== -1 && (value === undefined || value.startsWith('--'))) {
    throw new Error('--provider needs a collection name, e.g. --provider iShares');
  }

  return {
    force: argv.includes('--force'),
    provider: value ?? null,
  };
}

export function formatRun(result: RunResult): string {
  switch (result.status) {
    case 'succeeded': {
      const layout = result.manifest.chunked ? `${result.manifest.chunkCount} segments` : '1 segment';
      return `✓ ${result.collection}: ${result.count} records, ${result.dropped} dropped, ${layout} (${formatDuration(result.durationMs)})`;
    }
    case 'skipped':
      return `- ${result.collection}: skipped (${result.reason})`;
    case 'failed':
      return `✗ ${result.collection}: ${result.error.type}: ${result.error.message}`;
  }
}

export function formatSummary(summary: UpdateSummary): string[] {
  return [
    ...summary.results.map(formatRun),
    '',
    `${summary.succeeded} succeeded, ${summary.skipped} skipped, ${summary.failed} failed, ${summary.totalRecords} records`,
  ];
}
