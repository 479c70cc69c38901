export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = (ms / 1000).toFixed(1);
  if (ms < 60_000) return `${seconds}s`;
  const minutes = Math.floor(ms / 60_000);
  const remainingSec = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${remainingSec}s`;
}
