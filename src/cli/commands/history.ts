/**
 * History command - show recent refresh runs
 */

import { runService } from '../../state/run-service';
import { RefreshRun } from '../../state/types';
import { formatDuration, formatTimestamp } from '../../lib/utils';

export function formatRun(run: RefreshRun): string {
  const outcome = run.destinationOutcome ? ` (${run.destinationOutcome})` : '';
  const mode = run.dryRun ? ' [dry run]' : '';
  const duration = run.totalMs !== undefined ? ` ${formatDuration(run.totalMs)}` : '';
  const failure = run.failedStep ? ` at ${run.failedStep}` : '';

  return `${formatTimestamp(run.startedAt)}  ${run.runId}  ${run.databaseName}: ${run.sourceInstance} -> ${run.destinationInstance}  ${run.status}${outcome}${failure}${duration}${mode}`;
}

export async function showHistory(limit: number): Promise<void> {
  const runs = runService.getRecent(limit);
  const stats = runService.getStats();

  console.log('\n=== Volume Refresh History ===\n');

  if (runs.length === 0) {
    console.log('No refresh runs recorded yet');
  }
  for (const run of runs) {
    console.log(formatRun(run));
    if (run.errorMessage) {
      console.log(`    ${run.errorMessage}`);
    }
  }

  console.log(`\nTotal: ${stats.total}  Succeeded: ${stats.succeeded}  Failed: ${stats.failed}  Unsafe: ${stats.unsafe}`);

  const running = runService.getRunning();
  if (running.length > 0) {
    console.log(`\n${running.length} run(s) never finished; check their destinations:`);
    for (const run of running) {
      console.log(`  ${run.runId} ${run.databaseName} on ${run.destinationInstance}`);
    }
  }
}
