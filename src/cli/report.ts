/**
 * Turns a refresh report into console lines and a process exit code
 */

import { RefreshReport, ResolvedSide } from '../orchestrator/types';
import { formatDuration } from '../lib/utils';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILED = 1;
export const EXIT_UNSAFE = 2;

export function exitCodeFor(report: RefreshReport): number {
  if (report.status === 'succeeded') return EXIT_SUCCESS;
  return report.destinationOutcome === 'unsafe' ? EXIT_UNSAFE : EXIT_FAILED;
}

function describeSide(label: string, side: ResolvedSide): string {
  return `${label}: [${side.databaseName}] on ${side.instance} -> ${side.hostName} disk ${side.disk.diskNumber} (${side.disk.serialNumber}) -> volume ${side.volume.name}`;
}

export function formatReport(report: RefreshReport): string[] {
  const lines: string[] = [];

  if (report.destination) lines.push(describeSide('Destination', report.destination));
  if (report.source) lines.push(describeSide('Source', report.source));

  if (report.status === 'succeeded') {
    lines.push(report.dryRun ? 'Dry run complete; nothing was changed' : 'Refresh succeeded');
  } else if (report.failure) {
    const prefix = report.severity === 'critical' ? 'CRITICAL: ' : '';
    lines.push(`${prefix}Refresh failed. ${report.failure.message}`);
  }

  for (const compensation of report.compensations) {
    const detail = compensation.error ? `: ${compensation.error.message}` : '';
    lines.push(`  compensation ${compensation.action} ${compensation.outcome}${detail}`);
  }

  if (report.destinationOutcome === 'unsafe') {
    lines.push('Destination is NOT usable; bring its disk and database online manually');
  }

  if (report.timings.overwriteMs !== undefined) {
    lines.push(`Overwrite: ${formatDuration(report.timings.overwriteMs)}`);
  }
  lines.push(`Total: ${formatDuration(report.timings.totalMs)}`);
  lines.push(`States: ${report.states.join(' -> ')}`);

  return lines;
}
