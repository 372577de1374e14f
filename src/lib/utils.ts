/**
 * Utility functions for Volume Refresh
 */

import { Outcome, TimeoutError, fail } from './errors';
import { logger } from './logger';

const EXPIRED: unique symbol = Symbol('expired');

function raceDeadline<T>(work: Promise<T>, timeoutMs: number): Promise<T | typeof EXPIRED> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<typeof EXPIRED>((resolve) => {
    timer = setTimeout(() => resolve(EXPIRED), timeoutMs);
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}

function timedOut(label: string, timeoutMs: number): Outcome<never> {
  return fail(new TimeoutError(`${label} did not finish within ${timeoutMs}ms`, timeoutMs));
}

/**
 * Bound a collaborator call. On expiry the call's signal is aborted and the
 * result waits until the call has actually stopped, so nothing acts on its
 * target while it may still be changing. A timeout of 0 waits forever.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<Outcome<T>>,
  timeoutMs: number,
  label: string
): Promise<Outcome<T>> {
  const controller = new AbortController();
  const pending = work(controller.signal);
  if (timeoutMs <= 0) {
    return pending;
  }

  const first = await raceDeadline(pending, timeoutMs);
  if (first !== EXPIRED) {
    return first;
  }

  logger.warn(`${label} timed out; waiting for the cancelled call to stop`, { timeoutMs });
  controller.abort();
  const late = await pending;
  logger.warn(`${label} stopped after cancellation`, { completed: late.ok });
  return timedOut(label, timeoutMs);
}

// For calls that cannot be cancelled: stop waiting and leave the call running
export async function abandonAfter<T>(
  work: Promise<Outcome<T>>,
  timeoutMs: number,
  label: string
): Promise<Outcome<T>> {
  if (timeoutMs <= 0) {
    return work;
  }
  const first = await raceDeadline(work, timeoutMs);
  return first === EXPIRED ? timedOut(label, timeoutMs) : first;
}

// Format a duration for display: 850ms, 12.4s, 3m 05s
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  return `${minutes}m ${seconds.toString().padStart(2, '0')}s`;
}

// Format date for display
export function formatTimestamp(timestamp: number): string {
  return new Date(timestamp).toISOString().replace('T', ' ').slice(0, 19);
}

// Quote a value as a PowerShell single-quoted literal
export function psLiteral(value: string | number | boolean): string {
  if (typeof value === 'boolean') {
    return value ? '$true' : '$false';
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return `'${value.replace(/'/g, "''")}'`;
}
