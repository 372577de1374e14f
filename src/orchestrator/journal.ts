/**
 * Records one refresh as it happens: state history, progress events,
 * compensations and timings, and turns them into the final report
 */

import { RefreshError } from '../lib/errors';
import { logger } from '../lib/logger';
import { formatDuration } from '../lib/utils';
import {
  CompensationRecord,
  DestinationOutcome,
  RefreshEvent,
  RefreshEventListener,
  RefreshEventType,
  RefreshReport,
  RefreshState,
  RefreshStepName,
  ResolvedSide,
  STEP_LABELS,
} from './types';

export class RefreshJournal {
  private readonly now: () => number;
  private readonly listener?: RefreshEventListener;
  private readonly startedAt: number;
  private readonly states: RefreshState[] = [];
  private readonly events: RefreshEvent[] = [];
  private readonly compensations: CompensationRecord[] = [];
  private current: RefreshState = 'INIT';
  private overwriteMs?: number;

  readonly dryRun: boolean;
  destination?: ResolvedSide;
  source?: ResolvedSide;

  constructor(now: () => number, dryRun: boolean, listener?: RefreshEventListener) {
    this.now = now;
    this.dryRun = dryRun;
    this.listener = listener;
    this.startedAt = now();
    this.states.push('INIT');
  }

  transition(state: RefreshState): void {
    this.current = state;
    this.states.push(state);
    logger.debug(`State -> ${state}`);
  }

  emit(type: RefreshEventType, message: string, step?: RefreshStepName, durationMs?: number): void {
    const event: RefreshEvent = {
      type,
      state: this.current,
      step,
      timestamp: new Date(this.now()).toISOString(),
      message,
    };
    if (durationMs !== undefined) {
      event.durationMs = durationMs;
    }
    this.events.push(event);
    logger.setStep(step);
    logger.info(message, durationMs !== undefined ? { durationMs } : undefined);

    if (this.listener) {
      try {
        this.listener(event);
      } catch (error) {
        logger.warn('Progress listener threw; continuing', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  recordCompensation(record: CompensationRecord): void {
    this.compensations.push(record);
  }

  recordOverwrite(durationMs: number): void {
    this.overwriteMs = durationMs;
  }

  elapsed(): number {
    return this.now() - this.startedAt;
  }

  succeed(message: string): RefreshReport {
    const totalMs = this.elapsed();
    this.emit('completed', `${message} in ${formatDuration(totalMs)}`, undefined, totalMs);
    return this.report('succeeded', 'info', this.dryRun ? 'unchanged' : 'refreshed', totalMs);
  }

  fail(step: RefreshStepName, error: RefreshError, outcome: DestinationOutcome): RefreshReport {
    if (this.current !== 'ABORTING') {
      this.transition('ABORTING');
    }
    this.transition('ABORTED');

    const message = `${STEP_LABELS[step]} failed: ${error.message}`;
    const totalMs = this.elapsed();
    const severity = outcome === 'unsafe' ? 'critical' : 'error';

    this.emit('failed', message, step, totalMs);
    if (severity === 'critical') {
      logger.critical('Destination left in an unsafe state; manual intervention required', {
        step,
        destination: this.destination?.databaseName,
        instance: this.destination?.instance,
        compensations: this.compensations.map((entry) => `${entry.action}:${entry.outcome}`),
      });
    } else {
      logger.error(message, { kind: error.kind, outcome });
    }

    return {
      ...this.report('failed', severity, outcome, totalMs),
      failure: { step, kind: error.kind, message, error },
    };
  }

  private report(
    status: RefreshReport['status'],
    severity: RefreshReport['severity'],
    destinationOutcome: DestinationOutcome,
    totalMs: number
  ): RefreshReport {
    const report: RefreshReport = {
      status,
      severity,
      dryRun: this.dryRun,
      finalState: this.current,
      states: [...this.states],
      events: [...this.events],
      destinationOutcome,
      compensations: [...this.compensations],
      destination: this.destination,
      source: this.source,
      timings: {
        startedAt: new Date(this.startedAt).toISOString(),
        totalMs,
      },
    };
    if (this.overwriteMs !== undefined) {
      report.timings.overwriteMs = this.overwriteMs;
    }
    return report;
  }
}
