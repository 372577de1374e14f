/**
 * Run service - track refresh invocations
 */

import * as crypto from 'crypto';
import { getDatabase, DatabaseWrapper, Row } from './database';
import { RUN_STATUSES, RefreshRun, RunStats } from './types';
import {
  DESTINATION_OUTCOMES,
  REFRESH_STATES,
  RefreshReport,
  RefreshStepName,
  STEP_LABELS,
} from '../orchestrator/types';
import { RefreshRequest } from '../types';
import { logger } from '../lib/logger';

function generateRunId(): string {
  const timestamp = Date.now().toString(36);
  const random = crypto.randomBytes(4).toString('hex');
  return `run_${timestamp}_${random}`;
}

function text(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function integer(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[]): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

function isStep(value: unknown): value is RefreshStepName {
  return typeof value === 'string' && value in STEP_LABELS;
}

function rowToRun(row: Row): RefreshRun {
  return {
    runId: text(row.run_id) ?? '',
    databaseName: text(row.database_name) ?? '',
    sourceInstance: text(row.source_instance) ?? '',
    destinationInstance: text(row.destination_instance) ?? '',
    arrayEndpoint: text(row.array_endpoint) ?? '',
    dryRun: row.dry_run === 1,
    startedAt: integer(row.started_at) ?? 0,
    completedAt: integer(row.completed_at),
    status: oneOf(row.status, RUN_STATUSES) ?? 'running',
    finalState: oneOf(row.final_state, REFRESH_STATES),
    destinationOutcome: oneOf(row.destination_outcome, DESTINATION_OUTCOMES),
    failedStep: isStep(row.failed_step) ? row.failed_step : undefined,
    errorMessage: text(row.error_message),
    overwriteMs: integer(row.overwrite_ms),
    totalMs: integer(row.total_ms),
  };
}

export class RunService {
  private getDb(): DatabaseWrapper {
    return new DatabaseWrapper(getDatabase());
  }

  // Start a new run
  start(request: RefreshRequest, dryRun: boolean): RefreshRun {
    const run: RefreshRun = {
      runId: generateRunId(),
      databaseName: request.databaseName,
      sourceInstance: request.sourceInstance,
      destinationInstance: request.destinationInstance,
      arrayEndpoint: request.arrayEndpoint,
      dryRun,
      startedAt: Date.now(),
      status: 'running',
    };

    const stmt = this.getDb().prepare(`
      INSERT INTO refresh_runs (
        run_id, database_name, source_instance, destination_instance,
        array_endpoint, dry_run, started_at, status
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      run.runId,
      run.databaseName,
      run.sourceInstance,
      run.destinationInstance,
      run.arrayEndpoint,
      dryRun ? 1 : 0,
      run.startedAt,
      run.status
    );

    logger.setContext(undefined, run.runId);
    logger.info('Started refresh run', { runId: run.runId });

    return run;
  }

  // Close a run with the orchestrator's report
  finish(runId: string, report: RefreshReport): void {
    const stmt = this.getDb().prepare(`
      UPDATE refresh_runs SET
        completed_at = ?,
        status = ?,
        final_state = ?,
        destination_outcome = ?,
        failed_step = ?,
        error_message = ?,
        overwrite_ms = ?,
        total_ms = ?
      WHERE run_id = ?
    `);

    stmt.run(
      Date.now(),
      report.status,
      report.finalState,
      report.destinationOutcome,
      report.failure?.step,
      report.failure?.message,
      report.timings.overwriteMs,
      report.timings.totalMs,
      runId
    );
  }

  // The process died before the orchestrator produced a report
  fail(runId: string, errorMessage: string): void {
    const stmt = this.getDb().prepare(`
      UPDATE refresh_runs SET
        completed_at = ?,
        status = ?,
        error_message = ?
      WHERE run_id = ?
    `);

    stmt.run(Date.now(), 'failed', errorMessage, runId);
    logger.error('Run failed', { runId, errorMessage });
  }

  // Get run by ID
  getById(runId: string): RefreshRun | null {
    const row = this.getDb().prepare('SELECT * FROM refresh_runs WHERE run_id = ?').get(runId);
    return row ? rowToRun(row) : null;
  }

  // Get recent runs, newest first
  getRecent(limit: number = 20): RefreshRun[] {
    const rows = this.getDb()
      .prepare('SELECT * FROM refresh_runs ORDER BY started_at DESC, rowid DESC LIMIT ?')
      .all(limit);
    return rows.map(rowToRun);
  }

  // Runs still marked running (interrupted processes)
  getRunning(): RefreshRun[] {
    const rows = this.getDb().prepare('SELECT * FROM refresh_runs WHERE status = ?').all('running');
    return rows.map(rowToRun);
  }

  getStats(): RunStats {
    const row = this.getDb()
      .prepare(`
        SELECT
          COUNT(*) AS total,
          SUM(CASE WHEN status = 'succeeded' THEN 1 ELSE 0 END) AS succeeded,
          SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) AS failed,
          SUM(CASE WHEN destination_outcome = 'unsafe' THEN 1 ELSE 0 END) AS unsafe
        FROM refresh_runs
      `)
      .get();

    return {
      total: integer(row?.total) ?? 0,
      succeeded: integer(row?.succeeded) ?? 0,
      failed: integer(row?.failed) ?? 0,
      unsafe: integer(row?.unsafe) ?? 0,
    };
  }
}

export const runService = new RunService();
