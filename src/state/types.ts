/**
 * Run history records
 * One row per refresh invocation; passwords are never stored
 */

import { DestinationOutcome, RefreshState, RefreshStepName } from '../orchestrator/types';

export const RUN_STATUSES = ['running', 'succeeded', 'failed'] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

export interface RefreshRun {
  runId: string;
  databaseName: string;
  sourceInstance: string;
  destinationInstance: string;
  arrayEndpoint: string;
  dryRun: boolean;
  startedAt: number;
  completedAt?: number;
  status: RunStatus;
  finalState?: RefreshState;
  destinationOutcome?: DestinationOutcome;
  failedStep?: RefreshStepName;
  errorMessage?: string;
  overwriteMs?: number;
  totalMs?: number;
}

export interface RunStats {
  total: number;
  succeeded: number;
  failed: number;
  unsafe: number;
}
