/**
 * Refresh state machine vocabulary
 */

import { ArrayClient } from '../array/session';
import { DatabaseEngine } from '../database/handle';
import { RefreshError, RefreshErrorKind } from '../lib/errors';
import { RemoteExecutor } from '../remote/executor';
import { HostDisk, StorageVolume } from '../types';

export const REFRESH_STATES = [
  'INIT',
  'ARRAY_CONNECTED',
  'TARGETS_RESOLVED',
  'DEST_DB_OFFLINE',
  'DEST_DISK_OFFLINE',
  'VOLUME_OVERWRITTEN',
  'DEST_DISK_ONLINE',
  'DEST_DB_ONLINE',
  'ABORTING',
  'ABORTED',
] as const;

export type RefreshState = (typeof REFRESH_STATES)[number];

export type RefreshStepName =
  | 'validate_request'
  | 'connect_array'
  | 'resolve_destination'
  | 'resolve_source'
  | 'offline_database'
  | 'offline_disk'
  | 'overwrite_volume'
  | 'online_disk'
  | 'online_database';

export const STEP_LABELS: Record<RefreshStepName, string> = {
  validate_request: 'Step 0 (validate request)',
  connect_array: 'Step 1 (connect to array)',
  resolve_destination: 'Step 2 (resolve destination)',
  resolve_source: 'Step 3 (resolve source)',
  offline_database: 'Step 4 (take destination database offline)',
  offline_disk: 'Step 5 (take destination disk offline)',
  overwrite_volume: 'Step 6 (overwrite destination volume)',
  online_disk: 'Step 7 (bring destination disk online)',
  online_database: 'Step 8 (bring destination database online)',
};

export type RefreshEventType =
  | 'connecting'
  | 'resolving'
  | 'offlining'
  | 'overwriting'
  | 'onlining'
  | 'compensating'
  | 'completed'
  | 'failed';

export interface RefreshEvent {
  type: RefreshEventType;
  state: RefreshState;
  step?: RefreshStepName;
  timestamp: string;
  message: string;
  durationMs?: number;
}

export type RefreshEventListener = (event: RefreshEvent) => void;

export type CompensationAction = 'disk_online' | 'database_online';

export interface CompensationRecord {
  action: CompensationAction;
  outcome: 'succeeded' | 'failed' | 'skipped';
  error?: RefreshError;
}

export interface RefreshFailure {
  step: RefreshStepName;
  kind: RefreshErrorKind;
  message: string;
  error: RefreshError;
}

/**
 * What the operation left behind on the destination:
 * - unchanged: failed before anything was mutated
 * - restored: failed, compensation brought disk and database back
 * - refreshed: the destination now carries the source's data
 * - unsafe: offline or half-restored, needs an operator
 */
export const DESTINATION_OUTCOMES = ['unchanged', 'restored', 'refreshed', 'unsafe'] as const;

export type DestinationOutcome = (typeof DESTINATION_OUTCOMES)[number];

export type RefreshSeverity = 'info' | 'error' | 'critical';

export interface ResolvedSide {
  instance: string;
  databaseName: string;
  primaryFilePath: string;
  hostName: string;
  disk: HostDisk;
  volume: StorageVolume;
}

export interface RefreshReport {
  status: 'succeeded' | 'failed';
  severity: RefreshSeverity;
  dryRun: boolean;
  finalState: RefreshState;
  states: RefreshState[];
  events: RefreshEvent[];
  destinationOutcome: DestinationOutcome;
  failure?: RefreshFailure;
  compensations: CompensationRecord[];
  destination?: ResolvedSide;
  source?: ResolvedSide;
  timings: {
    startedAt: string;
    totalMs: number;
    overwriteMs?: number;
  };
}

export interface OrchestratorDependencies {
  arrayClient: ArrayClient;
  databaseEngine: DatabaseEngine;
  executor: RemoteExecutor;
  now?: () => number;
}

export interface OrchestratorSettings {
  stepTimeoutMs: number;
  overwriteTimeoutMs: number;
}

export interface RunOptions {
  // Honoured until the destination database is taken offline
  signal?: AbortSignal;
  // Resolve both sides and stop before the first mutation
  dryRun?: boolean;
  onEvent?: RefreshEventListener;
}
