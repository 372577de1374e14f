/**
 * Refresh command
 */

import { loadConfig, VolumeRefreshConfig } from '../../config';
import { FlashArrayClient } from '../../array/session';
import { MssqlDatabaseEngine } from '../../database/mssql-engine';
import { getSecrets, Secrets } from '../../lib/env';
import { describeCause } from '../../lib/errors';
import { logger } from '../../lib/logger';
import { RefreshOrchestrator } from '../../orchestrator';
import { OrchestratorDependencies } from '../../orchestrator/types';
import { PowerShellRemoteExecutor } from '../../remote/executor';
import { closeDatabase, initDatabase } from '../../state/database';
import { runService } from '../../state/run-service';
import { RefreshRequest } from '../../types';
import { exitCodeFor, formatReport } from '../report';

export interface RefreshOptions {
  database: string;
  source: string;
  destination: string;
  array: string;
  arrayUser: string;
  allowUntrustedCert?: boolean;
  dryRun?: boolean;
  config?: string;
}

export function buildRequest(options: RefreshOptions, secrets: Secrets): RefreshRequest {
  if (!secrets.arrayPassword) {
    throw new Error('ARRAY_PASSWORD is not set');
  }
  return {
    databaseName: options.database,
    sourceInstance: options.source,
    destinationInstance: options.destination,
    arrayEndpoint: options.array,
    arrayCredentials: { username: options.arrayUser, password: secrets.arrayPassword },
  };
}

export function applyOverrides(config: VolumeRefreshConfig, options: RefreshOptions): VolumeRefreshConfig {
  if (!options.allowUntrustedCert) {
    return config;
  }
  return { ...config, array: { ...config.array, allowUntrustedCertificate: true } };
}

export type RefreshCollaborators = Omit<OrchestratorDependencies, 'now'>;

export type CollaboratorFactory = (config: VolumeRefreshConfig, secrets: Secrets) => RefreshCollaborators;

export const createCollaborators: CollaboratorFactory = (config, secrets) => ({
  arrayClient: new FlashArrayClient(config.array),
  databaseEngine: new MssqlDatabaseEngine(config.database, secrets),
  executor: new PowerShellRemoteExecutor(config.remote),
});

export async function runRefresh(
  options: RefreshOptions,
  collaborators: CollaboratorFactory = createCollaborators
): Promise<number> {
  const config = applyOverrides(loadConfig(options.config), options);
  const secrets = getSecrets();
  const request = buildRequest(options, secrets);
  const dryRun = options.dryRun === true;

  logger.info('Starting refresh', {
    database: request.databaseName,
    source: request.sourceInstance,
    destination: request.destinationInstance,
    array: request.arrayEndpoint,
    dryRun,
  });

  const deps = collaborators(config, secrets);
  const orchestrator = new RefreshOrchestrator(deps, config.orchestration);

  // History is bookkeeping: losing it never changes what the refresh did or reports
  const runId = config.history.enabled ? await startHistory(request, dryRun) : undefined;

  // Ctrl-C only stops the refresh before the destination is touched
  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn('Interrupt received; stopping if the destination has not been taken offline yet');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  try {
    const report = await orchestrator.run(request, { dryRun, signal: controller.signal }).catch((error: unknown) => {
      if (runId) recordHistory('failure', () => runService.fail(runId, describeCause(error)));
      throw error;
    });
    if (runId) recordHistory('result', () => runService.finish(runId, report));

    for (const line of formatReport(report)) {
      console.log(line);
    }
    return exitCodeFor(report);
  } finally {
    process.off('SIGINT', onSigint);
    await deps.databaseEngine.close();
    if (runId) recordHistory('close', closeDatabase);
  }
}

async function startHistory(request: RefreshRequest, dryRun: boolean): Promise<string | undefined> {
  try {
    await initDatabase();
    return runService.start(request, dryRun).runId;
  } catch (error) {
    logger.warn('Run history unavailable; refreshing without it', { error: describeCause(error) });
    recordHistory('close', closeDatabase);
    return undefined;
  }
}

function recordHistory(what: string, write: () => void): void {
  try {
    write();
  } catch (error) {
    logger.warn(`Could not record run ${what} in history`, { error: describeCause(error) });
  }
}
