/**
 * Refresh Orchestrator
 * Sequences array, database and host into the offline -> overwrite -> online
 * protocol and decides what to undo when a step fails.
 *
 * Collaborators hand back Outcomes; this file is the only place that reads
 * them and chooses between continuing, compensating and giving up.
 */

import { ArraySession } from '../array/session';
import { DatabaseHandle } from '../database/handle';
import { CancelledError, InvalidRequestError, Outcome, RefreshError, ok } from '../lib/errors';
import { logger } from '../lib/logger';
import { abandonAfter, formatDuration, withTimeout } from '../lib/utils';
import { locateDiskForDatabase } from '../remote/disk-locator';
import { RefreshRequest, refreshRequestSchema } from '../types';
import { RefreshJournal } from './journal';
import {
  OrchestratorDependencies,
  OrchestratorSettings,
  RefreshReport,
  RefreshStepName,
  ResolvedSide,
  RunOptions,
} from './types';

type Side = 'destination' | 'source';

interface Target {
  handle: DatabaseHandle;
  side: ResolvedSide;
}

export class RefreshOrchestrator {
  private readonly deps: OrchestratorDependencies;
  private readonly settings: OrchestratorSettings;
  private readonly now: () => number;

  constructor(deps: OrchestratorDependencies, settings: OrchestratorSettings) {
    this.deps = deps;
    this.settings = settings;
    this.now = deps.now ?? Date.now;
  }

  async run(request: RefreshRequest, options: RunOptions = {}): Promise<RefreshReport> {
    const journal = new RefreshJournal(this.now, options.dryRun === true, options.onEvent);

    const parsed = refreshRequestSchema.safeParse(request);
    if (!parsed.success) {
      const reasons = parsed.error.issues.map((issue) => issue.message).join('; ');
      return journal.fail('validate_request', new InvalidRequestError(reasons, parsed.error), 'unchanged');
    }
    const valid = parsed.data;

    // Step 1
    const cancelled = this.checkCancelled(options.signal, 'connect_array');
    if (cancelled) return journal.fail('connect_array', cancelled, 'unchanged');

    journal.emit('connecting', `Connecting to array ${valid.arrayEndpoint}`, 'connect_array');
    const session = await this.bounded(
      (signal) => this.deps.arrayClient.connect(valid.arrayEndpoint, valid.arrayCredentials, signal),
      'Array authentication'
    );
    if (!session.ok) {
      return journal.fail('connect_array', session.error, 'unchanged');
    }
    journal.transition('ARRAY_CONNECTED');

    try {
      return await this.refreshWithSession(journal, session.value, valid, options);
    } finally {
      await session.value.disconnect();
    }
  }

  private async refreshWithSession(
    journal: RefreshJournal,
    session: ArraySession,
    request: RefreshRequest,
    options: RunOptions
  ): Promise<RefreshReport> {
    // Step 2
    let cancelled = this.checkCancelled(options.signal, 'resolve_destination');
    if (cancelled) return journal.fail('resolve_destination', cancelled, 'unchanged');

    const destination = await this.resolveTarget(journal, session, 'destination', request.destinationInstance, request.databaseName);
    if (!destination.ok) {
      return journal.fail('resolve_destination', destination.error, 'unchanged');
    }
    journal.destination = destination.value.side;

    // Step 3
    cancelled = this.checkCancelled(options.signal, 'resolve_source');
    if (cancelled) return journal.fail('resolve_source', cancelled, 'unchanged');

    const source = await this.resolveTarget(journal, session, 'source', request.sourceInstance, request.databaseName);
    if (!source.ok) {
      return journal.fail('resolve_source', source.error, 'unchanged');
    }
    journal.source = source.value.side;

    const dest = destination.value.side;
    const src = source.value.side;
    if (dest.volume.name === src.volume.name) {
      return journal.fail(
        'resolve_source',
        new InvalidRequestError(`Source and destination both resolve to array volume ${dest.volume.name}`),
        'unchanged'
      );
    }
    journal.transition('TARGETS_RESOLVED');

    if (journal.dryRun) {
      return journal.succeed(
        `Dry run: would overwrite ${dest.volume.name} (${dest.hostName} disk ${dest.disk.diskNumber}) from ${src.volume.name}`
      );
    }

    cancelled = this.checkCancelled(options.signal, 'offline_database');
    if (cancelled) return journal.fail('offline_database', cancelled, 'unchanged');

    const report = await this.replaceDestination(journal, session, destination.value.handle, dest, src);
    if (options.signal?.aborted) {
      logger.warn('Cancellation requested after the destination went offline; it was not honoured');
    }
    return report;
  }

  private async resolveTarget(
    journal: RefreshJournal,
    session: ArraySession,
    side: Side,
    instance: string,
    databaseName: string
  ): Promise<Outcome<Target>> {
    journal.emit('resolving', `Resolving ${side} [${databaseName}] on ${instance}`, side === 'destination' ? 'resolve_destination' : 'resolve_source');

    const handle = await this.bounded(
      (signal) => this.deps.databaseEngine.resolve(instance, databaseName, signal),
      `Resolving ${side} database`
    );
    if (!handle.ok) return handle;

    // Physical host, not the listener or cluster name the instance answers on
    const hostName = await this.bounded(
      (signal) => this.deps.databaseEngine.resolvePhysicalHostName(instance, signal),
      `Resolving ${side} physical host`
    );
    if (!hostName.ok) return hostName;

    const disk = await this.bounded(
      (signal) => locateDiskForDatabase(this.deps.executor, hostName.value, handle.value.primaryFilePath, signal),
      `Locating ${side} disk`
    );
    if (!disk.ok) return disk;

    const volume = await this.bounded(
      (signal) => session.resolveVolumeBySerial(disk.value.serialNumber, signal),
      `Resolving ${side} volume`
    );
    if (!volume.ok) return volume;

    logger.info(`Resolved ${side}`, {
      instance,
      hostName: hostName.value,
      primaryFilePath: handle.value.primaryFilePath,
      diskNumber: disk.value.diskNumber,
      serialNumber: disk.value.serialNumber,
      volume: volume.value.name,
    });

    return ok({
      handle: handle.value,
      side: {
        instance,
        databaseName,
        primaryFilePath: handle.value.primaryFilePath,
        hostName: hostName.value,
        disk: disk.value,
        volume: volume.value,
      },
    });
  }

  /**
   * Steps 4-8. From step 5 on, any failure before the overwrite is requested
   * puts disk and database back online before reporting. A timed-out step 4
   * may still have taken the database offline, so it is brought back too.
   */
  private async replaceDestination(
    journal: RefreshJournal,
    session: ArraySession,
    handle: DatabaseHandle,
    dest: ResolvedSide,
    src: ResolvedSide
  ): Promise<RefreshReport> {
    const { hostName, disk } = dest;

    // Step 4
    journal.emit('offlining', `Taking [${dest.databaseName}] offline on ${dest.instance}`, 'offline_database');
    const dbOffline = await this.bounded((signal) => handle.setOffline(signal), 'Database offline');
    if (!dbOffline.ok) {
      if (dbOffline.error.kind === 'timeout' && handle.resolvedStatus !== 'OFFLINE') {
        return this.compensateAndFail(journal, 'offline_database', dbOffline.error, handle, dest, false);
      }
      return journal.fail('offline_database', dbOffline.error, 'unchanged');
    }
    journal.transition('DEST_DB_OFFLINE');

    // Step 5
    journal.emit('offlining', `Taking disk ${disk.diskNumber} offline on ${hostName}`, 'offline_disk');
    const diskOffline = await this.bounded(
      (signal) =>
        this.deps.executor.run(hostName, 'setDiskOffline', { diskNumber: disk.diskNumber, offline: true }, signal),
      'Disk offline'
    );
    if (!diskOffline.ok) {
      return this.compensateAndFail(journal, 'offline_disk', diskOffline.error, handle, dest);
    }
    journal.transition('DEST_DISK_OFFLINE');

    // Step 6
    journal.emit('overwriting', `Overwriting ${dest.volume.name} from ${src.volume.name}`, 'overwrite_volume');
    const overwriteStarted = this.now();
    const overwrite = await abandonAfter(
      session.overwriteVolume(dest.volume.name, src.volume.name),
      this.settings.overwriteTimeoutMs,
      'Volume overwrite'
    );
    const overwriteMs = this.now() - overwriteStarted;
    journal.recordOverwrite(overwriteMs);
    if (!overwrite.ok) {
      // The array may still be copying; the disk stays offline until someone checks
      if (overwrite.error.kind === 'timeout') {
        return journal.fail('overwrite_volume', overwrite.error, 'unsafe');
      }
      return this.compensateAndFail(journal, 'overwrite_volume', overwrite.error, handle, dest);
    }
    journal.transition('VOLUME_OVERWRITTEN');
    journal.emit(
      'overwriting',
      `Overwrote ${dest.volume.name} in ${formatDuration(overwriteMs)}`,
      'overwrite_volume',
      overwriteMs
    );

    // Step 7: past this point there is nothing left to roll back to
    journal.emit('onlining', `Bringing disk ${disk.diskNumber} online on ${hostName}`, 'online_disk');
    const diskOnline = await this.bounded(
      (signal) =>
        this.deps.executor.run(hostName, 'setDiskOffline', { diskNumber: disk.diskNumber, offline: false }, signal),
      'Disk online'
    );
    if (!diskOnline.ok) {
      return journal.fail('online_disk', diskOnline.error, 'unsafe');
    }
    journal.transition('DEST_DISK_ONLINE');

    // Step 8
    journal.emit('onlining', `Bringing [${dest.databaseName}] online on ${dest.instance}`, 'online_database');
    const dbOnline = await this.bounded((signal) => handle.setOnline(signal), 'Database online');
    if (!dbOnline.ok) {
      return journal.fail('online_database', dbOnline.error, 'unsafe');
    }
    journal.transition('DEST_DB_ONLINE');

    return journal.succeed(`Refreshed [${dest.databaseName}] on ${dest.instance} from ${src.instance}`);
  }

  // Disk first, then database; a failed compensation is reported, never compensated
  private async compensateAndFail(
    journal: RefreshJournal,
    step: RefreshStepName,
    error: RefreshError,
    handle: DatabaseHandle,
    dest: ResolvedSide,
    restoreDisk = true
  ): Promise<RefreshReport> {
    journal.transition('ABORTING');

    if (restoreDisk) {
      journal.emit('compensating', `${step} failed; restoring disk and database on ${dest.hostName}`, step);
      const diskOnline = await this.bounded(
        (signal) =>
          this.deps.executor.run(
            dest.hostName,
            'setDiskOffline',
            { diskNumber: dest.disk.diskNumber, offline: false },
            signal
          ),
        'Compensating disk online'
      );
      if (!diskOnline.ok) {
        journal.recordCompensation({ action: 'disk_online', outcome: 'failed', error: diskOnline.error });
        journal.recordCompensation({ action: 'database_online', outcome: 'skipped' });
        return journal.fail(step, error, 'unsafe');
      }
      journal.recordCompensation({ action: 'disk_online', outcome: 'succeeded' });
    } else {
      journal.emit('compensating', `${step} failed; restoring [${dest.databaseName}] on ${dest.instance}`, step);
    }

    const dbOnline = await this.bounded((signal) => handle.setOnline(signal), 'Compensating database online');
    if (!dbOnline.ok) {
      journal.recordCompensation({ action: 'database_online', outcome: 'failed', error: dbOnline.error });
      return journal.fail(step, error, 'unsafe');
    }
    journal.recordCompensation({ action: 'database_online', outcome: 'succeeded' });

    return journal.fail(step, error, 'restored');
  }

  private bounded<T>(work: (signal: AbortSignal) => Promise<Outcome<T>>, label: string): Promise<Outcome<T>> {
    return withTimeout(work, this.settings.stepTimeoutMs, label);
  }

  private checkCancelled(signal: AbortSignal | undefined, step: RefreshStepName): RefreshError | null {
    if (!signal?.aborted) {
      return null;
    }
    return new CancelledError(`Refresh cancelled before ${step}`);
  }
}

