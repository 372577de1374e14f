/**
 * Disk Locator
 * Resolves the host disk behind a database's primary data file
 */

import { HostDisk } from '../types';
import { NotFoundError, Outcome, fail, ok } from '../lib/errors';
import { RemoteExecutor } from './executor';

const DRIVE_PATH = /^([A-Za-z]):[\\/]/;

// D:\Data\AppDb.mdf -> D
export function extractDriveLetter(filePath: string): string | null {
  const match = DRIVE_PATH.exec(filePath.trim());
  return match ? match[1].toUpperCase() : null;
}

/**
 * Must be given the physical host that owns the volume, not a cluster or
 * listener name; the partition lookup only sees local disks.
 */
export async function locateDiskForDatabase(
  executor: RemoteExecutor,
  hostName: string,
  primaryFilePath: string,
  signal?: AbortSignal
): Promise<Outcome<HostDisk>> {
  const driveLetter = extractDriveLetter(primaryFilePath);
  if (!driveLetter) {
    return fail(new NotFoundError(`Cannot derive a drive letter from data file path '${primaryFilePath}'`));
  }

  const result = await executor.run(hostName, 'getDiskForPath', { path: `${driveLetter}:\\` }, signal);
  if (!result.ok) {
    return result;
  }

  return ok({
    hostName,
    diskNumber: result.value.diskNumber,
    serialNumber: result.value.serialNumber,
  });
}
