/**
 * Storage Volume Resolver
 * Matches a host disk serial to exactly one array volume
 */

import { StorageVolume } from '../types';
import { NotFoundError, Outcome, fail, ok } from '../lib/errors';

// Hosts report the serial in lower or upper case depending on the driver
export function normalizeSerial(serial: string): string {
  return serial.trim().toUpperCase();
}

export function matchVolumeBySerial(volumes: readonly StorageVolume[], serial: string): Outcome<StorageVolume> {
  const wanted = normalizeSerial(serial);
  if (!wanted) {
    return fail(new NotFoundError('Cannot match a volume to an empty serial number'));
  }

  const matches = volumes.filter((volume) => normalizeSerial(volume.serial) === wanted);

  if (matches.length === 0) {
    return fail(new NotFoundError(`No array volume has serial ${wanted}`));
  }
  if (matches.length > 1) {
    const names = matches.map((volume) => volume.name).join(', ');
    return fail(new NotFoundError(`Serial ${wanted} is ambiguous: matched ${matches.length} volumes (${names})`));
  }

  return ok(matches[0]);
}

export interface VolumeLister {
  listVolumes(signal?: AbortSignal): Promise<Outcome<StorageVolume[]>>;
}

export async function resolveVolumeBySerial(
  lister: VolumeLister,
  serial: string,
  signal?: AbortSignal
): Promise<Outcome<StorageVolume>> {
  const volumes = await lister.listVolumes(signal);
  if (!volumes.ok) {
    return volumes;
  }
  return matchVolumeBySerial(volumes.value, serial);
}
