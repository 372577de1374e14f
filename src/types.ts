/**
 * Core records passed between the collaborators and the orchestrator
 */

import { z } from 'zod';

// Host-level disk backing a database's files
export interface HostDisk {
  hostName: string;
  diskNumber: number;
  serialNumber: string;
}

// Array-side volume matched to a HostDisk by serial
export interface StorageVolume {
  name: string;
  serial: string;
}

export interface ArrayCredentials {
  username: string;
  password: string;
}

export type DatabaseStatus =
  | 'ONLINE'
  | 'OFFLINE'
  | 'RESTORING'
  | 'RECOVERING'
  | 'RECOVERY_PENDING'
  | 'SUSPECT'
  | 'EMERGENCY';

const nonBlank = (label: string) => z.string().trim().min(1, `${label} is required`);

export const refreshRequestSchema = z.object({
  databaseName: nonBlank('database name').max(128),
  sourceInstance: nonBlank('source instance'),
  destinationInstance: nonBlank('destination instance'),
  arrayEndpoint: nonBlank('array endpoint').regex(/^[A-Za-z0-9.\-:[\]]+$/, 'array endpoint must be a host name or address'),
  arrayCredentials: z.object({
    username: nonBlank('array username'),
    password: z.string().min(1, 'array password is required'),
  }),
});

export type RefreshRequest = Readonly<z.infer<typeof refreshRequestSchema>>;
