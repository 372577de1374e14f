/**
 * Database Handle
 * Binds to one database on one instance and moves it between ONLINE and OFFLINE
 */

import { z } from 'zod';
import { DatabaseStatus } from '../types';
import {
  CancelledError,
  ConnectionError,
  NotFoundError,
  Outcome,
  StateTransitionError,
  describeCause,
  fail,
  ok,
} from '../lib/errors';
import { logger } from '../lib/logger';

export interface DatabaseHandle {
  readonly instance: string;
  readonly databaseName: string;
  readonly primaryFilePath: string;
  // What the catalog reported when the handle was bound
  readonly resolvedStatus: DatabaseStatus;
  getStatus(signal?: AbortSignal): Promise<Outcome<DatabaseStatus>>;
  // Both transitions are no-ops when the database is already there
  setOffline(signal?: AbortSignal): Promise<Outcome<void>>;
  setOnline(signal?: AbortSignal): Promise<Outcome<void>>;
}

export interface DatabaseEngine {
  resolve(instance: string, databaseName: string, signal?: AbortSignal): Promise<Outcome<DatabaseHandle>>;
  // The machine running the instance, not its listener or cluster name
  resolvePhysicalHostName(instance: string, signal?: AbortSignal): Promise<Outcome<string>>;
  close(): Promise<void>;
}

export type QueryParams = Record<string, string>;

// The slice of a connection the handle needs; every parameter is NVARCHAR.
// Aborting the signal cancels the running batch on the server.
export interface QueryRunner {
  query(text: string, params?: QueryParams, signal?: AbortSignal): Promise<Array<Record<string, unknown>>>;
}

function failedQuery(message: string, error: unknown, signal: AbortSignal | undefined): Outcome<never> {
  if (signal?.aborted) {
    return fail(new CancelledError(`${message}: cancelled`, error));
  }
  return fail(new ConnectionError(`${message}: ${describeCause(error)}`, error));
}

export const statusSchema = z.enum([
  'ONLINE',
  'OFFLINE',
  'RESTORING',
  'RECOVERING',
  'RECOVERY_PENDING',
  'SUSPECT',
  'EMERGENCY',
]);

const resolvedRowSchema = z.object({
  state_desc: statusSchema,
  physical_name: z.string().nullable(),
});

const statusRowSchema = z.object({ state_desc: statusSchema });

const hostRowSchema = z.object({ host_name: z.string().nullable() });

export const SQL = {
  resolve: `
    SELECT d.name, d.state_desc, mf.physical_name
    FROM sys.databases AS d
    LEFT JOIN sys.master_files AS mf
      ON mf.database_id = d.database_id AND mf.file_id = 1
    WHERE d.name = @name`,
  status: 'SELECT state_desc FROM sys.databases WHERE name = @name',
  physicalHost: "SELECT CAST(SERVERPROPERTY('ComputerNamePhysicalNetBIOS') AS nvarchar(128)) AS host_name",
  setOffline:
    "DECLARE @sql nvarchar(max) = N'ALTER DATABASE ' + QUOTENAME(@name) + N' SET OFFLINE WITH ROLLBACK IMMEDIATE'; EXEC sys.sp_executesql @sql;",
  setOnline:
    "DECLARE @sql nvarchar(max) = N'ALTER DATABASE ' + QUOTENAME(@name) + N' SET ONLINE'; EXEC sys.sp_executesql @sql;",
} as const;

type TargetState = Extract<DatabaseStatus, 'ONLINE' | 'OFFLINE'>;

export class SqlDatabaseHandle implements DatabaseHandle {
  readonly instance: string;
  readonly databaseName: string;
  readonly primaryFilePath: string;
  readonly resolvedStatus: DatabaseStatus;
  private readonly runner: QueryRunner;

  constructor(
    runner: QueryRunner,
    instance: string,
    databaseName: string,
    primaryFilePath: string,
    resolvedStatus: DatabaseStatus
  ) {
    this.runner = runner;
    this.instance = instance;
    this.databaseName = databaseName;
    this.primaryFilePath = primaryFilePath;
    this.resolvedStatus = resolvedStatus;
  }

  async getStatus(signal?: AbortSignal): Promise<Outcome<DatabaseStatus>> {
    let rows: Array<Record<string, unknown>>;
    try {
      rows = await this.runner.query(SQL.status, { name: this.databaseName }, signal);
    } catch (error) {
      return failedQuery(`Cannot read state of ${this.describe()}`, error, signal);
    }

    if (rows.length === 0) {
      return fail(new NotFoundError(`Database ${this.describe()} no longer exists`));
    }
    const row = statusRowSchema.safeParse(rows[0]);
    if (!row.success) {
      return fail(new NotFoundError(`Unrecognised state for ${this.describe()}`, row.error));
    }
    return ok(row.data.state_desc);
  }

  setOffline(signal?: AbortSignal): Promise<Outcome<void>> {
    return this.transition('OFFLINE', SQL.setOffline, signal);
  }

  setOnline(signal?: AbortSignal): Promise<Outcome<void>> {
    return this.transition('ONLINE', SQL.setOnline, signal);
  }

  private async transition(target: TargetState, statement: string, signal?: AbortSignal): Promise<Outcome<void>> {
    const before = await this.getStatus(signal);
    if (!before.ok) {
      if (before.error.kind === 'cancelled') return before;
      return fail(new StateTransitionError(`Cannot set ${this.describe()} ${target}: ${before.error.message}`, before.error));
    }
    if (before.value === target) {
      logger.debug(`${this.describe()} is already ${target}`);
      return ok(undefined);
    }

    try {
      await this.runner.query(statement, { name: this.databaseName }, signal);
    } catch (error) {
      if (signal?.aborted) {
        return fail(new CancelledError(`Setting ${this.describe()} ${target} was cancelled`, error));
      }
      return fail(
        new StateTransitionError(`Engine rejected setting ${this.describe()} ${target}: ${describeCause(error)}`, error)
      );
    }

    const after = await this.getStatus(signal);
    if (!after.ok) {
      if (after.error.kind === 'cancelled') return after;
      return fail(new StateTransitionError(`Cannot confirm ${this.describe()} is ${target}: ${after.error.message}`, after.error));
    }
    if (after.value !== target) {
      return fail(new StateTransitionError(`${this.describe()} is ${after.value} after requesting ${target}`));
    }
    return ok(undefined);
  }

  private describe(): string {
    return `[${this.databaseName}] on ${this.instance}`;
  }
}

export async function resolveHandle(
  runner: QueryRunner,
  instance: string,
  databaseName: string,
  signal?: AbortSignal
): Promise<Outcome<DatabaseHandle>> {
  let rows: Array<Record<string, unknown>>;
  try {
    rows = await runner.query(SQL.resolve, { name: databaseName }, signal);
  } catch (error) {
    return failedQuery(`Cannot query ${instance}`, error, signal);
  }

  if (rows.length === 0) {
    return fail(new NotFoundError(`Database [${databaseName}] does not exist on ${instance}`));
  }

  const row = resolvedRowSchema.safeParse(rows[0]);
  if (!row.success) {
    return fail(new NotFoundError(`Unexpected catalog row for [${databaseName}] on ${instance}`, row.error));
  }
  if (!row.data.physical_name) {
    return fail(new NotFoundError(`Database [${databaseName}] on ${instance} has no primary data file`));
  }

  return ok(new SqlDatabaseHandle(runner, instance, databaseName, row.data.physical_name, row.data.state_desc));
}

export async function resolvePhysicalHostName(
  runner: QueryRunner,
  instance: string,
  signal?: AbortSignal
): Promise<Outcome<string>> {
  let rows: Array<Record<string, unknown>>;
  try {
    rows = await runner.query(SQL.physicalHost, {}, signal);
  } catch (error) {
    return failedQuery(`Cannot query ${instance}`, error, signal);
  }

  const row = hostRowSchema.safeParse(rows[0]);
  const hostName = row.success ? row.data.host_name?.trim() : undefined;
  if (!hostName) {
    return fail(new NotFoundError(`Instance ${instance} did not report its physical host name`));
  }
  return ok(hostName);
}
