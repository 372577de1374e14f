/**
 * SQL Server engine backed by mssql connection pools, one per instance
 */

import * as sql from 'mssql';
import { DatabaseConfig } from '../config/types';
import { Secrets } from '../lib/env';
import { CancelledError, ConnectionError, InvalidRequestError, Outcome, describeCause, fail, ok } from '../lib/errors';
import { logger } from '../lib/logger';
import {
  DatabaseEngine,
  DatabaseHandle,
  QueryParams,
  QueryRunner,
  resolveHandle,
  resolvePhysicalHostName,
} from './handle';

export interface InstanceAddress {
  server: string;
  instanceName?: string;
  port?: number;
}

// SRV01, SRV01\SQL2019, SRV01,1433 and tcp:SRV01,1433
export function parseInstanceAddress(address: string): InstanceAddress | null {
  const trimmed = address.trim().replace(/^tcp:/i, '');
  const match = /^([^\\,\s]+)(?:\\([^\\,\s]+))?(?:,(\d{1,5}))?$/.exec(trimmed);
  if (!match) {
    return null;
  }

  const [, server, instanceName, port] = match;
  const parsed: InstanceAddress = { server };
  if (instanceName) parsed.instanceName = instanceName;
  if (port) {
    const portNumber = Number(port);
    if (portNumber < 1 || portNumber > 65535) return null;
    parsed.port = portNumber;
  }
  return parsed;
}

class PoolQueryRunner implements QueryRunner {
  private readonly pool: sql.ConnectionPool;

  constructor(pool: sql.ConnectionPool) {
    this.pool = pool;
  }

  async query(text: string, params: QueryParams = {}, signal?: AbortSignal): Promise<Array<Record<string, unknown>>> {
    if (signal?.aborted) {
      throw new Error('query cancelled before it was sent');
    }

    const request = this.pool.request();
    for (const [name, value] of Object.entries(params)) {
      request.input(name, sql.NVarChar(128), value);
    }

    const cancel = (): void => {
      request.cancel();
    };
    signal?.addEventListener('abort', cancel, { once: true });
    try {
      const result = await request.query<Record<string, unknown>>(text);
      return result.recordset ?? [];
    } finally {
      signal?.removeEventListener('abort', cancel);
    }
  }
}

export class MssqlDatabaseEngine implements DatabaseEngine {
  private readonly config: DatabaseConfig;
  private readonly secrets: Secrets;
  private readonly pools = new Map<string, sql.ConnectionPool>();

  constructor(config: DatabaseConfig, secrets: Secrets) {
    this.config = config;
    this.secrets = secrets;
  }

  private buildPoolConfig(address: InstanceAddress): sql.config {
    const poolConfig: sql.config = {
      server: address.server,
      port: address.port,
      database: 'master',
      connectionTimeout: this.config.connectTimeoutMs,
      requestTimeout: this.config.requestTimeoutMs,
      user: this.secrets.sqlUsername,
      password: this.secrets.sqlPassword,
      options: {
        encrypt: this.config.encrypt,
        trustServerCertificate: this.config.trustServerCertificate,
        instanceName: address.instanceName,
      },
      pool: { max: 1, min: 0 },
    };
    if (this.config.authentication === 'ntlm') {
      poolConfig.domain = this.secrets.sqlDomain;
    }
    return poolConfig;
  }

  private async connect(instance: string, signal?: AbortSignal): Promise<Outcome<QueryRunner>> {
    const existing = this.pools.get(instance);
    if (existing) {
      return ok(new PoolQueryRunner(existing));
    }

    const address = parseInstanceAddress(instance);
    if (!address) {
      return fail(new InvalidRequestError(`'${instance}' is not a valid instance address`));
    }

    const pool = new sql.ConnectionPool(this.buildPoolConfig(address));
    try {
      await pool.connect();
    } catch (error) {
      if (signal?.aborted) {
        return fail(new CancelledError(`Connecting to instance ${instance} was cancelled`, error));
      }
      return fail(new ConnectionError(`Cannot connect to instance ${instance}: ${describeCause(error)}`, error));
    }

    logger.debug(`Connected to instance ${instance}`);
    this.pools.set(instance, pool);
    return ok(new PoolQueryRunner(pool));
  }

  async resolve(instance: string, databaseName: string, signal?: AbortSignal): Promise<Outcome<DatabaseHandle>> {
    const runner = await this.connect(instance, signal);
    if (!runner.ok) return runner;
    return resolveHandle(runner.value, instance, databaseName, signal);
  }

  async resolvePhysicalHostName(instance: string, signal?: AbortSignal): Promise<Outcome<string>> {
    const runner = await this.connect(instance, signal);
    if (!runner.ok) return runner;
    return resolvePhysicalHostName(runner.value, instance, signal);
  }

  async close(): Promise<void> {
    const pools = [...this.pools.entries()];
    this.pools.clear();
    for (const [instance, pool] of pools) {
      try {
        await pool.close();
      } catch (error) {
        logger.warn(`Could not close connection to ${instance}`, { error: describeCause(error) });
      }
    }
  }
}
