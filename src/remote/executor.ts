/**
 * Remote Executor
 * Runs a named unit of work on a database host through PowerShell remoting
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { z } from 'zod';
import { RemoteConfig } from '../config/types';
import {
  CancelledError,
  InvalidRequestError,
  NotFoundError,
  Outcome,
  RemoteExecutionError,
  RemoteFailureReason,
  fail,
  ok,
} from '../lib/errors';
import { logger } from '../lib/logger';
import { psLiteral } from '../lib/utils';

export interface DiskDescriptor {
  diskNumber: number;
  serialNumber: string;
}

// Every unit of work the executor knows, with its arguments and result
export interface RemoteOperations {
  getDiskForPath: { args: { path: string }; result: DiskDescriptor };
  setDiskOffline: { args: { diskNumber: number; offline: boolean }; result: void };
}

export type RemoteOperationName = keyof RemoteOperations;
export type RemoteArgs<K extends RemoteOperationName> = RemoteOperations[K]['args'];
export type RemoteResult<K extends RemoteOperationName> = RemoteOperations[K]['result'];

export interface RemoteExecutor {
  run<K extends RemoteOperationName>(
    hostName: string,
    operation: K,
    args: RemoteArgs<K>,
    signal?: AbortSignal
  ): Promise<Outcome<RemoteResult<K>>>;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

// Aborting the signal kills the child process
export type CommandRunner = (file: string, args: string[], signal?: AbortSignal) => Promise<CommandResult>;

const execFileAsync = promisify(execFile);

export const runCommand: CommandRunner = async (file, args, signal) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    windowsHide: true,
    maxBuffer: 4 * 1024 * 1024,
    signal,
  });
  return { stdout, stderr };
};

interface OperationDefinition<K extends RemoteOperationName> {
  parameters: string[];
  body: string;
  argumentList(args: RemoteArgs<K>): Array<string | number | boolean>;
  parse(stdout: string, hostName: string): Outcome<RemoteResult<K>>;
}

const diskRecordSchema = z.object({
  Number: z.number().int().nonnegative(),
  SerialNumber: z.string().nullable(),
});

function lastJsonLine(stdout: string): unknown {
  const lines = stdout.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
  const last = lines[lines.length - 1];
  if (last === undefined) {
    return undefined;
  }
  try {
    return JSON.parse(last);
  } catch {
    return undefined;
  }
}

const OPERATIONS: { [K in RemoteOperationName]: OperationDefinition<K> } = {
  getDiskForPath: {
    parameters: ['$Path'],
    body: [
      "$letter = (Split-Path -Path $Path -Qualifier).TrimEnd(':')",
      '$disk = Get-Partition -DriveLetter $letter | Get-Disk',
      '[pscustomobject]@{ Number = [int]$disk.Number; SerialNumber = $disk.SerialNumber } | ConvertTo-Json -Compress',
    ].join('; '),
    argumentList: (args) => [args.path],
    parse: (stdout, hostName) => {
      const record = diskRecordSchema.safeParse(lastJsonLine(stdout));
      if (!record.success) {
        return fail(
          new RemoteExecutionError(`Unexpected disk lookup output from ${hostName}`, hostName, 'protocol', record.error)
        );
      }
      const serialNumber = record.data.SerialNumber?.trim();
      if (!serialNumber) {
        return fail(new NotFoundError(`Disk ${record.data.Number} on ${hostName} reports no serial number`));
      }
      return ok({ diskNumber: record.data.Number, serialNumber });
    },
  },
  setDiskOffline: {
    parameters: ['$Number', '$Offline'],
    body: 'Set-Disk -Number $Number -IsOffline $Offline',
    argumentList: (args) => [args.diskNumber, args.offline],
    parse: () => ok(undefined),
  },
};

const HOST_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9.\-_]*$/;

const AUTHORIZATION_PATTERNS = [/access is denied/i, /accessdenied/i, /unauthori[sz]ed/i, /logon failure/i];
const CONNECTIVITY_PATTERNS = [
  /winrm cannot complete/i,
  /cannot connect to the destination/i,
  /cannot find the computer/i,
  /network path was not found/i,
  /host is unreachable/i,
  /could not be resolved/i,
];

export function classifyRemoteFailure(text: string): RemoteFailureReason {
  if (AUTHORIZATION_PATTERNS.some((pattern) => pattern.test(text))) return 'authorization';
  if (CONNECTIVITY_PATTERNS.some((pattern) => pattern.test(text))) return 'connectivity';
  return 'remote';
}

function failureText(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const stderr = error.stderr;
    if (typeof stderr === 'string' && stderr.trim()) {
      return stderr.trim();
    }
  }
  return error instanceof Error ? error.message : String(error);
}

function isMissingShell(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class PowerShellRemoteExecutor implements RemoteExecutor {
  private readonly config: RemoteConfig;
  private readonly runner: CommandRunner;

  constructor(config: RemoteConfig, runner: CommandRunner = runCommand) {
    this.config = config;
    this.runner = runner;
  }

  buildScript<K extends RemoteOperationName>(hostName: string, operation: K, args: RemoteArgs<K>): string {
    const definition: OperationDefinition<K> = OPERATIONS[operation];
    const session = [
      `ComputerName = ${psLiteral(hostName)}`,
      `Authentication = ${psLiteral(this.config.authentication)}`,
    ];
    if (this.config.useSsl) session.push('UseSSL = $true');
    if (this.config.port > 0) session.push(`Port = ${psLiteral(this.config.port)}`);

    const argumentList = definition.argumentList(args).map(psLiteral).join(', ');

    return [
      "$ErrorActionPreference = 'Stop'",
      `$session = @{ ${session.join('; ')} }`,
      `Invoke-Command @session -ScriptBlock { param(${definition.parameters.join(', ')}) $ErrorActionPreference = 'Stop'; ${definition.body} } -ArgumentList ${argumentList}`,
    ].join('\n');
  }

  async run<K extends RemoteOperationName>(
    hostName: string,
    operation: K,
    args: RemoteArgs<K>,
    signal?: AbortSignal
  ): Promise<Outcome<RemoteResult<K>>> {
    if (!HOST_NAME_PATTERN.test(hostName)) {
      return fail(new InvalidRequestError(`Refusing to dispatch to malformed host name '${hostName}'`));
    }

    const definition: OperationDefinition<K> = OPERATIONS[operation];
    const script = this.buildScript(hostName, operation, args);

    logger.debug(`Dispatching ${operation} to ${hostName}`, { args });

    let stdout: string;
    try {
      const result = await this.runner(
        this.config.shell,
        ['-NoProfile', '-NonInteractive', '-Command', script],
        signal
      );
      stdout = result.stdout;
    } catch (error) {
      if (signal?.aborted) {
        return fail(new CancelledError(`${operation} on ${hostName} was cancelled`, error));
      }
      if (isMissingShell(error)) {
        return fail(
          new RemoteExecutionError(`PowerShell executable '${this.config.shell}' was not found`, hostName, 'connectivity', error)
        );
      }
      const text = failureText(error);
      const reason = classifyRemoteFailure(text);
      return fail(new RemoteExecutionError(`${operation} on ${hostName} failed (${reason}): ${text}`, hostName, reason, error));
    }

    return definition.parse(stdout, hostName);
  }
}
