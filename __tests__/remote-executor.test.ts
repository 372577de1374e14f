import { RemoteConfig } from '../src/config/types';
import { RemoteExecutionError } from '../src/lib/errors';
import { CommandResult, CommandRunner, PowerShellRemoteExecutor, classifyRemoteFailure } from '../src/remote/executor';

const config: RemoteConfig = {
  shell: 'pwsh',
  useSsl: false,
  port: 0,
  authentication: 'Default',
};

function replying(stdout: string) {
  return jest.fn(async (_file: string, _args: string[]): Promise<CommandResult> => ({ stdout, stderr: '' }));
}

function rejecting(error: Error) {
  return jest.fn(async (_file: string, _args: string[]): Promise<CommandResult> => {
    throw error;
  });
}

describe('PowerShellRemoteExecutor', () => {
  describe('buildScript', () => {
    test('wraps the operation in Invoke-Command against the host', () => {
      const executor = new PowerShellRemoteExecutor(config, replying(''));

      const script = executor.buildScript('dst-node1', 'setDiskOffline', { diskNumber: 3, offline: true });

      expect(script.split('\n')).toEqual([
        "$ErrorActionPreference = 'Stop'",
        "$session = @{ ComputerName = 'dst-node1'; Authentication = 'Default' }",
        "Invoke-Command @session -ScriptBlock { param($Number, $Offline) $ErrorActionPreference = 'Stop'; Set-Disk -Number $Number -IsOffline $Offline } -ArgumentList 3, $true",
      ]);
    });

    test('adds SSL and port to the session when configured', () => {
      const executor = new PowerShellRemoteExecutor(
        { ...config, useSsl: true, port: 5986, authentication: 'Kerberos' },
        replying('')
      );

      const script = executor.buildScript('dst-node1', 'setDiskOffline', { diskNumber: 3, offline: false });

      expect(script.split('\n')[1]).toBe(
        "$session = @{ ComputerName = 'dst-node1'; Authentication = 'Kerberos'; UseSSL = $true; Port = 5986 }"
      );
      expect(script.endsWith('-ArgumentList 3, $false')).toBe(true);
    });

    test('passes paths as quoted literals', () => {
      const executor = new PowerShellRemoteExecutor(config, replying(''));

      const script = executor.buildScript('dst-node1', 'getDiskForPath', { path: "E:\\O'Brien\\" });

      expect(script.endsWith("-ArgumentList 'E:\\O''Brien\\'")).toBe(true);
    });
  });

  describe('run', () => {
    test('invokes the configured shell non-interactively', async () => {
      const runner = replying('');
      const executor = new PowerShellRemoteExecutor({ ...config, shell: 'powershell.exe' }, runner);

      const result = await executor.run('dst-node1', 'setDiskOffline', { diskNumber: 3, offline: true });

      expect(result).toEqual({ ok: true, value: undefined });
      expect(runner).toHaveBeenCalledTimes(1);
      const [file, args] = runner.mock.calls[0];
      expect(file).toBe('powershell.exe');
      expect(args.slice(0, 3)).toEqual(['-NoProfile', '-NonInteractive', '-Command']);
      expect(args[3]).toBe(executor.buildScript('dst-node1', 'setDiskOffline', { diskNumber: 3, offline: true }));
    });

    test('reads the disk record from the last line of output', async () => {
      const executor = new PowerShellRemoteExecutor(
        config,
        replying('WARNING: partition cache refreshed\r\n{"Number":3,"SerialNumber":" 6000abc0001 "}\r\n')
      );

      const result = await executor.run('dst-node1', 'getDiskForPath', { path: 'E:\\' });

      expect(result).toEqual({ ok: true, value: { diskNumber: 3, serialNumber: '6000abc0001' } });
    });

    test('treats unparseable output as a protocol failure', async () => {
      const executor = new PowerShellRemoteExecutor(config, replying('Disk 3 is healthy'));

      const result = await executor.run('dst-node1', 'getDiskForPath', { path: 'E:\\' });

      expect(result.ok).toBe(false);
      if (!result.ok && result.error instanceof RemoteExecutionError) {
        expect(result.error.reason).toBe('protocol');
        expect(result.error.hostName).toBe('dst-node1');
        expect(result.error.message).toBe('Unexpected disk lookup output from dst-node1');
      } else {
        throw new Error('expected a remote execution failure');
      }
    });

    test('reports a disk without a serial number as not found', async () => {
      const executor = new PowerShellRemoteExecutor(config, replying('{"Number":3,"SerialNumber":null}'));

      const result = await executor.run('dst-node1', 'getDiskForPath', { path: 'E:\\' });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('not_found');
        expect(result.error.message).toBe('Disk 3 on dst-node1 reports no serial number');
      }
    });

    test('classifies a failed command from its stderr', async () => {
      const error = Object.assign(new Error('Command failed: pwsh'), {
        stderr: '[dst-node1] Connecting to remote server dst-node1 failed: Access is denied.\n',
      });
      const executor = new PowerShellRemoteExecutor(config, rejecting(error));

      const result = await executor.run('dst-node1', 'setDiskOffline', { diskNumber: 3, offline: true });

      expect(result.ok).toBe(false);
      if (!result.ok && result.error instanceof RemoteExecutionError) {
        expect(result.error.reason).toBe('authorization');
        expect(result.error.message).toBe(
          'setDiskOffline on dst-node1 failed (authorization): [dst-node1] Connecting to remote server dst-node1 failed: Access is denied.'
        );
        expect(result.error.cause).toBe(error);
      } else {
        throw new Error('expected a remote execution failure');
      }
    });

    test('falls back to the error message when stderr is empty', async () => {
      const error = Object.assign(new Error('Set-Disk : The disk is a system disk'), { stderr: '' });
      const executor = new PowerShellRemoteExecutor(config, rejecting(error));

      const result = await executor.run('dst-node1', 'setDiskOffline', { diskNumber: 0, offline: true });

      expect(!result.ok && result.error.message).toBe(
        'setDiskOffline on dst-node1 failed (remote): Set-Disk : The disk is a system disk'
      );
    });

    test('reports a missing shell as a connectivity failure', async () => {
      const error = Object.assign(new Error('spawn pwsh ENOENT'), { code: 'ENOENT' });
      const executor = new PowerShellRemoteExecutor(config, rejecting(error));

      const result = await executor.run('dst-node1', 'setDiskOffline', { diskNumber: 3, offline: true });

      expect(result.ok).toBe(false);
      if (!result.ok && result.error instanceof RemoteExecutionError) {
        expect(result.error.reason).toBe('connectivity');
        expect(result.error.message).toBe("PowerShell executable 'pwsh' was not found");
      } else {
        throw new Error('expected a remote execution failure');
      }
    });

    test('hands its signal to the runner and reports an aborted run as cancelled', async () => {
      const controller = new AbortController();
      const runner = jest.fn<ReturnType<CommandRunner>, Parameters<CommandRunner>>(
        (_file, _args, signal) =>
          new Promise<CommandResult>((_resolve, reject) => {
            signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')), { once: true });
          })
      );
      const executor = new PowerShellRemoteExecutor(config, runner);

      const pending = executor.run('dst-node1', 'setDiskOffline', { diskNumber: 3, offline: true }, controller.signal);
      controller.abort();
      const result = await pending;

      expect(runner.mock.calls[0][2]).toBe(controller.signal);
      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.kind).toBe('cancelled');
      expect(!result.ok && result.error.message).toBe('setDiskOffline on dst-node1 was cancelled');
    });

    test('refuses a malformed host name without running anything', async () => {
      const runner = replying('');
      const executor = new PowerShellRemoteExecutor(config, runner);

      const result = await executor.run("node1'; Remove-Item C:\\", 'setDiskOffline', { diskNumber: 3, offline: true });

      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.kind).toBe('invalid_request');
      expect(runner).not.toHaveBeenCalled();
    });
  });
});

describe('classifyRemoteFailure', () => {
  test.each([
    ['Connecting to remote server db1 failed: Access is denied.', 'authorization'],
    ['The user name or password is incorrect. Logon failure', 'authorization'],
    ['WinRM cannot complete the operation. Verify that the specified computer name is valid', 'connectivity'],
    ['The WinRM client cannot process the request. Cannot find the computer db9.', 'connectivity'],
    ['Set-Disk : Access to a CIM resource was not available', 'remote'],
  ])('%s -> %s', (text, reason) => {
    expect(classifyRemoteFailure(text)).toBe(reason);
  });
});
