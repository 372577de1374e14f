import { EXIT_FAILED, EXIT_SUCCESS, EXIT_UNSAFE, exitCodeFor, formatReport } from '../src/cli/report';
import { RefreshOrchestrator } from '../src/orchestrator';
import { RefreshReport } from '../src/orchestrator/types';
import { RefreshRequest } from '../src/types';
import {
  FakeArrayClient,
  FakeDatabaseEngine,
  FakeExecutor,
  FakeWorld,
  buildRequest,
  buildWorld,
} from './helpers/fakes';

async function reportFor(
  prepare: (world: FakeWorld) => void = () => undefined,
  request: RefreshRequest = buildRequest(),
  dryRun = false
): Promise<RefreshReport> {
  const world = buildWorld();
  prepare(world);
  const orchestrator = new RefreshOrchestrator(
    {
      arrayClient: new FakeArrayClient(world),
      databaseEngine: new FakeDatabaseEngine(world),
      executor: new FakeExecutor(world),
      now: () => world.clock,
    },
    { stepTimeoutMs: 0, overwriteTimeoutMs: 0 }
  );
  return orchestrator.run(request, { dryRun });
}

const DESTINATION_LINE = 'Destination: [AppDb] on DST01 -> dst-node1 disk 3 (SN-A) -> volume dst-appdb-data';
const SOURCE_LINE = 'Source: [AppDb] on SRC01 -> src-node1 disk 2 (SN-B) -> volume src-appdb-data';

describe('formatReport', () => {
  test('describes a successful refresh', async () => {
    const report = await reportFor();

    expect(formatReport(report)).toEqual([
      DESTINATION_LINE,
      SOURCE_LINE,
      'Refresh succeeded',
      'Overwrite: 42.0s',
      'Total: 42.0s',
      'States: INIT -> ARRAY_CONNECTED -> TARGETS_RESOLVED -> DEST_DB_OFFLINE -> DEST_DISK_OFFLINE -> VOLUME_OVERWRITTEN -> DEST_DISK_ONLINE -> DEST_DB_ONLINE',
    ]);
    expect(exitCodeFor(report)).toBe(EXIT_SUCCESS);
  });

  test('describes a dry run', async () => {
    const report = await reportFor(undefined, buildRequest(), true);

    expect(formatReport(report)).toEqual([
      DESTINATION_LINE,
      SOURCE_LINE,
      'Dry run complete; nothing was changed',
      'Total: 0ms',
      'States: INIT -> ARRAY_CONNECTED -> TARGETS_RESOLVED',
    ]);
    expect(exitCodeFor(report)).toBe(EXIT_SUCCESS);
  });

  test('describes a restored failure with its compensations', async () => {
    const report = await reportFor((world) => world.failures.add('overwrite'));

    expect(formatReport(report)).toEqual([
      DESTINATION_LINE,
      SOURCE_LINE,
      'Refresh failed. Step 6 (overwrite destination volume) failed: Array rejected overwrite of dst-appdb-data',
      '  compensation disk_online succeeded',
      '  compensation database_online succeeded',
      'Overwrite: 0ms',
      'Total: 0ms',
      'States: INIT -> ARRAY_CONNECTED -> TARGETS_RESOLVED -> DEST_DB_OFFLINE -> DEST_DISK_OFFLINE -> ABORTING -> ABORTED',
    ]);
    expect(exitCodeFor(report)).toBe(EXIT_FAILED);
  });

  test('flags an unsafe destination as critical', async () => {
    const report = await reportFor((world) => {
      world.failures.add('overwrite');
      world.failures.add('compensate:setDiskOffline:false');
    });

    expect(formatReport(report)).toEqual([
      DESTINATION_LINE,
      SOURCE_LINE,
      'CRITICAL: Refresh failed. Step 6 (overwrite destination volume) failed: Array rejected overwrite of dst-appdb-data',
      '  compensation disk_online failed: Set-Disk failed on dst-node1',
      '  compensation database_online skipped',
      'Destination is NOT usable; bring its disk and database online manually',
      'Overwrite: 0ms',
      'Total: 0ms',
      'States: INIT -> ARRAY_CONNECTED -> TARGETS_RESOLVED -> DEST_DB_OFFLINE -> DEST_DISK_OFFLINE -> ABORTING -> ABORTED',
    ]);
    expect(exitCodeFor(report)).toBe(EXIT_UNSAFE);
  });

  test('describes a rejected request without resolved sides', async () => {
    const report = await reportFor(undefined, buildRequest({ sourceInstance: '' }));

    expect(formatReport(report)).toEqual([
      'Refresh failed. Step 0 (validate request) failed: source instance is required',
      'Total: 0ms',
      'States: INIT -> ABORTING -> ABORTED',
    ]);
    expect(exitCodeFor(report)).toBe(EXIT_FAILED);
  });
});
