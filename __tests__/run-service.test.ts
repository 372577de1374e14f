import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { formatRun } from '../src/cli/commands/history';
import { RefreshOrchestrator } from '../src/orchestrator';
import { RefreshReport } from '../src/orchestrator/types';
import { closeDatabase, initDatabase } from '../src/state/database';
import { RunService } from '../src/state/run-service';
import {
  FakeArrayClient,
  FakeDatabaseEngine,
  FakeExecutor,
  FakeWorld,
  buildRequest,
  buildWorld,
} from './helpers/fakes';

async function reportFor(prepare: (world: FakeWorld) => void = () => undefined): Promise<RefreshReport> {
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
  return orchestrator.run(buildRequest());
}

describe('RunService', () => {
  let dir: string;
  let service: RunService;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'volume-refresh-history-'));
    await initDatabase(path.join(dir, 'history.db'));
    service = new RunService();
  });

  afterEach(() => {
    closeDatabase();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('records a started run as running', () => {
    const run = service.start(buildRequest(), false);

    expect(run.runId).toMatch(/^run_[0-9a-z]+_[0-9a-f]{8}$/);
    expect(service.getById(run.runId)).toEqual({
      runId: run.runId,
      databaseName: 'AppDb',
      sourceInstance: 'SRC01',
      destinationInstance: 'DST01',
      arrayEndpoint: '10.0.0.5',
      dryRun: false,
      startedAt: run.startedAt,
      completedAt: undefined,
      status: 'running',
      finalState: undefined,
      destinationOutcome: undefined,
      failedStep: undefined,
      errorMessage: undefined,
      overwriteMs: undefined,
      totalMs: undefined,
    });
    expect(service.getRunning().map((entry) => entry.runId)).toEqual([run.runId]);
  });

  test('closes a run with a successful report', async () => {
    const run = service.start(buildRequest(), false);

    service.finish(run.runId, await reportFor());

    const stored = service.getById(run.runId);
    expect(stored?.status).toBe('succeeded');
    expect(stored?.finalState).toBe('DEST_DB_ONLINE');
    expect(stored?.destinationOutcome).toBe('refreshed');
    expect(stored?.overwriteMs).toBe(42_000);
    expect(stored?.totalMs).toBe(42_000);
    expect(stored?.failedStep).toBeUndefined();
    expect(typeof stored?.completedAt).toBe('number');
    expect(service.getRunning()).toEqual([]);
  });

  test('keeps the failing step and message of a failed report', async () => {
    const run = service.start(buildRequest(), false);

    service.finish(run.runId, await reportFor((world) => world.failures.add('setDiskOffline:false')));

    const stored = service.getById(run.runId);
    expect(stored?.status).toBe('failed');
    expect(stored?.finalState).toBe('ABORTED');
    expect(stored?.destinationOutcome).toBe('unsafe');
    expect(stored?.failedStep).toBe('online_disk');
    expect(stored?.errorMessage).toBe('Step 7 (bring destination disk online) failed: Set-Disk failed on dst-node1');
  });

  test('marks a run that ended without a report as failed', () => {
    const run = service.start(buildRequest(), true);

    service.fail(run.runId, 'ARRAY_PASSWORD is not set');

    const stored = service.getById(run.runId);
    expect(stored?.status).toBe('failed');
    expect(stored?.dryRun).toBe(true);
    expect(stored?.errorMessage).toBe('ARRAY_PASSWORD is not set');
  });

  test('returns null for an unknown run', () => {
    expect(service.getById('run_missing')).toBeNull();
  });

  test('lists recent runs newest first up to the limit', () => {
    const first = service.start(buildRequest(), false);
    const second = service.start(buildRequest({ databaseName: 'Billing' }), false);
    const third = service.start(buildRequest({ databaseName: 'Audit' }), false);

    const ids = service.getRecent(2).map((run) => run.runId);

    expect(ids).toEqual([third.runId, second.runId]);
    expect(ids).not.toContain(first.runId);
  });

  test('counts outcomes', async () => {
    const succeeded = service.start(buildRequest(), false);
    service.finish(succeeded.runId, await reportFor());
    const unsafe = service.start(buildRequest(), false);
    service.finish(unsafe.runId, await reportFor((world) => world.failures.add('setOnline')));
    service.start(buildRequest(), false);

    expect(service.getStats()).toEqual({ total: 3, succeeded: 1, failed: 1, unsafe: 1 });
  });

  test('counts nothing on an empty history', () => {
    expect(service.getStats()).toEqual({ total: 0, succeeded: 0, failed: 0, unsafe: 0 });
  });
});

describe('formatRun', () => {
  test('summarises a finished run on one line', () => {
    const line = formatRun({
      runId: 'run_abc_01020304',
      databaseName: 'AppDb',
      sourceInstance: 'SRC01',
      destinationInstance: 'DST01',
      arrayEndpoint: '10.0.0.5',
      dryRun: false,
      startedAt: Date.UTC(2026, 0, 5, 12, 0, 0),
      status: 'failed',
      destinationOutcome: 'restored',
      failedStep: 'overwrite_volume',
      totalMs: 61_000,
    });

    expect(line).toBe(
      '2026-01-05 12:00:00  run_abc_01020304  AppDb: SRC01 -> DST01  failed (restored) at overwrite_volume 1m 01s'
    );
  });

  test('marks dry runs', () => {
    const line = formatRun({
      runId: 'run_abc_01020304',
      databaseName: 'AppDb',
      sourceInstance: 'SRC01',
      destinationInstance: 'DST01',
      arrayEndpoint: '10.0.0.5',
      dryRun: true,
      startedAt: Date.UTC(2026, 0, 5, 12, 0, 0),
      status: 'running',
    });

    expect(line).toBe('2026-01-05 12:00:00  run_abc_01020304  AppDb: SRC01 -> DST01  running [dry run]');
  });
});
