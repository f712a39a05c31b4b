import { Database, FixedClock, Scheduler, nextFireTime } from '../src';
import { at } from './helpers';

describe('nextFireTime', () => {
  test('interval adds the period', () => {
    expect(nextFireTime({ kind: 'interval', everyMs: 30_000 }, at('2025-03-10T08:00:00Z'))).toEqual(
      at('2025-03-10T08:00:30Z')
    );
  });

  test('daily fires later today or tomorrow', () => {
    const from = at('2025-03-10T08:00:00Z');
    expect(nextFireTime({ kind: 'daily', hour: 9, minute: 30 }, from)).toEqual(at('2025-03-10T09:30:00Z'));
    expect(nextFireTime({ kind: 'daily', hour: 0, minute: 0 }, from)).toEqual(at('2025-03-11T00:00:00Z'));
    expect(nextFireTime({ kind: 'daily', hour: 8, minute: 0 }, from)).toEqual(at('2025-03-11T08:00:00Z'));
  });

  test('daily midnight follows the configured zone', () => {
    expect(
      nextFireTime({ kind: 'daily', hour: 0, minute: 0 }, at('2025-03-10T12:00:00Z'), 'America/New_York')
    ).toEqual(at('2025-03-11T04:00:00Z'));
  });
});

describe('Scheduler', () => {
  let db: Database;
  let clock: FixedClock;
  let scheduler: Scheduler;

  beforeEach(async () => {
    db = new Database(':memory:');
    await db.init();
    clock = new FixedClock('2025-03-10T08:00:00Z');
    scheduler = new Scheduler(db, { clock });
  });

  afterEach(async () => {
    await scheduler.stop();
    await db.close();
  });

  test('runs an interval job when it comes due and records the run', async () => {
    const run = jest.fn(async () => undefined);
    scheduler.register({ id: 'reminders', trigger: { kind: 'interval', everyMs: 30_000 }, run });

    expect(await scheduler.runDue()).toEqual([]);

    clock.advance(30_000);
    expect(await scheduler.runDue()).toEqual([{ id: 'reminders', status: 'ok' }]);
    expect(run).toHaveBeenCalledTimes(1);

    expect(await db.getJob('reminders')).toEqual({
      id: 'reminders',
      next_run_at: '2025-03-10T08:01:00.000Z',
      last_run_at: '2025-03-10T08:00:30.000Z',
      last_status: 'ok',
      last_error: null,
    });
  });

  test('records failures and keeps scheduling', async () => {
    scheduler.register({
      id: 'calendar-sync',
      trigger: { kind: 'interval', everyMs: 60_000 },
      run: async () => {
        throw new Error('calendar unavailable');
      },
    });

    clock.advance(60_000);
    expect(await scheduler.runDue()).toEqual([
      { id: 'calendar-sync', status: 'failed', error: 'calendar unavailable' },
    ]);

    const [state] = await scheduler.listJobs();
    expect(state.last_status).toBe('failed');
    expect(state.last_error).toBe('calendar unavailable');
    expect(state.next_run_at).toEqual(at('2025-03-10T08:02:00Z'));
    expect(state.running).toBe(false);
  });

  test('catches up once on runs missed while stopped', async () => {
    await db.saveJob({
      id: 'recurring-generation',
      next_run_at: '2025-03-07T00:00:00.000Z',
      last_run_at: '2025-03-06T00:00:00.000Z',
      last_status: 'ok',
      last_error: null,
    });
    const run = jest.fn(async () => undefined);
    scheduler.register({ id: 'recurring-generation', trigger: { kind: 'daily', hour: 0, minute: 0 }, run });

    expect(await scheduler.runDue()).toEqual([{ id: 'recurring-generation', status: 'ok' }]);
    expect(await scheduler.runDue()).toEqual([]);
    expect(run).toHaveBeenCalledTimes(1);
    expect((await db.getJob('recurring-generation'))!.next_run_at).toBe('2025-03-11T00:00:00.000Z');
  });

  test('a new job waits for its first slot', async () => {
    scheduler.register({
      id: 'recurring-generation',
      trigger: { kind: 'daily', hour: 0, minute: 0 },
      run: async () => undefined,
    });
    await scheduler.load();

    expect((await db.getJob('recurring-generation'))!.next_run_at).toBe('2025-03-11T00:00:00.000Z');
    expect(await scheduler.runDue()).toEqual([]);
  });

  test('skips a tick while the previous run is still going', async () => {
    let release: () => void = () => undefined;
    const run = jest.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );
    scheduler.register({ id: 'slow', trigger: { kind: 'interval', everyMs: 1_000 }, run });
    await scheduler.load();

    clock.advance(1_000);
    const first = scheduler.runDue();

    clock.advance(1_000);
    expect(await scheduler.runDue()).toEqual([{ id: 'slow', status: 'skipped' }]);
    expect(run).toHaveBeenCalledTimes(1);
    expect((await scheduler.listJobs())[0].running).toBe(true);

    release();
    expect(await first).toEqual([{ id: 'slow', status: 'ok' }]);
  });

  test('stop waits for in-flight runs', async () => {
    let release: () => void = () => undefined;
    scheduler.register({
      id: 'slow',
      trigger: { kind: 'interval', everyMs: 1_000 },
      run: () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    });
    await scheduler.start();
    clock.advance(1_000);
    const run = scheduler.runDue();

    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await new Promise((resolve) => setImmediate(resolve));
    expect(stopped).toBe(false);

    release();
    await stopping;
    await run;
    expect(stopped).toBe(true);
  });

  test('refuses new jobs while running', async () => {
    await scheduler.start();
    expect(() =>
      scheduler.register({ id: 'late', trigger: { kind: 'interval', everyMs: 1_000 }, run: async () => undefined })
    ).toThrow('Cannot register job "late" while the scheduler is running');

    await scheduler.stop();
    scheduler.register({ id: 'late', trigger: { kind: 'interval', everyMs: 1_000 }, run: async () => undefined });
    expect((await scheduler.listJobs()).map((j) => j.id)).toEqual(['late']);
  });

  test('rejects duplicate job ids', () => {
    const job = { id: 'reminders', trigger: { kind: 'interval' as const, everyMs: 1_000 }, run: async () => undefined };
    scheduler.register(job);
    expect(() => scheduler.register(job)).toThrow('Job "reminders" is already registered');
  });
});
