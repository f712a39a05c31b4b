#!/usr/bin/env node
import { Command } from 'commander';
import { loadConfig } from './config';
import { createWorker, Worker } from './worker';
import { errorMessage } from './errors';

const program = new Command();

program
  .name('taskmirror')
  .description('Recurring to-dos mirrored onto an external calendar')
  .version('0.1.0');

async function withWorker(fn: (worker: Worker) => Promise<void>): Promise<void> {
  const worker = await createWorker(loadConfig());
  try {
    await fn(worker);
  } finally {
    await worker.close();
  }
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

program
  .command('worker')
  .description('Run the scheduler: reminders, midnight generation and calendar sync')
  .action(async () => {
    const worker = await createWorker(loadConfig());
    await worker.scheduler.start();

    let stopping = false;
    const shutdown = (signal: string) => {
      if (stopping) return;
      stopping = true;
      worker.logger.info({ signal }, 'Shutting down');
      worker.close().catch((err) => {
        worker.logger.error({ err: errorMessage(err) }, 'Shutdown failed');
        process.exitCode = 1;
      });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  });

program
  .command('generate')
  .description('Run one recurring-instance generation pass for today')
  .action(() =>
    withWorker(async (worker) => {
      print(await worker.recurrence.runDailyGeneration());
    })
  );

program
  .command('remind')
  .description('Send every reminder that is due now')
  .action(() =>
    withWorker(async (worker) => {
      print(await worker.reminders.sendDueReminders());
    })
  );

program
  .command('sync')
  .description('Sync one owner, or every enabled account')
  .argument('[owner]', 'owner id')
  .action((owner: string | undefined) =>
    withWorker(async (worker) => {
      if (!worker.sync) {
        console.error('Calendar sync is not configured. Set TASKMIRROR_GOOGLE_ACCESS_TOKEN.');
        process.exitCode = 2;
        return;
      }
      print(owner ? await worker.sync.syncAccount(owner) : await worker.sync.syncAll());
    })
  );

program
  .command('account')
  .description('Enable or update calendar sync for an owner')
  .argument('<owner>', 'owner id')
  .option('--calendar <id>', 'calendar id')
  .option('--color <colorId>', 'marker color id for task-like events')
  .option('--no-hashtag', 'do not treat #titles as tasks')
  .option('--disable', 'turn calendar sync off')
  .action(
    (owner: string, opts: { calendar?: string; color?: string; hashtag: boolean; disable?: boolean }) =>
      withWorker(async (worker) => {
        print(
          await worker.db.upsertAccount({
            owner_id: owner,
            enabled: !opts.disable,
            calendar_id: opts.calendar,
            marker_color: opts.color,
            marker_hashtag: opts.hashtag,
          })
        );
      })
  );

program
  .command('jobs')
  .description('Show the scheduler job registry')
  .action(() =>
    withWorker(async (worker) => {
      await worker.scheduler.load();
      print(await worker.scheduler.listJobs());
    })
  );

program.parseAsync(process.argv).catch((err) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});
