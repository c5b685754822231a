import { Job, Queue, Worker } from 'bullmq';
import { readWorkerConfig } from './config';
import { DispatchCycleJob, createDispatchCycleProcessor } from './dispatch-cycle';
import { DispatchTrigger } from './dispatch-trigger';
import { WorkerMetrics } from './infra/metrics';

const schedulerId = 'daily-dispatch';

async function start(): Promise<void> {
  const config = readWorkerConfig();
  const metrics = new WorkerMetrics();
  const metricsServer = metrics.startServer(config.metricsPort);
  const trigger = new DispatchTrigger(config.apiBaseUrl, config.requestTimeoutMs);
  const processCycle = createDispatchCycleProcessor(trigger, metrics);

  const queue = new Queue<DispatchCycleJob>(config.queueName, { connection: config.redis });
  await queue.upsertJobScheduler(
    schedulerId,
    { pattern: config.cronPattern, tz: config.timeZone },
    {
      name: 'dispatch.cycle',
      data: {},
      opts: {
        attempts: config.maxAttempts,
        backoff: { type: 'exponential', delay: config.retryDelayMs },
        removeOnComplete: 100,
        removeOnFail: 500
      }
    }
  );

  // one cycle at a time; the API guards overlapping runs anyway
  const worker = new Worker<DispatchCycleJob>(
    config.queueName,
    async (job: Job<DispatchCycleJob>) => processCycle(job.data),
    { connection: config.redis, concurrency: 1 }
  );

  worker.on('failed', (job, err) => {
    if (!job) {
      return;
    }
    if ((job.attemptsMade ?? 0) >= (job.opts.attempts ?? 1)) {
      console.log(`[worker] dispatch job ${job.id ?? 'unknown'} gave up after ${job.attemptsMade} attempts: ${err.message}`);
    }
  });

  console.log(
    `[worker] scheduled ${config.queueName} with "${config.cronPattern}" (${config.timeZone}); metrics on :${config.metricsPort}`
  );

  const shutdown = async (): Promise<void> => {
    await Promise.all([worker.close(), queue.close()]);
    metricsServer.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

start().catch((error: unknown) => {
  console.error('[worker] failed to start', error);
  process.exit(1);
});
