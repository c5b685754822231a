import { DispatchSummary, DispatchTrigger } from './dispatch-trigger';
import { WorkerMetrics } from './infra/metrics';

/** Empty for the scheduled daily run; `date` replays a specific day. */
export type DispatchCycleJob = {
  date?: string;
};

type Log = (line: string) => void;

/**
 * Runs one dispatch cycle through the API. Failures are counted and rethrown
 * so the queue retries the job with backoff.
 */
export function createDispatchCycleProcessor(
  trigger: DispatchTrigger,
  metrics: WorkerMetrics,
  log: Log = (line) => console.log(line),
  now: () => Date = () => new Date()
): (job: DispatchCycleJob) => Promise<DispatchSummary> {
  return async (job) => {
    try {
      const summary = await trigger.run(job.date);
      metrics.recordCycle(summary, now());
      log(
        `[worker] dispatch cycle ${summary.date}: campaigns=${summary.campaignsProcessed} sent=${summary.messagesSent} failed=${summary.messagesFailed} deferred=${summary.messagesDeferred} expired=${summary.heldEventsExpired}`
      );
      return summary;
    } catch (error) {
      metrics.incCycleFailed();
      const detail = error instanceof Error ? error.message : String(error);
      log(`[worker] dispatch cycle failed: ${detail}`);
      throw error;
    }
  };
}
