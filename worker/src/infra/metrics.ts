import http from 'node:http';
import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';
import { DispatchSummary } from '../dispatch-trigger';

type WorkerCounters = {
  cyclesCompleted: Counter;
  cyclesFailed: Counter;
  messages: Counter<'outcome'>;
  heldEventsExpired: Counter;
};

export class WorkerMetrics {
  private readonly registry = new Registry();
  private readonly counters: WorkerCounters;
  private readonly lastCycle: Gauge;

  constructor(options: { collectDefaults?: boolean } = {}) {
    if (options.collectDefaults ?? true) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.counters = {
      cyclesCompleted: new Counter({
        name: 'worker_dispatch_cycles_completed_total',
        help: 'Dispatch cycles the API completed',
        registers: [this.registry]
      }),
      cyclesFailed: new Counter({
        name: 'worker_dispatch_cycles_failed_total',
        help: 'Dispatch cycle attempts that failed',
        registers: [this.registry]
      }),
      messages: new Counter({
        name: 'worker_dispatch_messages_total',
        help: 'Recipients handled by dispatch cycles by outcome',
        labelNames: ['outcome'],
        registers: [this.registry]
      }),
      heldEventsExpired: new Counter({
        name: 'worker_dispatch_held_events_expired_total',
        help: 'Held status events dropped without a matching send',
        registers: [this.registry]
      })
    };

    this.lastCycle = new Gauge({
      name: 'worker_dispatch_last_cycle_timestamp_seconds',
      help: 'Unix time of the last completed dispatch cycle',
      registers: [this.registry]
    });
  }

  startServer(port: number): http.Server {
    const server = http.createServer(async (req, res) => {
      if (req.url !== '/metrics') {
        res.statusCode = 404;
        res.end('not found');
        return;
      }

      const metrics = await this.registry.metrics();
      res.statusCode = 200;
      res.setHeader('Content-Type', this.registry.contentType);
      res.end(metrics);
    });

    server.listen(port);
    return server;
  }

  recordCycle(summary: DispatchSummary, at: Date = new Date()): void {
    this.counters.cyclesCompleted.inc();
    this.counters.messages.inc({ outcome: 'sent' }, summary.messagesSent);
    this.counters.messages.inc({ outcome: 'failed' }, summary.messagesFailed);
    this.counters.messages.inc({ outcome: 'deferred' }, summary.messagesDeferred);
    this.counters.heldEventsExpired.inc(summary.heldEventsExpired);
    this.lastCycle.set(Math.floor(at.getTime() / 1000));
  }

  incCycleFailed(): void {
    this.counters.cyclesFailed.inc();
  }

  render(): Promise<string> {
    return this.registry.metrics();
  }
}
