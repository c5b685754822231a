import { Injectable } from '@nestjs/common';
import { DispatchSummary } from '../../modules/dispatch/dispatch.types';
import { ReconcileSummary } from '../../modules/reconciler/status-reconciler.service';

type RouteMetric = {
  count: number;
  errors: number;
  totalDurationMs: number;
};

type DispatchTotals = {
  cycles: number;
  sent: number;
  failed: number;
  deferred: number;
  heldExpired: number;
};

export type MetricsSnapshot = {
  uptimeSeconds: number;
  totals: { requests: number; errors: number };
  routes: Array<{ route: string; count: number; errors: number; avgDurationMs: number }>;
  dispatch: DispatchTotals & { lastCycleDate: string | null };
  statusEvents: ReconcileSummary;
};

const LATENCY_BUCKETS_MS = [50, 100, 200, 500, 1000, 2000, 5000];

@Injectable()
export class MetricsService {
  private readonly startedAt = Date.now();
  private readonly routes = new Map<string, RouteMetric>();
  private readonly latencyBucketCounts = LATENCY_BUCKETS_MS.map(() => 0);
  private latencyCount = 0;
  private latencySumMs = 0;
  private readonly dispatch: DispatchTotals = { cycles: 0, sent: 0, failed: 0, deferred: 0, heldExpired: 0 };
  private lastCycleDate: string | null = null;
  private readonly statusEvents: ReconcileSummary = { applied: 0, held: 0, ignored: 0 };

  record(route: string, method: string, statusCode: number, durationMs: number): void {
    const key = `${method} ${route}`;
    const current = this.routes.get(key) ?? { count: 0, errors: 0, totalDurationMs: 0 };

    current.count += 1;
    current.totalDurationMs += durationMs;
    if (statusCode >= 500) {
      current.errors += 1;
    }

    this.latencyCount += 1;
    this.latencySumMs += durationMs;
    LATENCY_BUCKETS_MS.forEach((bound, index) => {
      if (durationMs <= bound) {
        this.latencyBucketCounts[index] += 1;
      }
    });

    this.routes.set(key, current);
  }

  recordDispatch(summary: DispatchSummary): void {
    this.dispatch.cycles += 1;
    this.dispatch.sent += summary.messagesSent;
    this.dispatch.failed += summary.messagesFailed;
    this.dispatch.deferred += summary.messagesDeferred;
    this.dispatch.heldExpired += summary.heldEventsExpired;
    this.lastCycleDate = summary.date;
  }

  recordStatusEvents(summary: ReconcileSummary): void {
    this.statusEvents.applied += summary.applied;
    this.statusEvents.held += summary.held;
    this.statusEvents.ignored += summary.ignored;
  }

  snapshot(): MetricsSnapshot {
    const routeEntries = [...this.routes.entries()].map(([route, value]) => ({
      route,
      count: value.count,
      errors: value.errors,
      avgDurationMs: value.count > 0 ? Number((value.totalDurationMs / value.count).toFixed(2)) : 0
    }));

    const totals = routeEntries.reduce(
      (acc, item) => {
        acc.requests += item.count;
        acc.errors += item.errors;
        return acc;
      },
      { requests: 0, errors: 0 }
    );

    return {
      uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
      totals,
      routes: routeEntries,
      dispatch: { ...this.dispatch, lastCycleDate: this.lastCycleDate },
      statusEvents: { ...this.statusEvents }
    };
  }

  toPrometheus(): string {
    const lines: string[] = [];
    const snapshot = this.snapshot();

    const counter = (name: string, help: string, value: number): void => {
      lines.push(`# HELP ${name} ${help}`);
      lines.push(`# TYPE ${name} counter`);
      lines.push(`${name} ${value}`);
    };

    lines.push('# HELP dispatch_api_uptime_seconds Uptime in seconds');
    lines.push('# TYPE dispatch_api_uptime_seconds gauge');
    lines.push(`dispatch_api_uptime_seconds ${snapshot.uptimeSeconds}`);

    counter('dispatch_api_requests_total', 'Total HTTP requests', snapshot.totals.requests);
    counter('dispatch_api_errors_total', 'Total HTTP 5xx responses', snapshot.totals.errors);

    lines.push('# HELP dispatch_api_route_requests_total Total requests by route');
    lines.push('# TYPE dispatch_api_route_requests_total counter');
    for (const route of snapshot.routes) {
      const escaped = route.route.replace(/"/g, '\\"');
      lines.push(`dispatch_api_route_requests_total{route="${escaped}"} ${route.count}`);
    }

    lines.push('# HELP dispatch_api_request_duration_ms HTTP request latency histogram in milliseconds');
    lines.push('# TYPE dispatch_api_request_duration_ms histogram');
    LATENCY_BUCKETS_MS.forEach((bound, index) => {
      lines.push(`dispatch_api_request_duration_ms_bucket{le="${bound}"} ${this.latencyBucketCounts[index]}`);
    });
    lines.push(`dispatch_api_request_duration_ms_bucket{le="+Inf"} ${this.latencyCount}`);
    lines.push(`dispatch_api_request_duration_ms_sum ${this.latencySumMs}`);
    lines.push(`dispatch_api_request_duration_ms_count ${this.latencyCount}`);

    counter('dispatch_cycles_total', 'Completed dispatch cycles', snapshot.dispatch.cycles);
    counter('dispatch_messages_sent_total', 'Messages accepted by the provider', snapshot.dispatch.sent);
    counter('dispatch_messages_failed_total', 'Recipients marked permanently failed', snapshot.dispatch.failed);
    counter('dispatch_messages_deferred_total', 'Recipients deferred by the daily quota', snapshot.dispatch.deferred);
    counter('dispatch_held_events_expired_total', 'Held status events dropped unmatched', snapshot.dispatch.heldExpired);

    lines.push('# HELP dispatch_status_events_total Provider status events by outcome');
    lines.push('# TYPE dispatch_status_events_total counter');
    for (const [outcome, count] of Object.entries(snapshot.statusEvents)) {
      lines.push(`dispatch_status_events_total{outcome="${outcome}"} ${count}`);
    }

    return lines.join('\n');
  }
}
