import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import { describe, it } from 'node:test';
import { MetricsController } from '../modules/metrics/metrics.controller';
import { LogLine, StructuredLoggerService } from '../shared/logging/structured-logger.service';
import { MetricsService } from '../shared/observability/metrics.service';
import { accessLogLevel, RequestLoggingMiddleware } from '../shared/observability/request-logging.middleware';
import { createEngine, draftCampaign, phones } from './support/in-memory-store';

class FakeResponse extends EventEmitter {
  statusCode = 200;
  readonly headers = new Map<string, string>();

  setHeader(name: string, value: string): this {
    this.headers.set(name, value);
    return this;
  }
}

function serve(request: Record<string, unknown>, statusCode: number) {
  const lines: LogLine[] = [];
  const logger = new StructuredLoggerService((line) => lines.push(line));
  logger.setLogLevels(['error', 'warn', 'log']);
  const metrics = new MetricsService();
  const middleware = new RequestLoggingMiddleware(metrics, logger);
  const res = new FakeResponse();
  let nextCalled = false;

  middleware.use({ headers: {}, method: 'GET', baseUrl: '', params: {}, ...request } as never, res as never, () => {
    nextCalled = true;
  });
  res.statusCode = statusCode;
  res.emit('finish');

  return { lines, metrics, res, nextCalled };
}

describe('accessLogLevel', () => {
  it('quiets successful health and metrics calls but not their failures', () => {
    assert.equal(accessLogLevel('/v1/health', 200), 'debug');
    assert.equal(accessLogLevel('/v1/metrics/dispatch', 200), 'debug');
    assert.equal(accessLogLevel('/v1/health', 503), 'error');
    assert.equal(accessLogLevel('/v1/campaigns', 201), 'log');
    assert.equal(accessLogLevel('/v1/campaigns/c-1/activate', 409), 'warn');
  });
});

describe('RequestLoggingMiddleware', () => {
  it('logs the matched route with the campaign id and echoes the request id', () => {
    const { lines, metrics, res, nextCalled } = serve(
      {
        headers: { 'x-request-id': 'req-1' },
        originalUrl: '/v1/campaigns/c-1/stats?fresh=1',
        route: { path: '/v1/campaigns/:campaignId/stats' },
        params: { campaignId: 'c-1' }
      },
      200
    );

    assert.equal(nextCalled, true);
    assert.equal(res.headers.get('x-request-id'), 'req-1');
    assert.equal(lines.length, 1);
    const [line] = lines;
    assert.equal(line?.level, 'log');
    assert.equal(line?.context, 'RequestLoggingMiddleware');
    assert.equal(line?.type, 'http_access');
    assert.equal(line?.route, '/v1/campaigns/:campaignId/stats');
    assert.equal(line?.campaignId, 'c-1');
    assert.equal(line?.statusCode, 200);
    assert.equal(line?.requestId, 'req-1');
    assert.equal(metrics.snapshot().routes[0]?.route, 'GET /v1/campaigns/:campaignId/stats');
  });

  it('counts health checks without logging them', () => {
    const { lines, metrics } = serve({ originalUrl: '/v1/health' }, 200);

    assert.equal(lines.length, 0);
    assert.equal(metrics.snapshot().totals.requests, 1);
  });

  it('logs unmatched paths without their query and assigns a request id', () => {
    const { lines, res } = serve({ originalUrl: '/v1/nowhere?token=test-secret' }, 404);

    const [line] = lines;
    assert.equal(line?.level, 'warn');
    assert.equal(line?.route, '/v1/nowhere');
    assert.equal(line?.campaignId, undefined);
    assert.match(String(line?.requestId), /^[0-9a-f-]{36}$/);
    assert.equal(res.headers.get('x-request-id'), line?.requestId);
  });
});

describe('MetricsController', () => {
  it('reports whether the cycle for today has run and the quota it used', async () => {
    const engine = createEngine({ phones: phones(3) });
    const controller = new MetricsController(engine.metrics, engine.campaigns, engine.quota);

    const before = await controller.dispatch();
    assert.equal(before.today, '2025-05-31');
    assert.equal(before.cycleBehind, true);
    assert.equal(before.lastCycleDate, null);

    const campaign = await draftCampaign(engine);
    await engine.campaigns.activate(campaign.id, { startDate: '2025-05-31' });
    await engine.dispatcher.processDay();

    const after = await controller.dispatch();
    assert.deepEqual(after, {
      today: '2025-05-31',
      quota: { date: '2025-05-31', used: 3, cap: 250, remaining: 247 },
      lastCycleDate: '2025-05-31',
      cycleBehind: false,
      totals: { cycles: 1, sent: 3, failed: 0, deferred: 0, heldExpired: 0, lastCycleDate: '2025-05-31' },
      statusEvents: { applied: 0, held: 0, ignored: 0 }
    });
  });
});
