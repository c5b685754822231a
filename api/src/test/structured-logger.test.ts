import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { LogLine, StructuredLoggerService } from '../shared/logging/structured-logger.service';

function capture(): { logger: StructuredLoggerService; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = new StructuredLoggerService((line) => lines.push(line));
  logger.setLogLevels(StructuredLoggerService.levelsUpTo('log'));
  return { logger, lines };
}

describe('StructuredLoggerService', () => {
  it('spreads structured events into the line', () => {
    const { logger, lines } = capture();

    logger.log({ type: 'dispatch_cycle_completed', messagesSent: 3 }, 'DispatcherService');

    assert.equal(lines.length, 1);
    assert.equal(lines[0]?.type, 'dispatch_cycle_completed');
    assert.equal(lines[0]?.messagesSent, 3);
    assert.equal(lines[0]?.level, 'log');
    assert.equal(lines[0]?.context, 'DispatcherService');
    assert.equal(lines[0]?.service, 'campaign-dispatch-api');
  });

  it('keeps its own fields over event fields of the same name', () => {
    const { logger, lines } = capture();

    logger.warn({ type: 'odd', level: 'debug' }, 'Test');

    assert.equal(lines[0]?.level, 'warn');
  });

  it('wraps plain messages and attaches the trace', () => {
    const { logger, lines } = capture();

    logger.error('gateway down', 'stack here', 'DispatcherService');

    assert.equal(lines[0]?.message, 'gateway down');
    assert.equal(lines[0]?.trace, 'stack here');
  });

  it('drops levels below the threshold', () => {
    const { logger, lines } = capture();

    logger.debug('noise');
    logger.verbose('more noise');

    assert.equal(lines.length, 0);
    assert.deepEqual(StructuredLoggerService.levelsUpTo('warn'), ['fatal', 'error', 'warn']);
    assert.deepEqual(StructuredLoggerService.levelsUpTo('nonsense'), ['fatal', 'error', 'warn', 'log']);
  });
});
