import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { GatewaySendError } from '../shared/errors/dispatch-errors';
import { createEngine, draftCampaign, phones } from './support/in-memory-store';

describe('DispatcherService', () => {
  it('serves the higher priority campaign first and never passes the global cap', async () => {
    const engine = createEngine();
    engine.audience.replace(phones(100, '+55219'));
    const second = await draftCampaign(engine, { name: 'Second', priority: 2 });
    await engine.campaigns.activate(second.id, { startDate: '2025-06-01' });
    engine.audience.replace(phones(200, '+55119'));
    const first = await draftCampaign(engine, { name: 'First', priority: 1 });
    await engine.campaigns.activate(first.id, { startDate: '2025-06-01' });

    const day1 = await engine.dispatcher.processDay('2025-06-01');

    assert.deepEqual(day1, {
      date: '2025-06-01',
      campaignsProcessed: 2,
      messagesSent: 250,
      messagesFailed: 0,
      messagesDeferred: 50,
      heldEventsExpired: 0
    });
    assert.equal(await engine.recipients.countSentOn(first.id, '2025-06-01'), 200);
    assert.equal(await engine.recipients.countSentOn(second.id, '2025-06-01'), 50);
    assert.deepEqual(await engine.quota.usage('2025-06-01'), {
      date: '2025-06-01',
      used: 250,
      cap: 250,
      remaining: 0
    });

    const deferred = engine.recipients.all(second.id).filter((row) => row.status === 'pending');
    assert.equal(deferred.length, 50);
    assert.ok(deferred.every((row) => row.scheduledDate === '2025-06-01'));

    const day2 = await engine.dispatcher.processDay('2025-06-02');
    assert.equal(day2.messagesSent, 50);
    assert.equal(day2.messagesDeferred, 0);
    assert.equal(await engine.recipients.countSentOn(second.id, '2025-06-02'), 50);
  });

  it('sends each campaign no more than its own daily limit', async () => {
    const engine = createEngine({ phones: phones(5) });
    const campaign = await draftCampaign(engine, { dailySendLimit: 2 });
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });

    const first = await engine.dispatcher.processDay('2025-06-01');
    const repeat = await engine.dispatcher.processDay('2025-06-01');

    assert.equal(first.messagesSent, 2);
    assert.equal(repeat.messagesSent, 0);
    assert.equal(engine.gateway.sent.length, 2);
  });

  it('catches up on days the cycle did not run without rewriting scheduled dates', async () => {
    const engine = createEngine({ phones: phones(4) });
    const campaign = await draftCampaign(engine, { dailySendLimit: 2 });
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });

    const summary = await engine.dispatcher.processDay('2025-06-05');

    assert.equal(summary.messagesSent, 2);
    const sent = engine.recipients.all(campaign.id).filter((row) => row.status === 'sent');
    assert.deepEqual(
      sent.map((row) => [row.position, row.scheduledDate, row.sentDate]),
      [
        [0, '2025-06-01', '2025-06-05'],
        [1, '2025-06-01', '2025-06-05']
      ]
    );
  });

  it('sends the template, language and parameters of the campaign', async () => {
    const engine = createEngine({ phones: ['+5511900000001'] });
    const campaign = await draftCampaign(engine, { templateParameters: ['Ana', '20%'] });
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });

    await engine.dispatcher.processDay('2025-06-01');

    assert.deepEqual(engine.gateway.sent, [
      { phone: '+5511900000001', templateName: 'june_promo', languageCode: 'pt_BR', parameters: ['Ana', '20%'] }
    ]);
    const [row] = engine.recipients.all(campaign.id);
    assert.equal(row?.status, 'sent');
    assert.equal(row?.providerMessageId, 'wamid.1');
    assert.equal(row?.sentAt, '2025-05-31T12:00:00.000Z');
  });

  it('retries a transient failure after its backoff and does not refund the slot', async () => {
    const engine = createEngine({ phones: ['+5511900000001'] });
    const campaign = await draftCampaign(engine);
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });
    engine.gateway.failNext('+5511900000001', new GatewaySendError('transient_network', 'timeout'));

    const first = await engine.dispatcher.processDay('2025-06-01');

    assert.equal(first.messagesSent, 0);
    assert.equal(first.messagesFailed, 0);
    const [waiting] = engine.recipients.all(campaign.id);
    assert.equal(waiting?.status, 'pending');
    assert.equal(waiting?.retryCount, 1);
    assert.equal(waiting?.nextAttemptAt, '2025-05-31T12:01:00.000Z');

    const tooSoon = await engine.dispatcher.processDay('2025-06-01');
    assert.equal(tooSoon.messagesSent, 0);

    engine.clock.advanceHours(1);
    const later = await engine.dispatcher.processDay('2025-06-01');

    assert.equal(later.messagesSent, 1);
    const [row] = engine.recipients.all(campaign.id);
    assert.equal(row?.status, 'sent');
    assert.equal(row?.retryCount, 1);
    assert.equal((await engine.quota.usage('2025-06-01')).used, 2);
  });

  it('fails a recipient permanently on an invalid recipient and keeps going', async () => {
    const engine = createEngine({ phones: ['+5511900000001', '+5511900000002'] });
    const campaign = await draftCampaign(engine);
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });
    engine.gateway.failNext('+5511900000001', new GatewaySendError('invalid_recipient', '131026'));

    const summary = await engine.dispatcher.processDay('2025-06-01');

    assert.equal(summary.messagesSent, 1);
    assert.equal(summary.messagesFailed, 1);
    const [failed, sent] = engine.recipients.all(campaign.id);
    assert.equal(failed?.status, 'failed');
    assert.equal(failed?.retryCount, 1);
    assert.equal(failed?.failureReason, 'invalid_recipient: 131026');
    assert.equal(sent?.status, 'sent');

    await engine.dispatcher.processDay('2025-06-02');
    assert.equal(engine.gateway.sent.length, 1);
  });

  it('gives up after the retry limit with a growing backoff', async () => {
    const engine = createEngine({ phones: ['+5511900000001'], config: { maxRetries: 3 } });
    const campaign = await draftCampaign(engine);
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });
    const flaky = () => new GatewaySendError('transient_network');
    engine.gateway.failNext('+5511900000001', flaky(), flaky(), flaky(), flaky());

    await engine.dispatcher.processDay('2025-06-01');
    engine.clock.advanceHours(1);
    await engine.dispatcher.processDay('2025-06-01');
    assert.equal(engine.recipients.all(campaign.id)[0]?.nextAttemptAt, '2025-05-31T13:02:00.000Z');

    engine.clock.advanceHours(1);
    const summary = await engine.dispatcher.processDay('2025-06-01');

    assert.equal(summary.messagesFailed, 1);
    const [row] = engine.recipients.all(campaign.id);
    assert.equal(row?.status, 'failed');
    assert.equal(row?.retryCount, 3);
    assert.equal(row?.failureReason, 'transient_network');
    assert.equal((await engine.quota.usage('2025-06-01')).used, 3);
  });

  it('moves a rate limited recipient to the next day', async () => {
    const engine = createEngine({ phones: ['+5511900000001', '+5511900000002'] });
    const campaign = await draftCampaign(engine);
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });
    engine.gateway.failNext('+5511900000001', new GatewaySendError('rate_limited'));

    const summary = await engine.dispatcher.processDay('2025-06-01');

    assert.equal(summary.messagesSent, 1);
    const [throttled] = engine.recipients.all(campaign.id);
    assert.equal(throttled?.status, 'pending');
    assert.equal(throttled?.retryCount, 1);
    assert.equal(throttled?.scheduledDate, '2025-06-02');
    assert.equal(throttled?.nextAttemptAt, null);

    const nextDay = await engine.dispatcher.processDay('2025-06-02');
    assert.equal(nextDay.messagesSent, 1);
  });

  it('moves a retry to the next day once the quota is spent', async () => {
    const engine = createEngine({ phones: ['+5511900000001'], config: { globalDailyCap: 1 } });
    const campaign = await draftCampaign(engine, { dailySendLimit: 1 });
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });
    engine.gateway.failNext('+5511900000001', new GatewaySendError('transient_network'));

    const summary = await engine.dispatcher.processDay('2025-06-01');

    assert.equal(summary.messagesSent, 0);
    assert.equal(summary.messagesFailed, 0);
    const [row] = engine.recipients.all(campaign.id);
    assert.equal(row?.status, 'pending');
    assert.equal(row?.scheduledDate, '2025-06-02');

    const nextDay = await engine.dispatcher.processDay('2025-06-02');
    assert.equal(nextDay.messagesSent, 1);
  });

  it('skips paused campaigns and continues them on resume with unchanged dates', async () => {
    const engine = createEngine({ phones: phones(4) });
    const campaign = await draftCampaign(engine, { dailySendLimit: 2 });
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });
    await engine.dispatcher.processDay('2025-06-01');
    await engine.campaigns.pause(campaign.id);

    const whilePaused = await engine.dispatcher.processDay('2025-06-02');
    assert.equal(whilePaused.campaignsProcessed, 0);
    assert.equal(whilePaused.messagesSent, 0);

    await engine.campaigns.resume(campaign.id);
    const afterResume = await engine.dispatcher.processDay('2025-06-03');

    assert.equal(afterResume.messagesSent, 2);
    assert.deepEqual(
      engine.recipients.all(campaign.id).map((row) => row.scheduledDate),
      ['2025-06-01', '2025-06-01', '2025-06-02', '2025-06-02']
    );
  });

  it('never sends to a cancelled campaign', async () => {
    const engine = createEngine({ phones: phones(3) });
    const campaign = await draftCampaign(engine);
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });
    await engine.campaigns.cancel(campaign.id);

    const summary = await engine.dispatcher.processDay('2025-06-01');

    assert.equal(summary.messagesSent, 0);
    assert.equal(engine.recipients.all(campaign.id).filter((row) => row.status === 'pending').length, 3);
  });

  it('sends each recipient once when two cycles overlap', async () => {
    const engine = createEngine({ phones: phones(300) });
    const campaign = await draftCampaign(engine);
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });

    const [a, b] = await Promise.all([
      engine.dispatcher.processDay('2025-06-01'),
      engine.dispatcher.processDay('2025-06-01')
    ]);

    assert.equal(a.messagesSent + b.messagesSent, 250);
    assert.equal(engine.gateway.sent.length, 250);
    assert.equal(new Set(engine.gateway.sent.map((message) => message.phone)).size, 250);
    assert.equal((await engine.quota.usage('2025-06-01')).used, 250);
  });

  it('leaves recipients under a live claim to the cycle holding it', async () => {
    const engine = createEngine({ phones: phones(4) });
    const campaign = await draftCampaign(engine, { dailySendLimit: 2 });
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });
    for (const row of engine.recipients.all(campaign.id).slice(0, 2)) {
      await engine.recipients.claim(row.id, {
        token: 'interrupted-run',
        claimedAt: engine.clock.now(),
        staleBefore: new Date(0)
      });
    }

    const summary = await engine.dispatcher.processDay('2025-06-02');

    assert.equal(summary.messagesSent, 2);
    assert.deepEqual(
      engine.recipients.all(campaign.id).map((row) => row.status),
      ['pending', 'pending', 'sent', 'sent']
    );

    engine.clock.advanceHours(1);
    const afterLease = await engine.dispatcher.processDay('2025-06-03');
    assert.equal(afterLease.messagesSent, 2);
  });

  it('fails a recipient who unsubscribed after activation without spending quota', async () => {
    const engine = createEngine({ phones: ['+5511900000001', '+5511900000002'] });
    const campaign = await draftCampaign(engine);
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });
    engine.audience.unsubscribe('+5511900000001');

    const summary = await engine.dispatcher.processDay('2025-06-01');

    assert.equal(summary.messagesSent, 1);
    assert.equal(summary.messagesFailed, 1);
    const [optedOut] = engine.recipients.all(campaign.id);
    assert.equal(optedOut?.status, 'failed');
    assert.equal(optedOut?.failureReason, 'unsubscribed');
    assert.equal(optedOut?.retryCount, 0);
    assert.deepEqual(
      engine.gateway.sent.map((message) => message.phone),
      ['+5511900000002']
    );
    assert.equal((await engine.quota.usage('2025-06-01')).used, 1);
  });

  it('keeps going when one recipient hits an unexpected error', async () => {
    const engine = createEngine({ phones: ['+5511900000001', '+5511900000002'] });
    const campaign = await draftCampaign(engine);
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });
    const claim = engine.recipients.claim.bind(engine.recipients);
    const [broken] = engine.recipients.all(campaign.id);
    engine.recipients.claim = async (recipientId, lease) => {
      if (recipientId === broken?.id) {
        throw new Error('connection reset');
      }
      return claim(recipientId, lease);
    };

    const summary = await engine.dispatcher.processDay('2025-06-01');

    assert.equal(summary.messagesSent, 1);
    assert.deepEqual(
      engine.recipients.all(campaign.id).map((row) => row.status),
      ['pending', 'sent']
    );
  });

  it('records each cycle in the metrics', async () => {
    const engine = createEngine({ phones: phones(3) });
    const campaign = await draftCampaign(engine);
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });

    await engine.dispatcher.processDay('2025-06-01');

    const snapshot = engine.metrics.snapshot();
    assert.equal(snapshot.dispatch.cycles, 1);
    assert.equal(snapshot.dispatch.sent, 3);
    assert.equal(snapshot.dispatch.lastCycleDate, '2025-06-01');
  });

  it('defaults to today in the configured zone', async () => {
    const engine = createEngine({ now: new Date('2025-06-01T01:00:00Z'), config: { timeZone: 'America/Sao_Paulo' } });

    const summary = await engine.dispatcher.processDay();

    assert.equal(summary.date, '2025-05-31');
  });
});
