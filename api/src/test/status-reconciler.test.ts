import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { decideTransition } from '../modules/reconciler/status-transition';
import { createEngine, draftCampaign } from './support/in-memory-store';

const at = (iso: string) => new Date(iso);

describe('decideTransition', () => {
  it('moves forward only', () => {
    assert.deepEqual(decideTransition('sent', 'delivered'), { action: 'apply', next: 'delivered' });
    assert.deepEqual(decideTransition('sent', 'read'), { action: 'apply', next: 'read' });
    assert.deepEqual(decideTransition('sent', 'failed'), { action: 'apply', next: 'failed' });
    assert.deepEqual(decideTransition('delivered', 'read'), { action: 'apply', next: 'read' });
    assert.deepEqual(decideTransition('pending', 'failed'), { action: 'apply', next: 'failed' });
  });

  it('ignores duplicates and anything after a terminal state', () => {
    assert.deepEqual(decideTransition('delivered', 'delivered'), { action: 'ignore', reason: 'duplicate' });
    assert.deepEqual(decideTransition('read', 'delivered'), { action: 'ignore', reason: 'stale' });
    assert.deepEqual(decideTransition('delivered', 'failed'), { action: 'ignore', reason: 'stale' });
    assert.deepEqual(decideTransition('failed', 'read'), { action: 'ignore', reason: 'stale' });
    assert.deepEqual(decideTransition('read', 'read'), { action: 'ignore', reason: 'duplicate' });
  });

  it('holds receipts that arrive before the send is recorded', () => {
    assert.deepEqual(decideTransition('pending', 'delivered'), { action: 'hold' });
    assert.deepEqual(decideTransition('pending', 'read'), { action: 'hold' });
  });
});

describe('StatusReconcilerService', () => {
  async function sentCampaign(phoneCount = 1) {
    const phones = Array.from({ length: phoneCount }, (_, index) => `+551190000000${index}`);
    const engine = createEngine({ phones });
    const campaign = await draftCampaign(engine);
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });
    await engine.dispatcher.processDay('2025-06-01');
    return { engine, campaign };
  }

  it('applies delivered then read and records both timestamps', async () => {
    const { engine, campaign } = await sentCampaign();

    const summary = await engine.reconciler.applyEvents([
      { providerMessageId: 'wamid.1', eventType: 'delivered', timestamp: at('2025-06-01T10:00:00Z') },
      { providerMessageId: 'wamid.1', eventType: 'read', timestamp: at('2025-06-01T11:00:00Z') }
    ]);

    assert.deepEqual(summary, { applied: 2, held: 0, ignored: 0 });
    const [row] = engine.recipients.all(campaign.id);
    assert.equal(row?.status, 'read');
    assert.equal(row?.deliveredAt, '2025-06-01T10:00:00.000Z');
    assert.equal(row?.readAt, '2025-06-01T11:00:00.000Z');
  });

  it('never regresses when events arrive out of order', async () => {
    const { engine, campaign } = await sentCampaign();

    await engine.reconciler.applyEvent({
      providerMessageId: 'wamid.1',
      eventType: 'read',
      timestamp: at('2025-06-01T11:00:00Z')
    });
    const late = await engine.reconciler.applyEvent({
      providerMessageId: 'wamid.1',
      eventType: 'delivered',
      timestamp: at('2025-06-01T10:00:00Z')
    });
    const failed = await engine.reconciler.applyEvent({
      providerMessageId: 'wamid.1',
      eventType: 'failed',
      timestamp: at('2025-06-01T12:00:00Z'),
      failureReason: '131047: re-engagement'
    });

    assert.equal(late, 'ignored');
    assert.equal(failed, 'ignored');
    const [row] = engine.recipients.all(campaign.id);
    assert.equal(row?.status, 'read');
    // a read receipt implies delivery
    assert.equal(row?.deliveredAt, '2025-06-01T11:00:00.000Z');
    assert.equal(row?.failureReason, null);
  });

  it('records the provider failure reason', async () => {
    const { engine, campaign } = await sentCampaign();

    await engine.reconciler.applyEvent({
      providerMessageId: 'wamid.1',
      eventType: 'failed',
      timestamp: at('2025-06-01T10:00:00Z'),
      failureReason: '131026: Message undeliverable'
    });

    const [row] = engine.recipients.all(campaign.id);
    assert.equal(row?.status, 'failed');
    assert.equal(row?.failedAt, '2025-06-01T10:00:00.000Z');
    assert.equal(row?.failureReason, '131026: Message undeliverable');
  });

  it('holds an early delivered receipt and applies it once the send is recorded', async () => {
    const engine = createEngine({ phones: ['+5511900000001'] });
    const campaign = await draftCampaign(engine);
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });

    const early = await engine.reconciler.applyEvent({
      providerMessageId: 'wamid.1',
      eventType: 'delivered',
      timestamp: at('2025-06-01T09:00:05Z')
    });
    assert.equal(early, 'held');
    assert.equal(engine.heldEvents.count(), 1);

    await engine.dispatcher.processDay('2025-06-01');

    const [row] = engine.recipients.all(campaign.id);
    assert.equal(row?.status, 'delivered');
    assert.equal(row?.deliveredAt, '2025-06-01T09:00:05.000Z');
    assert.equal(engine.heldEvents.count(), 0);

    const stored = await engine.campaigns.getOrThrow(campaign.id);
    assert.equal(stored.status, 'completed');
  });

  it('drops held events nobody claimed once they expire', async () => {
    const { engine } = await sentCampaign();

    await engine.reconciler.applyEvent({
      providerMessageId: 'wamid.unknown',
      eventType: 'delivered',
      timestamp: at('2025-05-31T12:00:00Z')
    });
    engine.clock.advanceHours(71);
    assert.equal((await engine.dispatcher.processDay('2025-06-03')).heldEventsExpired, 0);

    engine.clock.advanceHours(2);
    assert.equal((await engine.dispatcher.processDay('2025-06-04')).heldEventsExpired, 1);
    assert.equal(engine.heldEvents.count(), 0);
  });

  it('completes the campaign when the last recipient reaches a terminal state', async () => {
    const { engine, campaign } = await sentCampaign(2);

    await engine.reconciler.applyEvent({
      providerMessageId: 'wamid.1',
      eventType: 'delivered',
      timestamp: at('2025-06-01T10:00:00Z')
    });
    assert.equal((await engine.campaigns.getOrThrow(campaign.id)).status, 'active');

    await engine.reconciler.applyEvent({
      providerMessageId: 'wamid.2',
      eventType: 'failed',
      timestamp: at('2025-06-01T10:00:00Z')
    });
    const completed = await engine.campaigns.getOrThrow(campaign.id);
    assert.equal(completed.status, 'completed');
    assert.equal(completed.completedAt, '2025-05-31T12:00:00.000Z');
  });

  it('replays an event held while its send was being recorded', async () => {
    const engine = createEngine({ phones: ['+5511900000001'] });
    const campaign = await draftCampaign(engine);
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });
    const find = engine.recipients.findByProviderMessageId.bind(engine.recipients);
    let interleaved = false;
    engine.recipients.findByProviderMessageId = async (providerMessageId) => {
      const found = await find(providerMessageId);
      if (!interleaved) {
        interleaved = true;
        // the send lands between the miss and the hold
        await engine.dispatcher.processDay('2025-06-01');
      }
      return found;
    };

    const outcome = await engine.reconciler.applyEvent({
      providerMessageId: 'wamid.1',
      eventType: 'delivered',
      timestamp: at('2025-06-01T09:00:05Z')
    });

    assert.equal(outcome, 'applied');
    assert.equal(engine.recipients.all(campaign.id)[0]?.status, 'delivered');
    assert.equal(engine.heldEvents.count(), 0);
    assert.equal((await engine.campaigns.getOrThrow(campaign.id)).status, 'completed');
  });

  it('keeps held events when applying them fails and replays them next cycle', async () => {
    const engine = createEngine({ phones: ['+5511900000001'] });
    const campaign = await draftCampaign(engine);
    await engine.campaigns.activate(campaign.id, { startDate: '2025-06-01' });
    await engine.reconciler.applyEvent({
      providerMessageId: 'wamid.1',
      eventType: 'delivered',
      timestamp: at('2025-06-01T09:00:05Z')
    });
    const apply = engine.recipients.applyTransition.bind(engine.recipients);
    let broken = true;
    engine.recipients.applyTransition = async (recipientId, change) => {
      if (broken) {
        broken = false;
        throw new Error('connection reset');
      }
      return apply(recipientId, change);
    };

    await engine.dispatcher.processDay('2025-06-01');
    assert.equal(engine.recipients.all(campaign.id)[0]?.status, 'sent');
    assert.equal(engine.heldEvents.count(), 1);

    await engine.dispatcher.processDay('2025-06-02');
    const [row] = engine.recipients.all(campaign.id);
    assert.equal(row?.status, 'delivered');
    assert.equal(row?.deliveredAt, '2025-06-01T09:00:05.000Z');
    assert.equal(engine.heldEvents.count(), 0);
    assert.equal((await engine.campaigns.getOrThrow(campaign.id)).status, 'completed');
  });

  it('decides again after losing a race', async () => {
    const { engine, campaign } = await sentCampaign();
    const apply = engine.recipients.applyTransition.bind(engine.recipients);
    let raced = false;
    engine.recipients.applyTransition = async (recipientId, change) => {
      if (!raced) {
        raced = true;
        await apply(recipientId, { from: 'sent', to: 'read', at: at('2025-06-01T10:30:00Z') });
        return false;
      }
      return apply(recipientId, change);
    };

    const outcome = await engine.reconciler.applyEvent({
      providerMessageId: 'wamid.1',
      eventType: 'delivered',
      timestamp: at('2025-06-01T10:00:00Z')
    });

    assert.equal(outcome, 'ignored');
    assert.equal(engine.recipients.all(campaign.id)[0]?.status, 'read');
  });
});
