import { Inject, Injectable } from '@nestjs/common';
import { DISPATCH_CONFIG, DispatchConfig } from '../../shared/config/dispatch.config';
import { ReconciliationMismatchError } from '../../shared/errors/dispatch-errors';
import { StructuredLoggerService } from '../../shared/logging/structured-logger.service';
import { CLOCK, Clock } from '../../shared/time/calendar-date';
import { CampaignsService } from '../campaigns/campaigns.service';
import { isTerminalRecipientStatus } from '../recipients/recipient.model';
import { RECIPIENTS_REPOSITORY, RecipientsRepository } from '../recipients/recipients.repository';
import { HELD_EVENTS_REPOSITORY, HeldEventsRepository } from './held-events.repository';
import { decideTransition, DeliveryEvent } from './status-transition';

export type ReconcileOutcome = 'applied' | 'held' | 'ignored';

export type ReconcileSummary = Record<ReconcileOutcome, number>;

const MAX_CONDITIONAL_ATTEMPTS = 3;

@Injectable()
export class StatusReconcilerService {
  constructor(
    @Inject(RECIPIENTS_REPOSITORY) private readonly recipients: RecipientsRepository,
    @Inject(HELD_EVENTS_REPOSITORY) private readonly heldEvents: HeldEventsRepository,
    @Inject(DISPATCH_CONFIG) private readonly config: DispatchConfig,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly campaigns: CampaignsService,
    private readonly logger: StructuredLoggerService
  ) {}

  async applyEvents(events: readonly DeliveryEvent[]): Promise<ReconcileSummary> {
    const summary: ReconcileSummary = { applied: 0, held: 0, ignored: 0 };

    for (const event of events) {
      const outcome = await this.applyEvent(event);
      summary[outcome] += 1;
    }

    return summary;
  }

  async applyEvent(event: DeliveryEvent): Promise<ReconcileOutcome> {
    for (let attempt = 0; attempt < MAX_CONDITIONAL_ATTEMPTS; attempt += 1) {
      const recipient = await this.recipients.findByProviderMessageId(event.providerMessageId);
      if (!recipient) {
        return this.holdUntilSent(event);
      }

      const decision = decideTransition(recipient.status, event.eventType);

      if (decision.action === 'hold') {
        return this.holdUntilSent(event);
      }

      if (decision.action === 'ignore') {
        this.logger.debug(
          {
            type: 'status_event_ignored',
            providerMessageId: event.providerMessageId,
            eventType: event.eventType,
            current: recipient.status,
            reason: decision.reason
          },
          StatusReconcilerService.name
        );
        return 'ignored';
      }

      const applied = await this.recipients.applyTransition(recipient.id, {
        from: recipient.status,
        to: decision.next,
        at: event.timestamp,
        failureReason: event.failureReason
      });

      if (applied) {
        if (isTerminalRecipientStatus(decision.next)) {
          await this.campaigns.completeIfFinished(recipient.campaignId);
        }
        return 'applied';
      }
      // another writer moved the recipient first; decide again from what it wrote
    }

    this.logger.warn(
      { type: 'status_event_contended', providerMessageId: event.providerMessageId, eventType: event.eventType },
      StatusReconcilerService.name
    );
    return 'ignored';
  }

  /** Applies events that arrived before the send for `providerMessageId` was recorded. */
  async replayHeld(providerMessageId: string): Promise<number> {
    const held = await this.heldEvents.take(providerMessageId);
    let applied = 0;

    for (const [index, event] of held.entries()) {
      let outcome: ReconcileOutcome;
      try {
        outcome = await this.applyEvent(event);
      } catch (error) {
        // events not yet applied go back to storage so a later cycle replays them
        for (const remaining of held.slice(index)) {
          await this.heldEvents.hold(remaining);
        }
        throw error;
      }
      if (outcome === 'applied') {
        applied += 1;
      }
    }

    if (held.length > 0) {
      this.logger.log(
        { type: 'held_events_replayed', providerMessageId, held: held.length, applied },
        StatusReconcilerService.name
      );
    }
    return applied;
  }

  /** Replays held events whose send was recorded after they were held. Failures stay held. */
  async replayRecorded(): Promise<number> {
    const providerMessageIds = await this.heldEvents.findReplayable();
    let applied = 0;

    for (const providerMessageId of providerMessageIds) {
      try {
        applied += await this.replayHeld(providerMessageId);
      } catch (error) {
        this.logger.error(
          {
            type: 'held_event_replay_failed',
            providerMessageId,
            message: error instanceof Error ? error.message : String(error)
          },
          error instanceof Error ? error.stack : undefined,
          StatusReconcilerService.name
        );
      }
    }

    return applied;
  }

  /** Drops held events nobody claimed in time. Each one is a reconciliation mismatch. */
  async expireHeld(): Promise<number> {
    const expired = await this.heldEvents.expire(this.clock.now());

    for (const event of expired) {
      const mismatch = new ReconciliationMismatchError(event.providerMessageId, event.eventType);
      this.logger.warn(
        {
          type: 'held_event_expired',
          code: mismatch.code,
          message: mismatch.message,
          receivedAt: event.receivedAt.toISOString()
        },
        StatusReconcilerService.name
      );
    }

    return expired.length;
  }

  /**
   * Holds the event, then looks again: a send recorded between the first lookup and the
   * insert would already have replayed an empty hold, so the event is replayed here instead.
   */
  private async holdUntilSent(event: DeliveryEvent): Promise<ReconcileOutcome> {
    await this.hold(event);

    const recorded = await this.recipients.findByProviderMessageId(event.providerMessageId);
    if (!recorded || recorded.status === 'pending') {
      return 'held';
    }

    const applied = await this.replayHeld(event.providerMessageId);
    return applied > 0 ? 'applied' : 'ignored';
  }

  private async hold(event: DeliveryEvent): Promise<void> {
    const receivedAt = this.clock.now();
    await this.heldEvents.hold({
      ...event,
      receivedAt,
      expiresAt: new Date(receivedAt.getTime() + this.config.heldEventTtlHours * 3_600_000)
    });

    this.logger.log(
      { type: 'status_event_held', providerMessageId: event.providerMessageId, eventType: event.eventType },
      StatusReconcilerService.name
    );
  }
}
