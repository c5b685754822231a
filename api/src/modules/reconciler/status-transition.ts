import { RecipientStatus } from '../recipients/recipient.model';

export type DeliveryEventType = 'delivered' | 'read' | 'failed';

export const DELIVERY_EVENT_TYPES = ['delivered', 'read', 'failed'] as const;

export type DeliveryEvent = {
  providerMessageId: string;
  eventType: DeliveryEventType;
  timestamp: Date;
  failureReason?: string;
};

export type TransitionDecision =
  | { action: 'apply'; next: RecipientStatus }
  | { action: 'hold' }
  | { action: 'ignore'; reason: 'duplicate' | 'stale' };

const FORWARD: Record<RecipientStatus, readonly DeliveryEventType[]> = {
  pending: ['failed'],
  sent: ['delivered', 'read', 'failed'],
  delivered: ['read'],
  read: [],
  failed: []
};

/**
 * Next status for a recipient currently in `current` receiving `eventType`. Only forward
 * moves are applied; a delivery receipt that arrives before the send was recorded is held.
 */
export function decideTransition(current: RecipientStatus, eventType: DeliveryEventType): TransitionDecision {
  if (FORWARD[current].includes(eventType)) {
    return { action: 'apply', next: eventType };
  }

  if (current === 'pending') {
    return { action: 'hold' };
  }

  return { action: 'ignore', reason: current === eventType ? 'duplicate' : 'stale' };
}
