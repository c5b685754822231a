export type RecipientStatus = 'pending' | 'sent' | 'delivered' | 'read' | 'failed';

export const RECIPIENT_STATUSES = ['pending', 'sent', 'delivered', 'read', 'failed'] as const;

export function isTerminalRecipientStatus(status: RecipientStatus): boolean {
  return status === 'delivered' || status === 'read' || status === 'failed';
}

export type Recipient = {
  id: string;
  campaignId: string;
  phone: string;
  position: number;
  scheduledDate: string;
  status: RecipientStatus;
  sentAt: string | null;
  sentDate: string | null;
  deliveredAt: string | null;
  readAt: string | null;
  failedAt: string | null;
  failureReason: string | null;
  providerMessageId: string | null;
  retryCount: number;
  /** Earliest instant a failed attempt may be retried; null when nothing is pending a backoff. */
  nextAttemptAt: string | null;
  createdAt: string;
};

export type NewRecipient = {
  phone: string;
  position: number;
  scheduledDate: string;
};

/**
 * Per-campaign counts. The status fields count recipients by their current status;
 * `everSent` and `everDelivered` count recipients that reached those states at any point.
 */
export type RecipientTally = Record<RecipientStatus, number> & {
  total: number;
  everSent: number;
  everDelivered: number;
};

export function emptyTally(): RecipientTally {
  return { total: 0, pending: 0, sent: 0, delivered: 0, read: 0, failed: 0, everSent: 0, everDelivered: 0 };
}
