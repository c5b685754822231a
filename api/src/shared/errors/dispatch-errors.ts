export type DispatchErrorCode =
  | 'validation_failed'
  | 'campaign_not_found'
  | 'lifecycle_violation'
  | 'quota_exceeded'
  | 'gateway_send_failed'
  | 'reconciliation_mismatch';

/**
 * Base class for every error the engine surfaces. `retryable` tells an operator whether
 * repeating the same request later can succeed without intervention.
 */
export class DispatchError extends Error {
  constructor(
    message: string,
    readonly code: DispatchErrorCode,
    readonly retryable: boolean
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends DispatchError {
  constructor(readonly issues: string[]) {
    super(`Invalid input: ${issues.join('; ')}`, 'validation_failed', false);
  }
}

export class CampaignNotFoundError extends DispatchError {
  constructor(readonly campaignId: string) {
    super(`Campaign ${campaignId} not found`, 'campaign_not_found', false);
  }
}

export class LifecycleViolationError extends DispatchError {
  constructor(
    readonly campaignId: string,
    readonly currentStatus: string,
    readonly action: string
  ) {
    super(`Cannot ${action} campaign ${campaignId} while it is ${currentStatus}`, 'lifecycle_violation', false);
  }
}

export class QuotaExceededError extends DispatchError {
  constructor(
    readonly date: string,
    readonly cap: number
  ) {
    super(`Daily quota of ${cap} messages reached for ${date}`, 'quota_exceeded', true);
  }
}

export type GatewayFailureReason = 'rate_limited' | 'invalid_template' | 'invalid_recipient' | 'transient_network';

export type GatewayFailureKind = 'transient' | 'permanent';

export function classifyGatewayFailure(reason: GatewayFailureReason): GatewayFailureKind {
  return reason === 'invalid_template' || reason === 'invalid_recipient' ? 'permanent' : 'transient';
}

export class GatewaySendError extends DispatchError {
  readonly kind: GatewayFailureKind;

  constructor(
    readonly reason: GatewayFailureReason,
    readonly detail?: string
  ) {
    super(
      detail ? `${reason}: ${detail}` : reason,
      'gateway_send_failed',
      classifyGatewayFailure(reason) === 'transient'
    );
    this.kind = classifyGatewayFailure(reason);
  }
}

export class ReconciliationMismatchError extends DispatchError {
  constructor(
    readonly providerMessageId: string,
    readonly eventType: string
  ) {
    super(
      `No campaign recipient matched provider message ${providerMessageId} (${eventType})`,
      'reconciliation_mismatch',
      false
    );
  }
}
