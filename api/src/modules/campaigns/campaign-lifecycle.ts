import { CampaignStatus } from './campaign.model';

export type LifecycleAction = 'activate' | 'pause' | 'resume' | 'cancel' | 'complete';

type Rule = {
  from: readonly CampaignStatus[];
  to: CampaignStatus;
};

const RULES: Record<LifecycleAction, Rule> = {
  activate: { from: ['draft'], to: 'active' },
  pause: { from: ['active'], to: 'paused' },
  resume: { from: ['paused'], to: 'active' },
  cancel: { from: ['draft', 'active', 'paused'], to: 'cancelled' },
  complete: { from: ['active'], to: 'completed' }
};

export function lifecycleRule(action: LifecycleAction): Rule {
  return RULES[action];
}

export function canApply(action: LifecycleAction, status: CampaignStatus): boolean {
  return RULES[action].from.includes(status);
}

/** Statuses whose pending recipients may be moved to another day. */
export function canReschedule(status: CampaignStatus): boolean {
  return status === 'active' || status === 'paused';
}

/** Statuses whose campaigns may still send, so an ETA is meaningful. */
export function isOpenStatus(status: CampaignStatus): boolean {
  return status === 'draft' || status === 'active' || status === 'paused';
}
