export type DispatchConfig = {
  globalDailyCap: number;
  defaultDailySendLimit: number;
  maxRetries: number;
  /** First retry delay after a transient gateway failure; doubles on each further attempt. */
  retryBackoffMs: number;
  timeZone: string;
  claimLeaseMs: number;
  gatewayTimeoutMs: number;
  heldEventTtlHours: number;
};

export const DISPATCH_CONFIG = Symbol('DISPATCH_CONFIG');

export function loadDispatchConfig(env: NodeJS.ProcessEnv = process.env): DispatchConfig {
  const globalDailyCap = readPositiveInt(env.GLOBAL_DAILY_CAP, 250);

  return {
    globalDailyCap,
    defaultDailySendLimit: Math.min(readPositiveInt(env.DEFAULT_DAILY_SEND_LIMIT, 250), globalDailyCap),
    maxRetries: readPositiveInt(env.DISPATCH_MAX_RETRIES, 3),
    retryBackoffMs: readPositiveInt(env.DISPATCH_RETRY_BACKOFF_MS, 60_000),
    timeZone: readTimeZone(env.DISPATCH_TIMEZONE),
    claimLeaseMs: readPositiveInt(env.DISPATCH_CLAIM_LEASE_MS, 600_000),
    gatewayTimeoutMs: readPositiveInt(env.GATEWAY_TIMEOUT_MS, 10_000),
    heldEventTtlHours: readPositiveInt(env.HELD_EVENT_TTL_HOURS, 72)
  };
}

function readPositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw.trim());
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function readTimeZone(raw: string | undefined): string {
  const candidate = raw?.trim();
  if (!candidate) {
    return 'UTC';
  }

  try {
    new Intl.DateTimeFormat('en-US', { timeZone: candidate });
    return candidate;
  } catch (error) {
    if (error instanceof RangeError) {
      return 'UTC';
    }
    throw error;
  }
}
