import { z } from 'zod';

export const dispatchSummarySchema = z.object({
  date: z.string(),
  campaignsProcessed: z.number().int().nonnegative(),
  messagesSent: z.number().int().nonnegative(),
  messagesFailed: z.number().int().nonnegative(),
  messagesDeferred: z.number().int().nonnegative(),
  heldEventsExpired: z.number().int().nonnegative()
});

export type DispatchSummary = z.infer<typeof dispatchSummarySchema>;

export class DispatchTriggerError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'DispatchTriggerError';
  }
}

/** Asks the API to run the dispatch cycle for a day (today in the API's zone when omitted). */
export class DispatchTrigger {
  constructor(
    private readonly apiBaseUrl: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async run(date?: string): Promise<DispatchSummary> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.apiBaseUrl}/v1/dispatch/run`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(date ? { date } : {}),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new DispatchTriggerError(`dispatch_request_failed: ${detail}`);
    }

    const text = await response.text();
    if (!response.ok) {
      throw new DispatchTriggerError(`dispatch_run_rejected (${response.status}): ${text.slice(0, 500)}`, response.status);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new DispatchTriggerError(`dispatch_summary_unreadable: ${detail}`, response.status);
    }

    const parsed = dispatchSummarySchema.safeParse(body);
    if (!parsed.success) {
      throw new DispatchTriggerError('dispatch_summary_invalid', response.status);
    }
    return parsed.data;
  }
}
