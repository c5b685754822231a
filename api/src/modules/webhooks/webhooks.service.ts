import { Inject, Injectable } from '@nestjs/common';
import { createHmac, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import { StructuredLoggerService } from '../../shared/logging/structured-logger.service';
import { MetricsService } from '../../shared/observability/metrics.service';
import { CLOCK, Clock } from '../../shared/time/calendar-date';
import { parseInput } from '../../shared/validation/parse-input';
import { ReconcileSummary, StatusReconcilerService } from '../reconciler/status-reconciler.service';
import { DELIVERY_EVENT_TYPES, DeliveryEvent } from '../reconciler/status-transition';

export type WebhookSecrets = {
  appSecret?: string;
  verifyToken: string;
};

export function readWebhookSecrets(env: NodeJS.ProcessEnv = process.env): WebhookSecrets {
  return {
    appSecret: env.META_APP_SECRET,
    verifyToken: env.META_WEBHOOK_VERIFY_TOKEN ?? 'dev-verify-token'
  };
}

export const WEBHOOK_SECRETS = Symbol('WEBHOOK_SECRETS');

const metaStatusSchema = z.object({
  id: z.string().min(1),
  status: z.string(),
  timestamp: z.union([z.string(), z.number()]).optional(),
  errors: z
    .array(
      z.object({
        code: z.union([z.number(), z.string()]).optional(),
        title: z.string().optional(),
        message: z.string().optional()
      })
    )
    .optional()
});

type MetaStatus = z.infer<typeof metaStatusSchema>;

const metaEnvelopeSchema = z.object({
  entry: z
    .array(
      z.object({
        changes: z
          .array(
            z.object({
              value: z.object({ statuses: z.array(z.unknown()).optional() }).passthrough().optional()
            })
          )
          .optional()
      })
    )
    .default([])
});

const statusEventSchema = z.object({
  providerMessageId: z.string().min(1),
  eventType: z.enum(DELIVERY_EVENT_TYPES),
  timestamp: z.coerce.date(),
  failureReason: z.string().optional()
});

export const statusEventsBodySchema = z.object({
  events: z.array(statusEventSchema).min(1)
});

@Injectable()
export class WebhooksService {
  constructor(
    @Inject(WEBHOOK_SECRETS) private readonly secrets: WebhookSecrets,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly reconciler: StatusReconcilerService,
    private readonly metrics: MetricsService,
    private readonly logger: StructuredLoggerService
  ) {}

  verifyToken(mode: string | undefined, token: string | undefined): boolean {
    return mode === 'subscribe' && token === this.secrets.verifyToken;
  }

  verifySignature(rawBody: Buffer, signatureHeader?: string): boolean {
    const appSecret = this.secrets.appSecret;
    if (!appSecret || !signatureHeader || !signatureHeader.startsWith('sha256=')) {
      return false;
    }

    const expected = `sha256=${createHmac('sha256', appSecret).update(rawBody).digest('hex')}`;
    const expectedBuffer = Buffer.from(expected);
    const receivedBuffer = Buffer.from(signatureHeader);

    if (expectedBuffer.length !== receivedBuffer.length) {
      return false;
    }

    return timingSafeEqual(expectedBuffer, receivedBuffer);
  }

  /**
   * Pulls delivery events out of a Meta status webhook. Entries that do not parse are skipped,
   * and `sent` statuses are dropped because the dispatcher records sends itself.
   */
  extractEvents(payload: unknown): DeliveryEvent[] {
    const envelope = parseInput(metaEnvelopeSchema, payload);
    const events: DeliveryEvent[] = [];

    for (const entry of envelope.entry) {
      for (const change of entry.changes ?? []) {
        for (const item of change.value?.statuses ?? []) {
          const parsed = metaStatusSchema.safeParse(item);
          if (!parsed.success) {
            this.logger.warn({ type: 'webhook_status_malformed', issues: parsed.error.issues.length }, WebhooksService.name);
            continue;
          }

          const event = this.toDeliveryEvent(parsed.data);
          if (event) {
            events.push(event);
          }
        }
      }
    }

    return events;
  }

  async ingestMeta(payload: unknown): Promise<ReconcileSummary> {
    return this.ingest(this.extractEvents(payload));
  }

  /** Provider-neutral form: `{ events: [{ providerMessageId, eventType, timestamp, failureReason? }] }`. */
  async ingestNormalized(body: unknown): Promise<ReconcileSummary> {
    const input = parseInput(statusEventsBodySchema, body);
    return this.ingest(input.events);
  }

  private async ingest(events: DeliveryEvent[]): Promise<ReconcileSummary> {
    const summary = await this.reconciler.applyEvents(events);
    this.metrics.recordStatusEvents(summary);
    this.logger.log({ type: 'status_events_ingested', received: events.length, ...summary }, WebhooksService.name);
    return summary;
  }

  private toDeliveryEvent(status: MetaStatus): DeliveryEvent | null {
    if (status.status !== 'delivered' && status.status !== 'read' && status.status !== 'failed') {
      return null;
    }

    const seconds = Number(status.timestamp);
    const timestamp = Number.isFinite(seconds) && seconds > 0 ? new Date(seconds * 1000) : this.clock.now();
    const error = status.errors?.[0];
    const failureReason =
      status.status === 'failed'
        ? [error?.code, error?.message ?? error?.title].filter((part) => part !== undefined).join(': ') || 'failed'
        : undefined;

    return {
      providerMessageId: status.id,
      eventType: status.status,
      timestamp,
      failureReason
    };
  }
}
