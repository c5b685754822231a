import { MiddlewareConsumer, Module, NestModule, RequestMethod } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { AUDIENCE_RESOLVER } from './modules/audience/audience-resolver';
import { PgAudienceResolver } from './modules/audience/pg-audience-resolver';
import { CampaignsController } from './modules/campaigns/campaigns.controller';
import { CAMPAIGNS_REPOSITORY, PgCampaignsRepository } from './modules/campaigns/campaigns.repository';
import { CampaignsService } from './modules/campaigns/campaigns.service';
import { DispatchController } from './modules/dispatch/dispatch.controller';
import { DispatcherService } from './modules/dispatch/dispatcher.service';
import { SEND_GATEWAY } from './modules/gateway/send-gateway';
import {
  readWhatsAppCredentials,
  WHATSAPP_CREDENTIALS,
  WhatsAppCloudGateway
} from './modules/gateway/whatsapp-cloud.gateway';
import { HealthController } from './modules/health/health.controller';
import { MetricsController } from './modules/metrics/metrics.controller';
import { DAILY_QUOTA_LEDGER, PgDailyQuotaLedger } from './modules/quota/daily-quota.ledger';
import { PgRecipientsRepository, RECIPIENTS_REPOSITORY } from './modules/recipients/recipients.repository';
import { HELD_EVENTS_REPOSITORY, PgHeldEventsRepository } from './modules/reconciler/held-events.repository';
import { StatusReconcilerService } from './modules/reconciler/status-reconciler.service';
import { CampaignSchedulerService } from './modules/scheduler/campaign-scheduler.service';
import { StatsService } from './modules/stats/stats.service';
import { WebhooksController } from './modules/webhooks/webhooks.controller';
import { readWebhookSecrets, WEBHOOK_SECRETS, WebhooksService } from './modules/webhooks/webhooks.service';
import { DISPATCH_CONFIG, loadDispatchConfig } from './shared/config/dispatch.config';
import { PostgresService } from './shared/database/postgres.service';
import { TRANSACTION_RUNNER } from './shared/database/transaction-runner';
import { DispatchExceptionFilter } from './shared/errors/dispatch-exception.filter';
import { StructuredLoggerService } from './shared/logging/structured-logger.service';
import { MetricsService } from './shared/observability/metrics.service';
import { RequestLoggingMiddleware } from './shared/observability/request-logging.middleware';
import { CLOCK, systemClock } from './shared/time/calendar-date';

@Module({
  imports: [],
  controllers: [HealthController, MetricsController, CampaignsController, DispatchController, WebhooksController],
  providers: [
    StructuredLoggerService,
    PostgresService,
    MetricsService,
    CampaignsService,
    CampaignSchedulerService,
    DispatcherService,
    StatusReconcilerService,
    StatsService,
    WebhooksService,
    { provide: DISPATCH_CONFIG, useFactory: () => loadDispatchConfig() },
    { provide: WHATSAPP_CREDENTIALS, useFactory: () => readWhatsAppCredentials() },
    { provide: WEBHOOK_SECRETS, useFactory: () => readWebhookSecrets() },
    { provide: CLOCK, useValue: systemClock },
    { provide: TRANSACTION_RUNNER, useExisting: PostgresService },
    { provide: CAMPAIGNS_REPOSITORY, useClass: PgCampaignsRepository },
    { provide: RECIPIENTS_REPOSITORY, useClass: PgRecipientsRepository },
    { provide: HELD_EVENTS_REPOSITORY, useClass: PgHeldEventsRepository },
    { provide: DAILY_QUOTA_LEDGER, useClass: PgDailyQuotaLedger },
    { provide: AUDIENCE_RESOLVER, useClass: PgAudienceResolver },
    { provide: SEND_GATEWAY, useClass: WhatsAppCloudGateway },
    {
      provide: APP_FILTER,
      useClass: DispatchExceptionFilter
    }
  ]
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestLoggingMiddleware).forRoutes({ path: '*', method: RequestMethod.ALL });
  }
}
