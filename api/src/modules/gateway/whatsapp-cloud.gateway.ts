import { Inject, Injectable, Optional } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { DISPATCH_CONFIG, DispatchConfig } from '../../shared/config/dispatch.config';
import { GatewayFailureReason, GatewaySendError } from '../../shared/errors/dispatch-errors';
import { OutboundMessage, SendGateway, SendReceipt } from './send-gateway';

const graphResponseSchema = z.object({
  messages: z.array(z.object({ id: z.string().min(1) })).optional(),
  error: z
    .object({
      code: z.union([z.number(), z.string()]).optional(),
      message: z.string().optional()
    })
    .optional()
});

type GraphResponse = z.infer<typeof graphResponseSchema>;

const RATE_LIMIT_CODES = new Set([4, 80007, 130429, 131056]);
const INVALID_RECIPIENT_CODES = new Set([131021, 131026, 131030]);

/** Maps an HTTP status and Graph API error code to a failure reason. */
export function classifyMetaError(httpStatus: number, code?: number): GatewayFailureReason {
  if (httpStatus === 429 || (code !== undefined && RATE_LIMIT_CODES.has(code))) {
    return 'rate_limited';
  }
  if (code !== undefined && code >= 132000 && code <= 132999) {
    return 'invalid_template';
  }
  if (code !== undefined && INVALID_RECIPIENT_CODES.has(code)) {
    return 'invalid_recipient';
  }
  return 'transient_network';
}

export type WhatsAppCredentials = {
  accessToken?: string;
  phoneNumberId?: string;
  graphVersion: string;
  allowMockSend: boolean;
};

export function readWhatsAppCredentials(env: NodeJS.ProcessEnv = process.env): WhatsAppCredentials {
  return {
    accessToken: env.META_ACCESS_TOKEN,
    phoneNumberId: env.META_PHONE_NUMBER_ID,
    graphVersion: env.META_GRAPH_VERSION ?? 'v20.0',
    allowMockSend: env.ALLOW_MOCK_WHATSAPP_SEND === 'true' && env.NODE_ENV !== 'production'
  };
}

export const WHATSAPP_CREDENTIALS = Symbol('WHATSAPP_CREDENTIALS');
export const HTTP_FETCH = Symbol('HTTP_FETCH');

@Injectable()
export class WhatsAppCloudGateway implements SendGateway {
  private readonly fetchImpl: typeof fetch;

  constructor(
    @Inject(DISPATCH_CONFIG) private readonly config: DispatchConfig,
    @Inject(WHATSAPP_CREDENTIALS) private readonly credentials: WhatsAppCredentials,
    @Optional() @Inject(HTTP_FETCH) fetchImpl?: typeof fetch
  ) {
    this.fetchImpl = fetchImpl ?? fetch;
  }

  async send(message: OutboundMessage): Promise<SendReceipt> {
    const { accessToken, phoneNumberId, graphVersion } = this.credentials;

    if (!accessToken || !phoneNumberId) {
      if (this.credentials.allowMockSend) {
        return { providerMessageId: `mock-${randomUUID()}` };
      }
      throw new GatewaySendError('transient_network', 'WhatsApp credentials are not configured');
    }

    const endpoint = `https://graph.facebook.com/${graphVersion}/${phoneNumberId}/messages`;

    let response: Response;
    try {
      response = await this.fetchImpl(endpoint, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${accessToken}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify(this.buildPayload(message)),
        signal: AbortSignal.timeout(this.config.gatewayTimeoutMs)
      });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new GatewaySendError('transient_network', detail);
    }

    const payload = await this.readPayload(response);

    if (!response.ok) {
      const code = payload.error?.code;
      const numericCode = code === undefined ? undefined : Number(code);
      throw new GatewaySendError(
        classifyMetaError(response.status, Number.isFinite(numericCode) ? numericCode : undefined),
        payload.error?.message ?? `meta_request_failed (${response.status})`
      );
    }

    const providerMessageId = payload.messages?.[0]?.id;
    if (!providerMessageId) {
      throw new GatewaySendError('transient_network', 'meta_missing_message_id');
    }

    return { providerMessageId };
  }

  private buildPayload(message: OutboundMessage): Record<string, unknown> {
    const template: Record<string, unknown> = {
      name: message.templateName,
      language: { code: message.languageCode }
    };

    if (message.parameters.length > 0) {
      template.components = [
        {
          type: 'body',
          parameters: message.parameters.map((text) => ({ type: 'text', text }))
        }
      ];
    }

    return {
      messaging_product: 'whatsapp',
      to: message.phone,
      type: 'template',
      template
    };
  }

  private async readPayload(response: Response): Promise<GraphResponse> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new GatewaySendError('transient_network', `unreadable provider response: ${detail}`);
    }

    const parsed = graphResponseSchema.safeParse(body);
    return parsed.success ? parsed.data : {};
  }
}
