export type OutboundMessage = {
  phone: string;
  templateName: string;
  languageCode: string;
  parameters: string[];
};

export type SendReceipt = {
  providerMessageId: string;
};

/**
 * Outbound provider. Resolves with the provider's message id or rejects with a
 * GatewaySendError; implementations bound every call with a timeout.
 */
export interface SendGateway {
  send(message: OutboundMessage): Promise<SendReceipt>;
}

export const SEND_GATEWAY = Symbol('SEND_GATEWAY');
