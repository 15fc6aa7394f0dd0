import { DeliveryFailure } from '../utils/errors';
import { SmsMessage } from './sms';

export const HTTP_METHODS = ['GET', 'POST', 'PUT'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type ForwarderKind = 'Stdout' | 'HttpCallback' | 'TelegramBot' | 'ManagedRelay';

export interface HttpCallbackFields {
  callbackUrl: string;
  method: HttpMethod;
  uriPayload: Record<string, string>;
  jsonPayload: Record<string, string>;
}

export interface TelegramBotFields {
  token: string;
  chatId: number | string;
}

export interface ManagedRelayFields {
  tgCode: string;
  baseUrl: string;
  tgHandle: string;
  botHandle: string;
  uriPayload: Record<string, string>;
  jsonPayload: Record<string, string>;
}

export type ForwarderConfig =
  | { Stdout: Record<string, never> }
  | { HttpCallback: HttpCallbackFields }
  | { TelegramBot: TelegramBotFields }
  | { ManagedRelay: ManagedRelayFields };

export type ForwardOutcome =
  | { success: true; forwarder: ForwarderKind; status?: number }
  | { success: false; forwarder: ForwarderKind | null; failure: DeliveryFailure };

export interface Forwarder {
  readonly kind: ForwarderKind;
  forward(sms: SmsMessage): Promise<ForwardOutcome>;
  toConfig(): ForwarderConfig;
}
