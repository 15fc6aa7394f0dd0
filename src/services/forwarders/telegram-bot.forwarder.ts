import { ForwarderConfig, ForwarderKind } from '../../types/forwarder';
import { SmsMessage } from '../../types/sms';
import { ConfigError } from '../../utils/errors';
import { encodeUriPayload } from '../../utils/uri';
import { HttpRequest, HttpTransport } from '../http/transport';
import { HttpForwarder } from './http.forwarder';
import { parseFields, telegramBotSchema, unwrapFields } from './forwarder.schemas';

const TELEGRAM_API_BASE = 'https://api.telegram.org';

export function formatTelegramText(sms: SmsMessage): string {
  return `New SMS message from ${sms.sender}:\n${sms.body}\n\nDate: ${sms.timestamp}.`;
}

/** Sends messages straight to a chat through the Telegram Bot API. */
export class TelegramBotForwarder extends HttpForwarder {
  constructor(
    readonly token: string,
    readonly chatId: number | string,
    transport: HttpTransport
  ) {
    super(transport);
    if (!token) {
      throw new ConfigError('Missing the token', 'token');
    }
    if (chatId === '') {
      throw new ConfigError('Missing the chat id', 'chatId');
    }
  }

  get kind(): ForwarderKind {
    return 'TelegramBot';
  }

  static fromConfig(raw: Record<string, unknown>, transport: HttpTransport): TelegramBotForwarder {
    const { token, chatId } = parseFields('TelegramBot', telegramBotSchema, unwrapFields('TelegramBot', raw));
    return new TelegramBotForwarder(token, chatId, transport);
  }

  apiMethod(name: string): string {
    return `${TELEGRAM_API_BASE}/bot${this.token}/${name}`;
  }

  buildRequest(sms: SmsMessage): HttpRequest {
    const query = encodeUriPayload({ chat_id: this.chatId, text: formatTelegramText(sms) });
    return { method: 'POST', url: `${this.apiMethod('sendMessage')}${query}` };
  }

  toConfig(): ForwarderConfig {
    return { TelegramBot: { token: this.token, chatId: this.chatId } };
  }
}
