import { ForwarderConfig, ForwarderKind, ManagedRelayFields } from '../../types/forwarder';
import { messageFields, SmsMessage } from '../../types/sms';
import { ConfigError, SetupCheckFailure, toError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { encodeUriPayload } from '../../utils/uri';
import { HttpRequest, HttpTransport } from '../http/transport';
import { HttpCallbackForwarder } from './http-callback.forwarder';
import {
  DEFAULT_BOT_HANDLE,
  DEFAULT_RELAY_BASE_URL,
  managedRelaySchema,
  parseFields,
  unwrapFields,
} from './forwarder.schemas';

const CODE_LENGTH = 8;

/** Pairing code of uppercase letters. Not a secret, so Math.random is used. */
export function generateConfirmationCode(random: () => number = Math.random): string {
  let code = '';
  for (let i = 0; i < CODE_LENGTH; i++) {
    code += String.fromCharCode(65 + Math.floor(random() * 26));
  }
  return code;
}

export interface ManagedRelayOptions {
  tgCode?: string;
  baseUrl?: string;
  botHandle?: string;
  uriPayload?: Record<string, string>;
  jsonPayload?: Record<string, string>;
  random?: () => number;
}

/**
 * Forwards messages through the hosted relay bot. The user pairs their
 * telegram handle by opening {@link getSetupUrl}; {@link checkLinked} asks the
 * relay whether that happened.
 */
export class ManagedRelayForwarder extends HttpCallbackForwarder {
  readonly tgCode: string;
  readonly baseUrl: string;
  readonly botHandle: string;
  private linked = false;

  constructor(
    readonly tgHandle: string,
    transport: HttpTransport,
    options: ManagedRelayOptions = {}
  ) {
    if (!tgHandle) {
      throw new ConfigError('Missing the telegram handle', 'tgHandle');
    }
    const baseUrl = options.baseUrl ?? DEFAULT_RELAY_BASE_URL;
    super(`${baseUrl}/forward`, transport, {
      method: 'POST',
      uriPayload: options.uriPayload,
      jsonPayload: options.jsonPayload,
    });
    this.baseUrl = baseUrl;
    this.botHandle = options.botHandle ?? DEFAULT_BOT_HANDLE;
    this.tgCode = options.tgCode ?? generateConfirmationCode(options.random);
  }

  get kind(): ForwarderKind {
    return 'ManagedRelay';
  }

  /** Result of the last {@link checkLinked}; not persisted. */
  get isLinked(): boolean {
    return this.linked;
  }

  static fromConfig(
    raw: Record<string, unknown>,
    transport: HttpTransport,
    random?: () => number
  ): ManagedRelayForwarder {
    const fields = parseFields('ManagedRelay', managedRelaySchema, unwrapFields('ManagedRelay', raw));
    if (!fields.tgCode) {
      logger.info('No confirmation code stored, generating a new one; pairing must be redone', {
        tgHandle: fields.tgHandle,
      });
    }
    return new ManagedRelayForwarder(fields.tgHandle, transport, { ...fields, random });
  }

  getSetupUrl(): string {
    return `https://t.me/${this.botHandle}?start=${this.tgCode}_${this.tgHandle}`;
  }

  async checkLinked(): Promise<boolean> {
    const url = `${this.baseUrl}/check_user${encodeUriPayload({ username: this.tgHandle, code: this.tgCode })}`;

    try {
      const response = await this.transport.send({ method: 'GET', url });
      if (response.status !== 200) {
        this.report(new SetupCheckFailure(new Error(`unexpected status ${response.status}`), response.status));
        this.linked = false;
      } else {
        this.linked = true;
      }
    } catch (error: unknown) {
      this.report(new SetupCheckFailure(toError(error)));
      this.linked = false;
    }

    logger.info('Relay link checked', { tgHandle: this.tgHandle, linked: this.linked });
    return this.linked;
  }

  buildRequest(sms: SmsMessage): HttpRequest {
    const query = encodeUriPayload({ ...messageFields(sms), ...this.uriPayload });
    // Appended verbatim, the relay matches these literally
    const url = `${this.callbackUrl}${query}code=${this.tgCode}&username=${this.tgHandle}`;
    const body = Object.keys(this.jsonPayload).length > 0 ? { ...this.jsonPayload } : undefined;
    return { method: 'POST', url, body };
  }

  toConfig(): ForwarderConfig {
    const fields: ManagedRelayFields = {
      tgCode: this.tgCode,
      baseUrl: this.baseUrl,
      tgHandle: this.tgHandle,
      botHandle: this.botHandle,
      uriPayload: { ...this.uriPayload },
      jsonPayload: { ...this.jsonPayload },
    };
    return { ManagedRelay: fields };
  }

  private report(failure: SetupCheckFailure) {
    logger.warn('Relay link check failed', {
      tgHandle: this.tgHandle,
      status: failure.status,
      error: failure.originalError.message,
    });
  }
}
