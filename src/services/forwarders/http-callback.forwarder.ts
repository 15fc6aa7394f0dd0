import { ForwarderConfig, ForwarderKind, HttpCallbackFields, HttpMethod } from '../../types/forwarder';
import { messageFields, SmsMessage } from '../../types/sms';
import { ConfigError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { encodeUriPayload, RESERVED_KEY, withoutReservedKey } from '../../utils/uri';
import { HttpRequest, HttpTransport } from '../http/transport';
import { HttpForwarder } from './http.forwarder';
import { httpCallbackSchema, parseFields, unwrapFields } from './forwarder.schemas';

export interface HttpCallbackOptions {
  method?: HttpMethod;
  uriPayload?: Record<string, string>;
  jsonPayload?: Record<string, string>;
}

/**
 * Forwards messages to a user-defined endpoint. The caller is responsible for
 * validating the URL scheme.
 */
export class HttpCallbackForwarder extends HttpForwarder {
  readonly method: HttpMethod;
  readonly uriPayload: Readonly<Record<string, string>>;
  readonly jsonPayload: Readonly<Record<string, string>>;

  constructor(
    readonly callbackUrl: string,
    transport: HttpTransport,
    options: HttpCallbackOptions = {}
  ) {
    super(transport);
    if (!callbackUrl) {
      throw new ConfigError('Missing the callback url', 'callbackUrl');
    }
    this.method = options.method ?? 'POST';
    this.uriPayload = stripReserved('uriPayload', options.uriPayload ?? {});
    this.jsonPayload = stripReserved('jsonPayload', options.jsonPayload ?? {});
  }

  get kind(): ForwarderKind {
    return 'HttpCallback';
  }

  static fromConfig(raw: Record<string, unknown>, transport: HttpTransport): HttpCallbackForwarder {
    const fields = parseFields('HttpCallback', httpCallbackSchema, unwrapFields('HttpCallback', raw));
    return new HttpCallbackForwarder(fields.callbackUrl, transport, fields);
  }

  buildRequest(sms: SmsMessage): HttpRequest {
    switch (this.method) {
      case 'GET': {
        const query = encodeUriPayload({ ...messageFields(sms), ...this.uriPayload });
        return { method: 'GET', url: `${this.callbackUrl}${query}` };
      }
      case 'POST':
      case 'PUT': {
        const body = withoutReservedKey({ ...messageFields(sms), ...this.jsonPayload });
        const query = encodeUriPayload(this.uriPayload);
        return { method: this.method, url: `${this.callbackUrl}${query}`, body };
      }
    }
  }

  toConfig(): ForwarderConfig {
    const fields: HttpCallbackFields = {
      callbackUrl: this.callbackUrl,
      method: this.method,
      uriPayload: { ...this.uriPayload },
      jsonPayload: { ...this.jsonPayload },
    };
    return { HttpCallback: fields };
  }
}

export function stripReserved(name: string, payload: Record<string, string>): Record<string, string> {
  if (RESERVED_KEY in payload) {
    logger.warn('Dropping reserved payload key', { payload: name, key: RESERVED_KEY });
  }
  return withoutReservedKey(payload);
}
