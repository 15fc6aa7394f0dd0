import { Forwarder, ForwarderConfig, ForwarderKind, ForwardOutcome } from '../../types/forwarder';
import { SmsMessage } from '../../types/sms';
import { DeliveryFailure, toError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { HttpRequest, HttpTransport } from '../http/transport';

/**
 * Shared delivery path for forwarders that speak plain HTTP. Subclasses only
 * describe the request; sending it and judging the response happens here.
 */
export abstract class HttpForwarder implements Forwarder {
  abstract get kind(): ForwarderKind;

  constructor(protected transport: HttpTransport) {}

  abstract buildRequest(sms: SmsMessage): HttpRequest;

  abstract toConfig(): ForwarderConfig;

  async forward(sms: SmsMessage): Promise<ForwardOutcome> {
    let request: HttpRequest;
    try {
      request = this.buildRequest(sms);
    } catch (error: unknown) {
      return this.fail(new DeliveryFailure(this.kind, toError(error)));
    }

    try {
      const response = await this.transport.send(request);

      // Only an exact 200 counts as delivered
      if (response.status !== 200) {
        return this.fail(
          new DeliveryFailure(this.kind, new Error(`unexpected status ${response.status}`), response.status)
        );
      }

      logger.info('SMS forwarded', { forwarder: this.kind, sender: sms.sender, status: response.status });
      return { success: true, forwarder: this.kind, status: response.status };
    } catch (error: unknown) {
      return this.fail(new DeliveryFailure(this.kind, toError(error)));
    }
  }

  private fail(failure: DeliveryFailure): ForwardOutcome {
    logger.warn('SMS forward failed', {
      forwarder: this.kind,
      status: failure.status,
      error: failure.originalError.message,
    });
    return { success: false, forwarder: this.kind, failure };
  }
}
