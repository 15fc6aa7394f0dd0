import { Forwarder, ForwarderConfig, ForwardOutcome } from '../../types/forwarder';
import { SmsMessage } from '../../types/sms';
import { logger } from '../../utils/logger';

/** Dry-run forwarder: logs the message locally and always succeeds. */
export class StdoutForwarder implements Forwarder {
  readonly kind = 'Stdout' as const;

  static fromConfig(_fields: Record<string, unknown> = {}): StdoutForwarder {
    return new StdoutForwarder();
  }

  async forward(sms: SmsMessage): Promise<ForwardOutcome> {
    logger.info(`Received an sms: ${sms.body}.`, { forwarder: this.kind, sender: sms.sender });
    return { success: true, forwarder: this.kind };
  }

  toConfig(): ForwarderConfig {
    return { Stdout: {} };
  }
}
