import { InboundSmsAdapter, SmsSourceConfig } from './sms.adapter';
import { TwilioInboundAdapter } from './twilio.adapter';
import { BandwidthInboundAdapter } from './bandwidth.adapter';

export class SmsSourceFactory {
  static create(provider: string, config: SmsSourceConfig): InboundSmsAdapter {
    switch (provider) {
      case 'twilio':
        return new TwilioInboundAdapter(config);
      case 'bandwidth':
        return new BandwidthInboundAdapter(config);
      default:
        throw new Error(`Unsupported SMS provider: ${provider}`);
    }
  }
}
