import { Forwarder, ForwardOutcome } from '../types/forwarder';
import { SmsMessage } from '../types/sms';
import { DeliveryFailure, toError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { HttpTransport } from './http/transport';
import { decodeForwarder, DecodeOptions, encodeForwarder } from './forwarders/forwarder.codec';
import { ManagedRelayForwarder } from './forwarders/managed-relay.forwarder';
import { SettingsService } from './settings.service';

export interface ForwardingServiceOptions extends DecodeOptions {
  /** Config blob activated when nothing has been stored yet. */
  seedConfig?: string;
}

/**
 * Owns the active forwarder. Replacing it swaps the reference; a forwarder
 * instance is never mutated in place, so in-flight forwards finish against
 * the configuration they started with.
 */
export class ForwardingService {
  private active: Forwarder | null = null;
  private changes: Promise<void> = Promise.resolve();

  constructor(
    private transport: HttpTransport,
    private settings: SettingsService = new SettingsService(),
    private options: ForwardingServiceOptions = {}
  ) {}

  load(): Promise<Forwarder | null> {
    return this.exclusive(() => this.loadStored());
  }

  private async loadStored(): Promise<Forwarder | null> {
    const stored = await this.settings.getForwarderConfig();
    const blob = stored ?? this.options.seedConfig;

    if (!blob) {
      logger.info('No forwarder configured');
      this.active = null;
      return null;
    }

    const forwarder = decodeForwarder(blob, this.transport, this.options);
    const encoded = encodeForwarder(forwarder);
    // Persist regenerated fields (a fresh confirmation code) or the seed
    if (encoded !== stored) {
      await this.settings.saveForwarderConfig(encoded);
    }

    this.active = forwarder;
    logger.info('Forwarder loaded', { forwarder: forwarder.kind, source: stored ? 'store' : 'seed' });
    return forwarder;
  }

  /** Decodes and persists `blob`; on a ConfigError the current forwarder stays active. */
  activate(blob: string): Promise<Forwarder> {
    return this.exclusive(async () => {
      const forwarder = decodeForwarder(blob, this.transport, this.options);
      await this.settings.saveForwarderConfig(encodeForwarder(forwarder));
      this.active = forwarder;
      logger.info('Forwarder activated', { forwarder: forwarder.kind });
      return forwarder;
    });
  }

  deactivate(): Promise<void> {
    return this.exclusive(async () => {
      await this.settings.deleteForwarderConfig();
      this.active = null;
      logger.info('Forwarder deactivated');
    });
  }

  getActive(): Forwarder | null {
    return this.active;
  }

  currentConfig(): string | null {
    return this.active ? encodeForwarder(this.active) : null;
  }

  async handleMessage(sms: SmsMessage): Promise<ForwardOutcome> {
    const forwarder = this.active;
    if (!forwarder) {
      const failure = new DeliveryFailure('none', new Error('No forwarder configured'));
      logger.warn('SMS dropped', { sender: sms.sender, error: failure.originalError.message });
      return { success: false, forwarder: null, failure };
    }

    try {
      return await forwarder.forward(sms);
    } catch (error: unknown) {
      const failure = new DeliveryFailure(forwarder.kind, toError(error));
      logger.error('Forwarder threw unexpectedly', { forwarder: forwarder.kind, error: failure.originalError.message });
      return { success: false, forwarder: forwarder.kind, failure };
    }
  }

  getSetupUrl(): string {
    return this.requireRelay().getSetupUrl();
  }

  async checkLinked(): Promise<boolean> {
    return this.requireRelay().checkLinked();
  }

  /**
   * Runs configuration changes one at a time so the stored record and the
   * active forwarder always come from the same call.
   */
  private exclusive<T>(change: () => Promise<T>): Promise<T> {
    const run = this.changes.then(change);
    // The caller receives the rejection through `run`; the chain only waits on it
    this.changes = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private requireRelay(): ManagedRelayForwarder {
    const forwarder = this.active;
    if (!(forwarder instanceof ManagedRelayForwarder)) {
      throw new ValidationError('Active forwarder is not a managed relay');
    }
    return forwarder;
  }
}
