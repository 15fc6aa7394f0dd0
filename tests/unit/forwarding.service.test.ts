jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

jest.mock('../../src/config/database', () => ({
  query: jest.fn().mockResolvedValue({ rows: [] }),
}));

import { ForwardingService } from '../../src/services/forwarding.service';
import { SettingsService } from '../../src/services/settings.service';
import { HttpRequest, HttpResponse, HttpTransport } from '../../src/services/http/transport';
import { StdoutForwarder } from '../../src/services/forwarders/stdout.forwarder';
import { ManagedRelayForwarder } from '../../src/services/forwarders/managed-relay.forwarder';
import { ConfigError, ValidationError } from '../../src/utils/errors';

const send = jest.fn<Promise<HttpResponse>, [HttpRequest]>();
const transport: HttpTransport = { send };

const settings: jest.Mocked<SettingsService> = {
  getForwarderConfig: jest.fn(),
  saveForwarderConfig: jest.fn(),
  deleteForwarderConfig: jest.fn(),
};

const sms = { sender: '+15551234567', body: 'Your code is 123456', timestamp: 1700000000000 };

describe('ForwardingService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.restoreAllMocks();
    settings.getForwarderConfig.mockResolvedValue(null);
    settings.saveForwarderConfig.mockResolvedValue(undefined);
    settings.deleteForwarderConfig.mockResolvedValue(undefined);
  });

  describe('load', () => {
    it('activates the stored config without rewriting it', async () => {
      settings.getForwarderConfig.mockResolvedValueOnce('{"Stdout":{}}');
      const service = new ForwardingService(transport, settings);

      const forwarder = await service.load();

      expect(forwarder).toBeInstanceOf(StdoutForwarder);
      expect(service.getActive()).toBe(forwarder);
      expect(settings.saveForwarderConfig).not.toHaveBeenCalled();
    });

    it('falls back to the seed and persists it in the current format', async () => {
      const service = new ForwardingService(transport, settings, { seedConfig: '{"token":"T","chatId":42}' });

      const forwarder = await service.load();

      expect(forwarder?.kind).toBe('TelegramBot');
      expect(settings.saveForwarderConfig).toHaveBeenCalledWith('{"TelegramBot":{"token":"T","chatId":42}}');
    });

    it('persists a regenerated confirmation code', async () => {
      settings.getForwarderConfig.mockResolvedValueOnce('{"ManagedRelay":{"tgHandle":"alice"}}');
      const service = new ForwardingService(transport, settings, { random: () => 0 });

      await service.load();

      expect(settings.saveForwarderConfig).toHaveBeenCalledWith(
        '{"ManagedRelay":{"tgCode":"AAAAAAAA","baseUrl":"https://forwarder.whatever.team","tgHandle":"alice",' +
          '"botHandle":"smsforwarderrobot","uriPayload":{},"jsonPayload":{}}}'
      );
    });

    it('leaves nothing active when no config exists', async () => {
      const service = new ForwardingService(transport, settings);

      await expect(service.load()).resolves.toBeNull();
      expect(service.currentConfig()).toBeNull();
    });

    it('fails fast on a broken stored config', async () => {
      settings.getForwarderConfig.mockResolvedValueOnce('{"TelegramBot":{"token":"T"}}');
      const service = new ForwardingService(transport, settings);

      await expect(service.load()).rejects.toBeInstanceOf(ConfigError);
      expect(service.getActive()).toBeNull();
    });
  });

  describe('activate', () => {
    it('swaps in and persists the new forwarder', async () => {
      const service = new ForwardingService(transport, settings);

      const forwarder = await service.activate('{"HttpCallback":{"callbackUrl":"https://example.test/hook"}}');

      expect(forwarder.kind).toBe('HttpCallback');
      expect(service.getActive()).toBe(forwarder);
      expect(settings.saveForwarderConfig).toHaveBeenCalledWith(
        '{"HttpCallback":{"callbackUrl":"https://example.test/hook","method":"POST","uriPayload":{},"jsonPayload":{}}}'
      );
    });

    it('keeps the previous forwarder when the new config is rejected', async () => {
      const service = new ForwardingService(transport, settings);
      const previous = await service.activate('{"Stdout":{}}');
      settings.saveForwarderConfig.mockClear();

      await expect(service.activate('{"HttpCallback":{"method":"GET"}}')).rejects.toThrow(ConfigError);

      expect(service.getActive()).toBe(previous);
      expect(settings.saveForwarderConfig).not.toHaveBeenCalled();
    });

    it('applies overlapping activations one at a time', async () => {
      const service = new ForwardingService(transport, settings);
      let releaseFirstSave: () => void = () => undefined;
      settings.saveForwarderConfig.mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            releaseFirstSave = resolve;
          })
      );

      const first = service.activate('{"Stdout":{}}');
      const second = service.activate('{"HttpCallback":{"callbackUrl":"https://example.test/hook"}}');
      await new Promise((resolve) => setImmediate(resolve));

      expect(settings.saveForwarderConfig).toHaveBeenCalledTimes(1);

      releaseFirstSave();
      const [, latest] = await Promise.all([first, second]);

      expect(service.getActive()).toBe(latest);
      expect(latest.kind).toBe('HttpCallback');
      expect(settings.saveForwarderConfig).toHaveBeenCalledTimes(2);
      expect(settings.saveForwarderConfig).toHaveBeenLastCalledWith(service.currentConfig());
    });

    it('keeps accepting changes after a rejected activation', async () => {
      const service = new ForwardingService(transport, settings);

      await expect(service.activate('{"HttpCallback":{"method":"GET"}}')).rejects.toThrow(ConfigError);
      const forwarder = await service.activate('{"Stdout":{}}');

      expect(service.getActive()).toBe(forwarder);
    });
  });

  it('deactivate clears the stored and active forwarder', async () => {
    const service = new ForwardingService(transport, settings);
    await service.activate('{"Stdout":{}}');

    await service.deactivate();

    expect(settings.deleteForwarderConfig).toHaveBeenCalledTimes(1);
    expect(service.getActive()).toBeNull();
  });

  describe('handleMessage', () => {
    it('reports a failure when nothing is configured', async () => {
      const service = new ForwardingService(transport, settings);

      const outcome = await service.handleMessage(sms);

      expect(outcome.success).toBe(false);
      expect(outcome.forwarder).toBeNull();
    });

    it('contains unexpected forwarder errors', async () => {
      jest.spyOn(StdoutForwarder.prototype, 'forward').mockRejectedValueOnce(new Error('boom'));
      const service = new ForwardingService(transport, settings);
      await service.activate('{"Stdout":{}}');

      const outcome = await service.handleMessage(sms);

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.forwarder).toBe('Stdout');
        expect(outcome.failure.originalError.message).toBe('boom');
      }
    });

    it('keeps forwarding after a failed delivery', async () => {
      const service = new ForwardingService(transport, settings);
      await service.activate('{"TelegramBot":{"token":"T","chatId":42}}');
      send.mockResolvedValueOnce({ status: 500, body: '' }).mockResolvedValueOnce({ status: 200, body: '' });

      const first = await service.handleMessage(sms);
      const second = await service.handleMessage(sms);

      expect(first.success).toBe(false);
      expect(second.success).toBe(true);
      expect(send).toHaveBeenCalledTimes(2);
    });

    it('resolves concurrent forwards independently', async () => {
      const service = new ForwardingService(transport, settings);
      await service.activate('{"HttpCallback":{"callbackUrl":"https://example.test/hook","method":"GET"}}');

      let releaseSlow: (response: HttpResponse) => void = () => undefined;
      send
        .mockImplementationOnce(() => new Promise<HttpResponse>((resolve) => (releaseSlow = resolve)))
        .mockResolvedValueOnce({ status: 503, body: '' });

      const slow = service.handleMessage({ ...sms, body: 'first' });
      const fast = await service.handleMessage({ ...sms, body: 'second' });
      releaseSlow({ status: 200, body: '' });

      expect(fast.success).toBe(false);
      await expect(slow).resolves.toEqual({ success: true, forwarder: 'HttpCallback', status: 200 });
    });
  });

  describe('managed relay setup', () => {
    it('exposes the setup url and link check of the active relay', async () => {
      const service = new ForwardingService(transport, settings);
      const relay = await service.activate('{"ManagedRelay":{"tgHandle":"alice","tgCode":"QWERTYUI"}}');
      send.mockResolvedValueOnce({ status: 200, body: '' });

      expect(relay).toBeInstanceOf(ManagedRelayForwarder);
      expect(service.getSetupUrl()).toBe('https://t.me/smsforwarderrobot?start=QWERTYUI_alice');
      await expect(service.checkLinked()).resolves.toBe(true);
    });

    it('rejects setup calls for other forwarders', async () => {
      const service = new ForwardingService(transport, settings);
      await service.activate('{"Stdout":{}}');

      expect(() => service.getSetupUrl()).toThrow(ValidationError);
      await expect(service.checkLinked()).rejects.toThrow('Active forwarder is not a managed relay');
    });
  });
});
