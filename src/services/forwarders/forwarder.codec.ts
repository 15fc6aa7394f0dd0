import { Forwarder, ForwarderKind } from '../../types/forwarder';
import { ConfigError } from '../../utils/errors';
import { HttpTransport } from '../http/transport';
import { HttpCallbackForwarder } from './http-callback.forwarder';
import { ManagedRelayForwarder } from './managed-relay.forwarder';
import { StdoutForwarder } from './stdout.forwarder';
import { TelegramBotForwarder } from './telegram-bot.forwarder';
import { isPlainObject, LEGACY_TAGS } from './forwarder.schemas';

const KINDS: readonly ForwarderKind[] = ['Stdout', 'HttpCallback', 'TelegramBot', 'ManagedRelay'];

export interface DecodeOptions {
  /** Random source for a regenerated confirmation code. */
  random?: () => number;
}

export function resolveTag(tag: string): ForwarderKind | undefined {
  const current = KINDS.find((kind) => kind === tag);
  if (current) return current;
  return Object.prototype.hasOwnProperty.call(LEGACY_TAGS, tag) ? LEGACY_TAGS[tag] : undefined;
}

// Records written before the tag wrapper existed carry bare fields
function inferKind(fields: Record<string, unknown>): ForwarderKind {
  if ('tgHandle' in fields || 'tgCode' in fields) return 'ManagedRelay';
  if ('token' in fields || 'chatId' in fields) return 'TelegramBot';
  if ('callbackUrl' in fields) return 'HttpCallback';
  throw new ConfigError('Unrecognized forwarder config: no variant tag');
}

export function encodeForwarder(forwarder: Forwarder): string {
  return JSON.stringify(forwarder.toConfig());
}

export function decodeForwarderRecord(
  raw: unknown,
  transport: HttpTransport,
  options: DecodeOptions = {}
): Forwarder {
  if (!isPlainObject(raw)) {
    throw new ConfigError('Forwarder config must be a JSON object');
  }

  let kind: ForwarderKind;
  let fields: Record<string, unknown>;

  const keys = Object.keys(raw);
  const tagged = keys.length === 1 && isPlainObject(raw[keys[0]]);

  if (tagged) {
    const tag = keys[0];
    const resolved = resolveTag(tag);
    if (!resolved) {
      throw new ConfigError(`Unknown forwarder type: ${tag}`);
    }
    kind = resolved;
    fields = { [tag]: raw[tag] };
  } else {
    kind = inferKind(raw);
    fields = raw;
  }

  switch (kind) {
    case 'Stdout':
      return StdoutForwarder.fromConfig(fields);
    case 'HttpCallback':
      return HttpCallbackForwarder.fromConfig(fields, transport);
    case 'TelegramBot':
      return TelegramBotForwarder.fromConfig(fields, transport);
    case 'ManagedRelay':
      return ManagedRelayForwarder.fromConfig(fields, transport, options.random);
    default: {
      const unreachable: never = kind;
      throw new ConfigError(`Unsupported forwarder type: ${String(unreachable)}`);
    }
  }
}

export function decodeForwarder(blob: string, transport: HttpTransport, options: DecodeOptions = {}): Forwarder {
  let raw: unknown;
  try {
    raw = JSON.parse(blob);
  } catch (error: unknown) {
    throw new ConfigError(`Forwarder config is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return decodeForwarderRecord(raw, transport, options);
}
