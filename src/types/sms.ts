export interface SmsMessage {
  readonly sender: string;
  readonly body: string;
  /** Epoch milliseconds. */
  readonly timestamp: number;
  /** Device-local conversation id. Never forwarded. */
  readonly threadId?: number | string;
}

/** Flat field mapping of a message as it goes out on the wire. */
export function messageFields(sms: SmsMessage): Record<string, string> {
  return {
    sender: sms.sender,
    body: sms.body,
    timestamp: String(sms.timestamp),
  };
}
