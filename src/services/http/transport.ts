import { HttpMethod } from '../../types/forwarder';
import { logger } from '../../utils/logger';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  /** Sent form-encoded when present. */
  body?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/** Rejects on transport failure (DNS, refused connection, timeout). */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export interface FetchTransportOptions {
  timeoutMs?: number;
}

export class FetchTransport implements HttpTransport {
  constructor(private options: FetchTransportOptions = {}) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    const { timeoutMs } = this.options;
    const hasBody = request.body !== undefined && request.method !== 'GET';

    const res = await fetch(request.url, {
      method: request.method,
      headers: hasBody ? { 'Content-Type': 'application/x-www-form-urlencoded' } : undefined,
      body: hasBody ? new URLSearchParams(request.body).toString() : undefined,
      signal: timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined,
    });

    const body = await res.text();
    logger.debug('HTTP response', { method: request.method, status: res.status });
    return { status: res.status, body };
  }
}
