/**
 * HTTP transport of the SysML v2 API client
 *
 * The client only needs GET with headers and a signal; tests swap in an
 * in-process transport.
 */

import { Agent, fetch } from 'undici';
import type { Logger } from '@sysml-sql/core';

export interface HttpRequest {
  method: 'GET';
  url: string;
  headers: Record<string, string>;
  signal: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export interface HttpTransport {
  request(request: HttpRequest): Promise<HttpResponse>;
  close?(): Promise<void>;
}

export interface UndiciTransportConfig {
  /** Skip TLS certificate verification */
  allowInvalidCerts?: boolean;
  logger?: Logger;
}

export class UndiciTransport implements HttpTransport {
  private readonly agent: Agent;

  constructor(config: UndiciTransportConfig = {}) {
    const allowInvalidCerts = config.allowInvalidCerts ?? false;
    if (allowInvalidCerts) {
      config.logger?.warn('TLS certificate verification is disabled');
    }
    this.agent = new Agent({ connect: { rejectUnauthorized: !allowInvalidCerts } });
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    return fetch(request.url, {
      method: request.method,
      headers: request.headers,
      signal: request.signal,
      dispatcher: this.agent,
    });
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}
