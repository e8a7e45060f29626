import { Logger } from '@sysml-sql/core';
import type { HttpRequest, HttpResponse, HttpTransport } from '../src/index.js';

export type FakeReply =
  | { status?: number; body?: unknown; raw?: string; link?: string }
  | { error: unknown }
  | 'hang';

/**
 * In-process transport answering from per-URL reply queues
 *
 * The last reply of a queue repeats; unknown URLs get a 404.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly routes = new Map<string, FakeReply[]>();

  on(url: string, ...replies: FakeReply[]): this {
    this.routes.set(url, replies);
    return this;
  }

  get urls(): string[] {
    return this.requests.map((request) => request.url);
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const queue = this.routes.get(request.url) ?? [];
    const reply = queue.length > 1 ? queue.shift() : queue[0];

    if (reply === undefined) return response(404, 'not found');
    if (reply === 'hang') {
      return new Promise<HttpResponse>((_resolve, reject) => {
        request.signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    }
    if ('error' in reply) throw reply.error;
    return response(reply.status ?? 200, reply.raw ?? JSON.stringify(reply.body ?? []), reply.link);
  }
}

function response(status: number, text: string, link?: string): HttpResponse {
  return {
    status,
    headers: { get: (name) => (name.toLowerCase() === 'link' ? link ?? null : null) },
    text: async () => text,
  };
}

export function nextLink(url: string): string {
  return `<${url}>; rel="next"`;
}

export function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({ level: 'trace', sink: (line) => void lines.push(line) });
  return { logger, lines };
}
