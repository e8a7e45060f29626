/**
 * SysML v2 API Client
 *
 * Reads projects, branches and the elements of a commit from a SysML v2 REST
 * API server. Collections are cursor-paginated: every response may carry a
 * `Link` header whose `rel="next"` URL points at the following page. Pages are
 * requested one after the other, since each cursor is only known once the
 * previous response has arrived.
 */

import parseLinkHeader from 'parse-link-header';
import type { z } from 'zod';
import {
  FetchError,
  Logger,
  ProgressReporter,
  errorMessage,
  formatZodIssues,
  isPlainObject,
  isTransientFetchError,
  withRetries,
  withTimeout,
  type RetryConfig,
} from '@sysml-sql/core';
import { branchSchema, projectSchema, type Branch, type Project } from './api-types.js';
import { UndiciTransport, type HttpTransport } from './transport.js';

export interface SysmlCredentials {
  username?: string;
  password?: string;
}

export interface SysmlApiClientConfig {
  /** API root, e.g. `https://sysml.example.org:9000` */
  baseUrl: string;
  credentials?: SysmlCredentials;
  /** Skip TLS certificate verification of the default transport */
  allowInvalidCerts?: boolean;
  /** Per-request timeout in milliseconds (default: 30000) */
  requestTimeoutMs?: number;
  /** Limit for one whole operation, e.g. a complete element fetch */
  timeoutMs?: number;
  /** Default: 3 attempts */
  retries?: RetryConfig;
  transport?: HttpTransport;
  logger?: Logger;
  /** Replaces the backoff sleep between attempts */
  sleep?: (ms: number) => Promise<void>;
}

export interface FetchElementsOptions {
  /** `page[size]` of every request; server default when omitted */
  pageSize?: number;
}

interface ApiResponse {
  url: string;
  link: string | null;
  body: unknown;
}

const DEFAULT_RETRIES: RetryConfig = { attempts: 3 };

/** Node.js codes of certificate validation failures */
const TLS_ERROR_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_UNTRUSTED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
]);

/** First string `code` along the `cause` chain */
function systemErrorCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && typeof current.code === 'string') return current.code;
    current = 'cause' in current ? current.cause : undefined;
  }
  return undefined;
}

function normalizeBaseUrl(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, '');
  try {
    const url = new URL(trimmed);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new Error(`unsupported protocol ${url.protocol}`);
    }
  } catch (err) {
    throw new FetchError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid API base URL ${JSON.stringify(baseUrl)}: ${errorMessage(err)}`,
      suggestion: 'Pass an absolute http(s) URL, e.g. https://sysml.example.org:9000',
    });
  }
  return trimmed;
}

function authorizationHeader(credentials: SysmlCredentials | undefined): string | undefined {
  if (!credentials) return undefined;
  const { username, password } = credentials;
  if (password !== undefined && username === undefined) {
    throw new FetchError({
      code: 'CONFIGURATION_ERROR',
      message: 'A password was given without a username',
      suggestion: 'Set SYSML_USERNAME together with SYSML_PASSWORD.',
    });
  }
  if (username === undefined) return undefined;
  return `Basic ${Buffer.from(`${username}:${password ?? ''}`).toString('base64')}`;
}

export class SysmlApiClient {
  readonly baseUrl: string;
  private readonly authorization?: string;
  private readonly requestTimeoutMs: number;
  private readonly timeoutMs?: number;
  private readonly retries: RetryConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(config: SysmlApiClientConfig) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.authorization = authorizationHeader(config.credentials);
    this.requestTimeoutMs = config.requestTimeoutMs ?? 30_000;
    this.timeoutMs = config.timeoutMs;
    this.retries = config.retries ?? DEFAULT_RETRIES;
    this.logger = config.logger ?? new Logger();
    this.transport =
      config.transport ??
      new UndiciTransport({ allowInvalidCerts: config.allowInvalidCerts, logger: this.logger });
    this.sleep = config.sleep;
  }

  /**
   * Every project on the server
   */
  async listProjects(): Promise<Project[]> {
    return this.run('Listing projects', async (signal) => {
      const records = await this.collect(`${this.baseUrl}/projects`, signal);
      return records.map((record) => this.validate(projectSchema, record, 'project'));
    });
  }

  async getProject(projectId: string): Promise<Project> {
    return this.run(`Reading project ${projectId}`, async (signal) => {
      const response = await this.get(`${this.baseUrl}/projects/${encodeURIComponent(projectId)}`, signal);
      return this.validate(projectSchema, response.body, 'project');
    });
  }

  async listBranches(projectId: string): Promise<Branch[]> {
    return this.run(`Listing branches of project ${projectId}`, async (signal) => {
      const records = await this.collect(
        `${this.baseUrl}/projects/${encodeURIComponent(projectId)}/branches`,
        signal
      );
      return records.map((record) => this.validate(branchSchema, record, 'branch'));
    });
  }

  async getBranch(projectId: string, branchId: string): Promise<Branch> {
    return this.run(`Reading branch ${branchId}`, async (signal) => {
      const response = await this.get(
        `${this.baseUrl}/projects/${encodeURIComponent(projectId)}/branches/${encodeURIComponent(branchId)}`,
        signal
      );
      return this.validate(branchSchema, response.body, 'branch');
    });
  }

  /**
   * All element records of one commit, in page order
   *
   * Either the complete collection is returned or the call fails; partial
   * results are never handed out.
   */
  async fetchElements(
    projectId: string,
    commitId: string,
    options: FetchElementsOptions = {}
  ): Promise<unknown[]> {
    const query = options.pageSize !== undefined ? `?page[size]=${options.pageSize}` : '';
    const url =
      `${this.baseUrl}/projects/${encodeURIComponent(projectId)}` +
      `/commits/${encodeURIComponent(commitId)}/elements${query}`;
    const progress = new ProgressReporter(this.logger, { unit: 'elements' });
    let pages = 0;

    const records = await this.run(`Fetching elements of commit ${commitId}`, (signal) =>
      this.collect(url, signal, (count) => {
        pages++;
        progress.add(count, { pages });
      })
    );
    progress.finish({ pages });
    return records;
  }

  async close(): Promise<void> {
    await this.transport.close?.();
  }

  /**
   * Run one operation under the overall timeout
   *
   * On expiry the in-flight request is aborted through the shared signal.
   */
  private async run<T>(operation: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const timeoutMs = this.timeoutMs;
    return withTimeout(fn, timeoutMs, () =>
      new FetchError({
        code: 'TIMEOUT',
        message: `${operation} did not finish within ${timeoutMs}ms`,
        suggestion: 'Raise the overall timeout (fetch.timeoutMs) or use a larger page size.',
        context: { timeoutMs },
      })
    );
  }

  /**
   * Follow `rel="next"` links from `firstUrl` until a page carries none
   */
  private async collect(
    firstUrl: string,
    signal: AbortSignal,
    onPage?: (count: number) => void
  ): Promise<unknown[]> {
    const visited = new Set<string>();
    const records: unknown[] = [];
    let url: string | undefined = new URL(firstUrl).toString();

    while (url !== undefined) {
      visited.add(url);
      const response = await this.get(url, signal);
      const page = response.body;
      if (!Array.isArray(page)) {
        throw new FetchError({
          code: 'MALFORMED_PAGINATION',
          message: `Page ${url} is not a JSON array`,
          suggestion: 'Check that the base URL points at the SysML v2 API root.',
          context: { url },
        });
      }
      for (const [index, record] of page.entries()) {
        if (!isPlainObject(record)) {
          throw new FetchError({
            code: 'MALFORMED_RESPONSE',
            message: `Entry #${index} of page ${url} is not an object`,
            context: { url, index },
          });
        }
        records.push(record);
      }
      onPage?.(page.length);

      const next = this.nextUrl(response);
      if (next !== undefined && page.length === 0) {
        this.logger.warn('Empty page with a next link, stopping', { url, next });
        break;
      }
      if (next !== undefined && visited.has(next)) {
        throw new FetchError({
          code: 'MALFORMED_PAGINATION',
          message: `Page ${url} links back to the already fetched page ${next}`,
          suggestion: 'The server repeats a cursor; retry later or report the server bug.',
          context: { url, next },
        });
      }
      url = next;
    }

    return records;
  }

  private nextUrl(response: ApiResponse): string | undefined {
    const header = response.link?.trim();
    if (!header) return undefined;

    const malformed = (reason: string) =>
      new FetchError({
        code: 'MALFORMED_PAGINATION',
        message: `Malformed Link header on ${response.url}: ${reason}`,
        context: { url: response.url, link: header },
      });

    let links: ReturnType<typeof parseLinkHeader>;
    try {
      links = parseLinkHeader(header);
    } catch (err) {
      throw malformed(errorMessage(err));
    }
    if (!links || Object.keys(links).length === 0) {
      throw malformed('no link relation found');
    }

    const next = links['next'];
    if (!next) return undefined;
    try {
      return new URL(next.url, response.url).toString();
    } catch {
      throw malformed(`unparsable next URL ${JSON.stringify(next.url)}`);
    }
  }

  /**
   * GET with retries of transient failures
   */
  private async get(url: string, signal: AbortSignal): Promise<ApiResponse> {
    try {
      return await withRetries(
        () => this.attempt(url, signal),
        this.retries,
        isTransientFetchError,
        {
          onRetry: (err, next) =>
            this.logger.warn('Request failed, retrying', {
              url,
              attempt: next.attempt,
              attempts: next.attempts,
              delayMs: next.delayMs,
              error: errorMessage(err),
            }),
          sleep: this.sleep,
        }
      );
    } catch (err) {
      if (!isTransientFetchError(err)) throw err;
      const attempts = Math.max(1, this.retries.attempts ?? 1);
      throw new FetchError({
        code: 'TRANSIENT_EXHAUSTED',
        message: `GET ${url} failed after ${attempts} attempt(s): ${errorMessage(err)}`,
        suggestion: 'Check that the server is up, or raise fetch.retries.attempts.',
        cause: err instanceof Error ? err : undefined,
        context: { url, attempts },
      });
    }
  }

  private async attempt(url: string, overall: AbortSignal): Promise<ApiResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    const onAbort = () => controller.abort();
    if (overall.aborted) controller.abort();
    overall.addEventListener('abort', onAbort, { once: true });

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.authorization) headers['Authorization'] = this.authorization;

    this.logger.debug('GET', { url });
    let status: number;
    let link: string | null;
    let text: string;
    try {
      const response = await this.transport.request({
        method: 'GET',
        url,
        headers,
        signal: controller.signal,
      });
      status = response.status;
      link = response.headers.get('link');
      text = await response.text();
    } catch (err) {
      throw this.transportError(err, url, overall.aborted, controller.signal.aborted);
    } finally {
      clearTimeout(timeout);
      overall.removeEventListener('abort', onAbort);
    }

    if (status < 200 || status > 299) {
      throw this.statusError(status, url, text);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      throw new FetchError({
        code: 'MALFORMED_RESPONSE',
        message: `Response of ${url} is not valid JSON: ${errorMessage(err)}`,
        context: { url, status },
      });
    }
    return { url, link, body };
  }

  private transportError(
    err: unknown,
    url: string,
    overallAborted: boolean,
    requestAborted: boolean
  ): FetchError {
    if (overallAborted) {
      return new FetchError({
        code: 'TIMEOUT',
        message: `Request to ${url} was aborted by the overall timeout`,
        context: { url },
      });
    }
    if (requestAborted) {
      return new FetchError({
        code: 'TIMEOUT',
        message: `Request to ${url} timed out after ${this.requestTimeoutMs}ms`,
        suggestion: 'Raise fetch.requestTimeoutMs or use a smaller page size.',
        context: { url, timeoutMs: this.requestTimeoutMs },
      });
    }

    const code = systemErrorCode(err);
    const cause = err instanceof Error ? err : undefined;
    if (code !== undefined && TLS_ERROR_CODES.has(code)) {
      return new FetchError({
        code: 'TLS_FAILURE',
        message: `TLS certificate of ${new URL(url).host} was rejected (${code})`,
        suggestion: 'Install the server certificate, or pass --allow-invalid-certs for a trusted test server.',
        cause,
        context: { url, systemCode: code },
      });
    }
    return new FetchError({
      code: 'CONNECTION_FAILED',
      message: `Failed to connect to ${url}: ${errorMessage(err)}${code ? ` (${code})` : ''}`,
      suggestion: 'Check the base URL and network connectivity.',
      cause,
      context: { url, systemCode: code },
    });
  }

  private statusError(status: number, url: string, text: string): FetchError {
    const context = { url, status, body: text.slice(0, 200) };
    if (status >= 500) {
      return new FetchError({
        code: 'SERVER_ERROR',
        message: `GET ${url} returned HTTP ${status}`,
        context,
      });
    }

    let suggestion: string | undefined;
    if (status === 401 || status === 403) {
      suggestion = 'Check SYSML_USERNAME and SYSML_PASSWORD.';
    } else if (status === 404) {
      suggestion = 'Check the project and commit identifiers.';
    }
    return new FetchError({
      code: 'HTTP_STATUS',
      message: `GET ${url} returned HTTP ${status}`,
      suggestion,
      context,
    });
  }

  private validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
    const parsed = schema.safeParse(value);
    if (parsed.success) return parsed.data;
    throw new FetchError({
      code: 'MALFORMED_RESPONSE',
      message: formatZodIssues(`Unexpected ${what} record`, parsed.error),
    });
  }
}
