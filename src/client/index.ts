/**
 * Slack Web API client.
 */

import { z } from 'zod';
import { SlackConfig, retryHandlersFromConfig } from '../config';
import { RequestError, ResponseError, SlackHttpError, fromSlackError } from '../errors';
import { ConsoleLogger, Logger, MetricsCollector, NoopMetrics } from '../observability';
import { RetryHandler, retryAfterSeconds, sendWithRetries } from '../resilience';
import { HttpMethod, HttpRequest, HttpTransport, buildUserAgent, createTransport } from '../transport';
import { SlackResponse } from '../types';

/**
 * Client options
 */
export interface ClientOptions {
  config: SlackConfig;
  transport?: HttpTransport;
  /** Replaces the handler chain derived from `config.retry` */
  retryHandlers?: RetryHandler[];
  logger?: Logger;
  metrics?: MetricsCollector;
  userAgentPrefix?: string;
  userAgentSuffix?: string;
}

/**
 * Request parameters: any plain object, so that typed parameter interfaces
 * can be passed as they are. Nested objects and arrays are sent JSON-encoded.
 */
export type RequestParams = object;

/**
 * Options for a single API call
 */
export interface ApiCallOptions {
  httpMethod?: Extract<HttpMethod, 'GET' | 'POST'>;
  /** Query string (GET) or form fields (POST) */
  params?: RequestParams;
  /** JSON body; params, if any, then go to the query string */
  json?: object;
  /** Overrides the configured token */
  token?: string;
  headers?: Record<string, string>;
}

const responseSchema = z
  .object({
    ok: z.boolean(),
    error: z.string().optional(),
    warning: z.string().optional(),
    response_metadata: z
      .object({
        next_cursor: z.string().optional(),
        warnings: z.array(z.string()).optional(),
        messages: z.array(z.string()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/**
 * Slack API Client
 */
export class SlackClient {
  readonly logger: Logger;
  readonly metrics: MetricsCollector;
  readonly retryHandlers: RetryHandler[];
  private readonly config: SlackConfig;
  private readonly transport: HttpTransport;
  private readonly userAgent: string;

  constructor(options: ClientOptions) {
    this.config = options.config;
    this.logger = options.logger ?? new ConsoleLogger({ level: options.config.logLevel });
    this.metrics = options.metrics ?? new NoopMetrics();
    this.transport =
      options.transport ??
      createTransport({ defaultTimeout: options.config.timeout, proxy: options.config.proxy });
    this.retryHandlers = options.retryHandlers ?? retryHandlersFromConfig(options.config.retry);
    this.userAgent = buildUserAgent(options.userAgentPrefix, options.userAgentSuffix);
  }

  /**
   * Call a Web API method, e.g. `chat.postMessage`
   */
  async apiCall<T extends SlackResponse = SlackResponse>(
    method: string,
    options: ApiCallOptions = {}
  ): Promise<T> {
    const request = this.buildRequest(method, options);
    const response = await sendWithRetries({
      transport: this.transport,
      request,
      retryHandlers: this.retryHandlers,
      logger: this.logger,
      metrics: this.metrics,
    });

    const data = parseBody(response.body);
    const isSuccess = response.status >= 200 && response.status < 300;

    if (!data) {
      if (isSuccess) {
        throw new ResponseError(`Failed to parse the response of ${method}`, response.body);
      }
      throw new SlackHttpError(response.status, response.body, request.url);
    }

    if (!data.ok) {
      throw fromSlackError(
        data.error ?? 'unknown_error',
        data,
        response.status,
        retryAfterSeconds(response.headers)
      );
    }

    if (!isSuccess) {
      throw new SlackHttpError(response.status, response.body, request.url);
    }

    const warnings = [...(data.warning ? [data.warning] : []), ...(data.response_metadata?.warnings ?? [])];
    if (warnings.length > 0) {
      this.logger.warn(`Received warnings from ${method}`, { warnings });
    }

    return data as T;
  }

  /**
   * Make GET request
   */
  get<T extends SlackResponse = SlackResponse>(method: string, params?: RequestParams): Promise<T> {
    return this.apiCall<T>(method, { httpMethod: 'GET', params });
  }

  /**
   * Make POST request (form-encoded)
   */
  post<T extends SlackResponse = SlackResponse>(method: string, params?: RequestParams): Promise<T> {
    return this.apiCall<T>(method, { httpMethod: 'POST', params });
  }

  /**
   * Iterate through the pages of a cursor-paginated method
   */
  async *paginate<T extends SlackResponse = SlackResponse>(
    method: string,
    params: RequestParams = {},
    options: Omit<ApiCallOptions, 'params'> = {}
  ): AsyncGenerator<T, void, unknown> {
    let cursor: string | undefined;

    do {
      const page = await this.apiCall<T>(method, {
        httpMethod: 'GET',
        ...options,
        params: cursor ? { ...params, cursor } : params,
      });
      yield page;
      cursor = page.response_metadata?.next_cursor || undefined;
    } while (cursor);
  }

  /**
   * Get all items from a paginated method
   */
  async getAllPages<T, R extends SlackResponse = SlackResponse>(
    method: string,
    params: RequestParams,
    extractor: (response: R) => T[],
    limit?: number
  ): Promise<T[]> {
    const allItems: T[] = [];

    for await (const page of this.paginate<R>(method, params)) {
      allItems.push(...extractor(page));
      if (limit && allItems.length >= limit) {
        return allItems.slice(0, limit);
      }
    }

    return allItems;
  }

  /**
   * Get config
   */
  getConfig(): SlackConfig {
    return this.config;
  }

  private buildRequest(method: string, options: ApiCallOptions): HttpRequest {
    const httpMethod = options.httpMethod ?? 'POST';
    if (!API_METHOD_PATTERN.test(method)) {
      throw new RequestError(`Invalid API method name: '${method}'`);
    }
    if (options.json && httpMethod === 'GET') {
      throw new RequestError(`${method}: a JSON body cannot be sent with GET`);
    }
    const headers: Record<string, string> = {
      ...this.config.defaultHeaders,
      'User-Agent': this.userAgent,
      ...options.headers,
    };

    // An explicit Authorization header (e.g. Basic auth for oauth.v2.access) beats the configured token
    const hasAuthorization = Object.keys(headers).some((name) => name.toLowerCase() === 'authorization');
    const token =
      options.token ??
      (hasAuthorization ? undefined : this.config.botToken?.value ?? this.config.userToken?.value);
    if (token) {
      headers['Authorization'] = `Bearer ${token}`;
    }

    const base = this.config.baseUrl.endsWith('/') ? this.config.baseUrl : `${this.config.baseUrl}/`;
    let url = `${base}${method}`;
    let body: string | undefined;

    if (httpMethod === 'GET' || options.json) {
      url = appendQuery(url, options.params);
    }
    if (options.json) {
      headers['Content-Type'] = 'application/json;charset=utf-8';
      body = JSON.stringify(options.json);
    } else if (httpMethod === 'POST') {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = encodeParams(options.params).toString();
    }

    return { url, method: httpMethod, headers, body, timeout: this.config.timeout };
  }
}

/** Dotted method names such as `chat.postMessage` */
const API_METHOD_PATTERN = /^[A-Za-z][A-Za-z0-9]*(\.[A-Za-z][A-Za-z0-9]*)*$/;

/**
 * Encode parameters; undefined and null are dropped, objects JSON-encoded
 */
export function encodeParams(params?: RequestParams): URLSearchParams {
  const searchParams = new URLSearchParams();
  if (!params) {
    return searchParams;
  }
  const entries: [string, unknown][] = Object.entries(params);
  for (const [key, value] of entries) {
    if (value === undefined || value === null) {
      continue;
    }
    searchParams.set(key, typeof value === 'object' ? JSON.stringify(value) : String(value));
  }
  return searchParams;
}

function appendQuery(url: string, params?: RequestParams): string {
  const queryString = encodeParams(params).toString();
  return queryString ? `${url}?${queryString}` : url;
}

function parseBody(body: string): z.infer<typeof responseSchema> | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return undefined;
  }
  const result = responseSchema.safeParse(json);
  return result.success ? result.data : undefined;
}

/**
 * Create Slack client from config
 */
export function createClientFromConfig(
  config: SlackConfig,
  options: Omit<ClientOptions, 'config'> = {}
): SlackClient {
  return new SlackClient({ ...options, config });
}
