/**
 * Runs a request through the transport, consulting retry handlers after each failure.
 */

import { HttpRequest, HttpResponse, HttpTransport } from '../transport';
import { Logger, MetricsCollector, METRICS, NoopLogger, NoopMetrics, redactHeaders } from '../observability';
import { RetryHandler } from './handler';
import { RetryState } from './state';

/**
 * Upper bound on attempts, whatever the handlers say
 */
export const MAX_ATTEMPTS = 100;

export interface SendWithRetriesOptions {
  transport: HttpTransport;
  request: HttpRequest;
  retryHandlers: readonly RetryHandler[];
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Pre-seeded state, mostly useful in tests */
  state?: RetryState;
}

type Outcome = { response: HttpResponse; error?: undefined } | { response?: undefined; error: unknown };

/**
 * Send a request, retrying while some handler asks for it.
 *
 * A 2xx response is returned right away. A non-2xx response that no handler
 * wants to retry is returned as is; an error no handler wants to retry is rethrown.
 */
export async function sendWithRetries(options: SendWithRetriesOptions): Promise<HttpResponse> {
  const { transport, request, retryHandlers } = options;
  const logger = options.logger ?? new NoopLogger();
  const metrics = options.metrics ?? new NoopMetrics();
  const state = options.state ?? new RetryState();

  let outcome: Outcome | undefined;

  for (let i = 0; i < MAX_ATTEMPTS; i++) {
    state.nextAttemptRequested = false;
    logger.debug('Sending HTTP request', {
      method: request.method,
      url: request.url,
      headers: redactHeaders(request.headers),
      attempt: state.currentAttempt,
    });

    const startTime = Date.now();
    try {
      outcome = { response: await transport.request(request.url, request) };
    } catch (error) {
      outcome = { error };
    }
    const duration = Date.now() - startTime;
    const statusTag = outcome.response ? String(outcome.response.status) : 'error';
    metrics.increment(METRICS.HTTP_REQUESTS, 1, { status: statusTag });
    metrics.timing(METRICS.HTTP_DURATION, duration);

    if (outcome.response && outcome.response.status >= 200 && outcome.response.status < 300) {
      return outcome.response;
    }

    const context = { state, request, response: outcome.response, error: outcome.error };
    const handler = retryHandlers.find((h) => h.canRetry(context));
    if (!handler) {
      break;
    }

    logger.info('Retrying HTTP request', {
      handler: handler.constructor.name,
      url: request.url,
      status: statusTag,
      attempt: state.currentAttempt + 1,
    });
    metrics.increment(METRICS.HTTP_RETRIES, 1, { handler: handler.constructor.name });
    await handler.prepareForNextAttempt(context);
  }

  if (outcome === undefined) {
    throw new Error('No attempt was made');
  }
  if (outcome.response) {
    return outcome.response;
  }
  throw outcome.error;
}
