/**
 * Proxy settings from the environment.
 */

import { Logger } from '../observability';

const PROXY_ENV_VARIABLES = ['HTTPS_PROXY', 'https_proxy', 'HTTP_PROXY', 'http_proxy'];

/**
 * Return the first proxy URL set in the environment, if any
 */
export function loadProxyFromEnv(
  logger?: Logger,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  for (const name of PROXY_ENV_VARIABLES) {
    const value = env[name];
    if (value !== undefined && value.trim() !== '') {
      logger?.debug(`Loaded proxy URL from the ${name} environment variable`);
      return value.trim();
    }
  }
  return undefined;
}
