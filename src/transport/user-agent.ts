import * as os from 'os';

export const SDK_NAME = 'slack-sdk-ts';
export const SDK_VERSION = '0.1.0';

/**
 * Build the User-Agent header value: `<prefix> slack-sdk-ts/<version> node/<version> <platform>/<release> <suffix>`
 */
export function buildUserAgent(prefix?: string, suffix?: string): string {
  const parts = [
    `${SDK_NAME}/${SDK_VERSION}`,
    `node/${process.versions.node}`,
    `${os.platform()}/${os.release()}`,
  ];
  if (prefix) {
    parts.unshift(prefix);
  }
  if (suffix) {
    parts.push(suffix);
  }
  return parts.join(' ');
}
