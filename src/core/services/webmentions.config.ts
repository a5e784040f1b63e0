import { MentionStatus } from '../domain/enums';
import { ConfigurationError } from '../errors';
import {
  HttpTransportFactory,
  ResolvedWebmentionsConfig,
  WebmentionsConfig,
} from '../interfaces';
import { normalizeUrl } from '../parser/url.utils';

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;
export const DEFAULT_USER_AGENT = 'webmention-engine/1.0 (+https://www.w3.org/TR/webmention/)';
export const DEFAULT_CONCURRENCY = 4;

/**
 * Defaults applied under every handler configuration
 */
export const defaultWebmentionsConfig = {
  initialMentionStatus: MentionStatus.CONFIRMED,
  httpTimeoutMs: DEFAULT_HTTP_TIMEOUT_MS,
  userAgent: DEFAULT_USER_AGENT,
  concurrency: DEFAULT_CONCURRENCY,
  notifyRetractions: true,
} satisfies Partial<WebmentionsConfig>;

/**
 * Merge a configuration over the defaults and check it
 */
export function resolveWebmentionsConfig(
  config: WebmentionsConfig,
  createTransport?: HttpTransportFactory,
): ResolvedWebmentionsConfig {
  const merged = {
    ...config,
    initialMentionStatus:
      config.initialMentionStatus ??
      defaultWebmentionsConfig.initialMentionStatus,
    httpTimeoutMs: config.httpTimeoutMs ?? defaultWebmentionsConfig.httpTimeoutMs,
    userAgent: config.userAgent ?? defaultWebmentionsConfig.userAgent,
    concurrency: config.concurrency ?? defaultWebmentionsConfig.concurrency,
    notifyRetractions:
      config.notifyRetractions ?? defaultWebmentionsConfig.notifyRetractions,
  };

  if (!config.storage) {
    throw new ConfigurationError('A storage adapter is required');
  }
  if (merged.baseUrl !== undefined && normalizeUrl(merged.baseUrl) === null) {
    throw new ConfigurationError(
      `baseUrl must be an absolute http(s) URL: ${merged.baseUrl}`,
    );
  }
  if (!Number.isInteger(merged.concurrency) || merged.concurrency < 1) {
    throw new ConfigurationError(
      `concurrency must be a positive integer, got ${merged.concurrency}`,
    );
  }
  if (!(merged.httpTimeoutMs > 0)) {
    throw new ConfigurationError(
      `httpTimeoutMs must be positive, got ${merged.httpTimeoutMs}`,
    );
  }
  if (merged.initialMentionStatus === MentionStatus.DELETED) {
    throw new ConfigurationError('initialMentionStatus cannot be deleted');
  }

  const transport =
    merged.transport ??
    createTransport?.(merged.httpTimeoutMs, merged.userAgent);
  if (!transport) {
    throw new ConfigurationError(
      'An HTTP transport or a transport factory is required',
    );
  }

  return {
    ...merged,
    baseUrl: merged.baseUrl ?? null,
    transport,
  };
}
