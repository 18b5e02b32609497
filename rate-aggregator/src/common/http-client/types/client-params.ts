import { UseProxyConfig } from '../../proxy';

export interface RetryPolicy {
  maxRetries: number;
  retryDelayMs: number;
  /**
   * Response statuses worth another attempt. Failures without a response
   * (network errors, timeouts) are never retried.
   */
  retryStatuses: number[];
}

export interface ClientParams extends RetryPolicy {
  sourceName: string;
  baseUrl: string;
  timeoutMs: number;
  rps: number | null;
  maxConcurrent: number;
  useProxy: UseProxyConfig;
}

export interface ClientOptions extends Omit<ClientParams, 'useProxy'> {
  proxyUrl?: string;
}
