import { AxiosRequestConfig, AxiosResponse } from 'axios';

/**
 * Read-only client bound to one quote source: its base URL, limiter, retry
 * policy and proxy are fixed at build time.
 */
export interface HttpClient {
  readonly sourceName: string;
  get<T>(url: string, config?: AxiosRequestConfig): Promise<AxiosResponse<T>>;
}
