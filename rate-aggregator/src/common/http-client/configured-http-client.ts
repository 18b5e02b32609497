import { HttpService } from '@nestjs/axios';
import { Logger } from '@nestjs/common';
import { AxiosRequestConfig, AxiosResponse } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';

import { HttpClient } from './interfaces/http-client.interface';
import { RpsLimiterService } from './rps-limiter.service';
import { ClientOptions } from './types/client-params';
import { sanitizeUrlForLogging } from './url-sanitizer';

export class ConfiguredHttpClient implements HttpClient {
  private readonly logger = new Logger(ConfiguredHttpClient.name);

  constructor(
    private readonly clientConfig: ClientOptions,
    private readonly httpService: HttpService,
    private readonly rpsLimiter: RpsLimiterService,
  ) {}

  get sourceName(): string {
    return this.clientConfig.sourceName;
  }

  get<T>(url: string, config?: AxiosRequestConfig): Promise<AxiosResponse<T>> {
    const requestUrl = new URL(url, this.clientConfig.baseUrl).toString();
    const requestConfig = this.buildRequestConfig(config ?? {});

    const requestFn = () => {
      this.logger.debug(`HTTP GET ${sanitizeUrlForLogging(requestUrl)}`);
      return this.httpService.axiosRef.request<T>({
        ...requestConfig,
        method: 'GET',
        url: requestUrl,
      });
    };

    return this.rpsLimiter.executeWithLimit(
      this.generateLimiterKey(requestUrl),
      {
        rps: this.clientConfig.rps,
        maxConcurrent: this.clientConfig.maxConcurrent,
        maxRetries: this.clientConfig.maxRetries,
        retryDelayMs: this.clientConfig.retryDelayMs,
        retryStatuses: this.clientConfig.retryStatuses,
      },
      requestFn,
    );
  }

  private buildRequestConfig(baseConfig: AxiosRequestConfig): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      ...baseConfig,
      timeout: this.clientConfig.timeoutMs,
    };

    if (this.clientConfig.proxyUrl) {
      config.httpsAgent = new HttpsProxyAgent(this.clientConfig.proxyUrl);
    }

    return config;
  }

  private generateLimiterKey(url: string): string {
    const hostname = new URL(url).hostname;
    return `${this.clientConfig.sourceName}-${hostname}`;
  }
}
