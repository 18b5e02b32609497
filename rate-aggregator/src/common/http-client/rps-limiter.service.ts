import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { isAxiosError } from 'axios';
import Bottleneck from 'bottleneck';

import { RetryPolicy } from './types/client-params';

export interface RpsLimiterOptions extends RetryPolicy {
  rps: number | null;
  maxConcurrent: number;
}

export function isRetryableError(
  error: unknown,
  retryStatuses: readonly number[],
): boolean {
  if (!isAxiosError(error) || !error.response) {
    return false;
  }
  return retryStatuses.includes(error.response.status);
}

@Injectable()
export class RpsLimiterService implements OnModuleDestroy {
  private readonly logger = new Logger(RpsLimiterService.name);
  private readonly limiters = new Map<string, Bottleneck>();

  async onModuleDestroy(): Promise<void> {
    await this.shutdown();
  }

  getOrCreateLimiter(key: string, options: RpsLimiterOptions): Bottleneck {
    const existing = this.limiters.get(key);
    if (existing) {
      return existing;
    }

    const limiter =
      options.rps !== null && options.rps > 0
        ? new Bottleneck({
            minTime: Math.ceil(1000 / options.rps),
            maxConcurrent: options.maxConcurrent,
            reservoir: Math.max(1, Math.floor(options.rps)),
            reservoirRefreshAmount: Math.max(1, Math.floor(options.rps)),
            reservoirRefreshInterval: 1000,
          })
        : new Bottleneck({ maxConcurrent: options.maxConcurrent });

    limiter.on('error', (error) => {
      this.logger.error({ err: error }, `Rate limiter error for ${key}`);
    });

    limiter.on('failed', (error, jobInfo) => {
      const shouldRetry = isRetryableError(error, options.retryStatuses);
      const statusCode = isAxiosError(error)
        ? (error.response?.status ?? 'network-error')
        : 'unknown';
      const errorMessage =
        error instanceof Error ? error.message : String(error);

      this.logger.warn(
        `Request failed for ${key}, retries: ${jobInfo.retryCount}, status: ${statusCode}, shouldRetry: ${shouldRetry}, error: ${errorMessage}`,
      );

      if (shouldRetry && jobInfo.retryCount < options.maxRetries) {
        this.logger.debug(
          `Retrying request for ${key} in ${options.retryDelayMs}ms (attempt ${jobInfo.retryCount + 2}/${options.maxRetries + 1})`,
        );
        return options.retryDelayMs;
      }

      return undefined;
    });

    this.limiters.set(key, limiter);
    this.logger.debug(
      `Created rate limiter for ${key}: ${options.rps ?? 'unlimited'} RPS, ${options.maxConcurrent} concurrent, ${options.maxRetries} retries`,
    );

    return limiter;
  }

  executeWithLimit<T>(
    key: string,
    options: RpsLimiterOptions,
    fn: () => Promise<T>,
  ): Promise<T> {
    return this.getOrCreateLimiter(key, options).schedule(fn);
  }

  async shutdown(): Promise<void> {
    const stops: Promise<void>[] = [];

    for (const [key, limiter] of this.limiters.entries()) {
      stops.push(limiter.stop());
      this.logger.debug(`Stopping rate limiter for ${key}`);
    }

    await Promise.all(stops);
    this.limiters.clear();
  }
}
