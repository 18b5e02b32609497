import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { AxiosError, isAxiosError } from 'axios';

import {
  MonobankRate,
  NUMERIC_CURRENCY_CODES,
  UAH_NUMERIC_CODE,
} from './monobank.types';
import { BASE_CURRENCY, HttpClient, HttpClientBuilder } from '../../../common';
import { AppConfigService } from '../../../config';
import { MetricsService } from '../../../metrics/metrics.service';
import { HandleSourceError } from '../../decorators';
import { SourceApiException } from '../../exceptions';
import {
  Quote,
  SourceAdapter,
  SourceAdapterConfig,
} from '../../source-adapter.interface';
import { SourceName } from '../../source-name.enum';

const API_PATH = '/bank/currency';

/**
 * Monobank publishes its rates on a heavily rate-limited endpoint. 429s are
 * retried by the client's limiter; an HTTP error left after that yields an
 * empty list instead of failing the run. Failures without a response
 * (timeouts, DNS, refused connections) still propagate.
 */
@Injectable()
export class MonobankAdapter implements SourceAdapter {
  readonly name = SourceName.MONOBANK;
  private readonly logger = new Logger(MonobankAdapter.name);
  private readonly sourceConfig: SourceAdapterConfig;
  private readonly httpClient: HttpClient;

  constructor(
    httpClientBuilder: HttpClientBuilder,
    configService: AppConfigService,
    private readonly metricsService: MetricsService,
  ) {
    this.sourceConfig = configService.getSourceConfig('monobank');

    this.httpClient = httpClientBuilder.build({
      sourceName: this.name,
      ...this.sourceConfig,
    });
  }

  getConfig(): SourceAdapterConfig {
    return this.sourceConfig;
  }

  @HandleSourceError()
  async fetchQuotes(): Promise<Quote[]> {
    let data: unknown;
    try {
      ({ data } = await this.httpClient.get<unknown>(API_PATH));
    } catch (error) {
      if (isAxiosError(error) && error.response) {
        this.reportErrorResponse(error, error.response.status);
        return [];
      }
      throw error;
    }

    if (!Array.isArray(data)) {
      throw new SourceApiException(
        this.name,
        new Error('Expected an array of currency rates'),
      );
    }

    const receivedAt = new Date();
    const quotes: Quote[] = [];

    for (const entry of data) {
      if (!isMonobankRate(entry) || entry.currencyCodeB !== UAH_NUMERIC_CODE) {
        continue;
      }
      const currency = NUMERIC_CURRENCY_CODES[entry.currencyCodeA];
      if (!currency) {
        continue;
      }
      quotes.push({
        currency,
        baseCurrency: BASE_CURRENCY,
        buyRate: entry.rateBuy ?? 0,
        sellRate: entry.rateSell ?? 0,
        source: this.name,
        receivedAt,
      });
    }

    this.logger.debug(`Received ${quotes.length} quotes out of ${data.length} entries`);
    return quotes;
  }

  private reportErrorResponse(error: AxiosError, status: number): void {
    this.metricsService.sourceApiErrors.inc({
      source: this.name,
      status_code: String(status),
      error_type: 'http',
    });

    if (status === HttpStatus.TOO_MANY_REQUESTS) {
      this.metricsService.rateLimitHits.inc({ source: this.name });
      this.logger.error(
        { err: error, status },
        'Rate limited by Monobank after all retries, continuing without its quotes',
      );
      return;
    }

    this.logger.warn(
      { status, message: error.message },
      'Monobank responded with an error, continuing without its quotes',
    );
  }
}

function isMonobankRate(value: unknown): value is MonobankRate {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'currencyCodeA' in value &&
    typeof value.currencyCodeA === 'number' &&
    'currencyCodeB' in value &&
    typeof value.currencyCodeB === 'number' &&
    (!('rateBuy' in value) || isOptionalNumber(value.rateBuy)) &&
    (!('rateSell' in value) || isOptionalNumber(value.rateSell))
  );
}

function isOptionalNumber(value: unknown): boolean {
  return value === undefined || typeof value === 'number';
}
