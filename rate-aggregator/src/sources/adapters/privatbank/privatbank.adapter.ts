import { Injectable, Logger } from '@nestjs/common';

import { PrivatBankRate } from './privatbank.types';
import { HttpClient, HttpClientBuilder } from '../../../common';
import { AppConfigService } from '../../../config';
import { HandleSourceError } from '../../decorators';
import { SourceApiException } from '../../exceptions';
import {
  Quote,
  SourceAdapter,
  SourceAdapterConfig,
} from '../../source-adapter.interface';
import { SourceName } from '../../source-name.enum';

// coursid=5: cash rates of bank branches
const API_PATH = '/p24api/pubinfo?exchange&coursid=5';

@Injectable()
export class PrivatBankAdapter implements SourceAdapter {
  readonly name = SourceName.PRIVATBANK;
  private readonly logger = new Logger(PrivatBankAdapter.name);
  private readonly sourceConfig: SourceAdapterConfig;
  private readonly httpClient: HttpClient;

  constructor(
    httpClientBuilder: HttpClientBuilder,
    configService: AppConfigService,
  ) {
    this.sourceConfig = configService.getSourceConfig('privatbank');

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
    const { data } = await this.httpClient.get<unknown>(API_PATH);

    if (!Array.isArray(data) || data.length === 0) {
      throw new SourceApiException(
        this.name,
        new Error('Expected a non-empty array of rates'),
      );
    }

    const receivedAt = new Date();
    const quotes = data.map((entry) => this.toQuote(entry, receivedAt));
    this.logger.debug(`Received ${quotes.length} quotes`);

    return quotes;
  }

  private toQuote(entry: unknown, receivedAt: Date): Quote {
    if (!isPrivatBankRate(entry)) {
      throw new SourceApiException(
        this.name,
        new Error(`Malformed rate entry: ${JSON.stringify(entry)}`),
      );
    }

    const buyRate = Number(entry.buy);
    const sellRate = Number(entry.sale);
    if (!Number.isFinite(buyRate) || !Number.isFinite(sellRate)) {
      throw new SourceApiException(
        this.name,
        new Error(`Non-numeric rate for ${entry.ccy}`),
      );
    }

    return {
      currency: entry.ccy,
      baseCurrency: entry.base_ccy,
      buyRate,
      sellRate,
      source: this.name,
      receivedAt,
    };
  }
}

function isPrivatBankRate(value: unknown): value is PrivatBankRate {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'ccy' in value &&
    typeof value.ccy === 'string' &&
    'base_ccy' in value &&
    typeof value.base_ccy === 'string' &&
    'buy' in value &&
    typeof value.buy === 'string' &&
    'sale' in value &&
    typeof value.sale === 'string'
  );
}
