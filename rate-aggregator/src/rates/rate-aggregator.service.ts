import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import Bottleneck from 'bottleneck';

import { AveragedRate } from './averaged-rate.interface';
import { RateCacheService } from './cache/rate-cache.service';
import { RATE_STORE, RateStore } from './store';
import { Currency, matchesCurrency, roundToCents } from '../common';
import { MetricsService } from '../metrics/metrics.service';
import { Quote } from '../sources';

interface RatePair {
  buyRate: number;
  sellRate: number;
}

const MISSING_QUOTE: RatePair = { buyRate: 0, sellRate: 0 };

/**
 * Averages both providers' quotes for a currency and persists the result.
 * Writes of all currencies are serialized through one critical section.
 */
@Injectable()
export class RateAggregatorService implements OnModuleDestroy {
  private readonly logger = new Logger(RateAggregatorService.name);
  private readonly criticalSection = new Bottleneck({ maxConcurrent: 1 });

  constructor(
    @Inject(RATE_STORE) private readonly store: RateStore,
    private readonly rateCache: RateCacheService,
    private readonly metricsService: MetricsService,
  ) {}

  async onModuleDestroy(): Promise<void> {
    await this.criticalSection.stop({ dropWaitingJobs: false });
  }

  aggregate(
    quotesA: readonly Quote[],
    quotesB: readonly Quote[],
    currency: Currency,
  ): Promise<AveragedRate> {
    return this.criticalSection.schedule(() =>
      this.averageAndPersist(quotesA, quotesB, currency),
    );
  }

  private async averageAndPersist(
    quotesA: readonly Quote[],
    quotesB: readonly Quote[],
    currency: Currency,
  ): Promise<AveragedRate> {
    this.logger.log(`Saving average rate for ${currency}`);

    // A provider without a quote for the currency contributes zero
    const a = findQuote(quotesA, currency) ?? MISSING_QUOTE;
    const b = findQuote(quotesB, currency) ?? MISSING_QUOTE;

    const buyRate = roundToCents((a.buyRate + b.buyRate) / 2);
    const sellRate = roundToCents((a.sellRate + b.sellRate) / 2);

    let saved: AveragedRate;
    try {
      saved = await this.store.append({
        currency,
        buyRate,
        sellRate,
        timestamp: new Date(),
      });
    } catch (error) {
      this.metricsService.aggregationWrites.inc({ currency, status: 'error' });
      throw error;
    }

    this.rateCache.invalidate(currency);
    this.metricsService.recordWrite(currency, buyRate, sellRate);
    this.logger.log({ currency, buyRate, sellRate }, 'Average rate saved');

    return saved;
  }
}

function findQuote(quotes: readonly Quote[], currency: Currency): Quote | undefined {
  return quotes.find((quote) => matchesCurrency(quote.currency, currency));
}
