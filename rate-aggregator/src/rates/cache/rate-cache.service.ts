import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';

import { ReadThroughCache } from './read-through.cache';
import { Currency } from '../../common';
import { MetricsService } from '../../metrics/metrics.service';
import { AveragedRate } from '../averaged-rate.interface';
import { RATE_STORE, RateStore } from '../store';

/** Read-through views over the rate store, invalidated per currency on write. */
@Injectable()
export class RateCacheService implements OnModuleDestroy {
  private readonly logger = new Logger(RateCacheService.name);
  private readonly lastRate: ReadThroughCache<AveragedRate | null>;
  private readonly lastTwoRates: ReadThroughCache<readonly AveragedRate[]>;
  private readonly ratesSince: ReadThroughCache<readonly AveragedRate[]>;

  constructor(
    @Inject(RATE_STORE) private readonly store: RateStore,
    private readonly metricsService: MetricsService,
  ) {
    this.lastRate = this.createCache('lastRate');
    this.lastTwoRates = this.createCache('lastTwoRates');
    this.ratesSince = this.createCache('ratesSince');
  }

  onModuleDestroy(): void {
    this.lastRate.close();
    this.lastTwoRates.close();
    this.ratesSince.close();
  }

  mostRecent(currency: Currency): Promise<AveragedRate | null> {
    return this.lastRate.getOrLoad(currency, async () => {
      const [latest] = await this.store.findRecent(currency, 1);
      return latest ?? null;
    });
  }

  /** Up to two records, newest first. */
  mostRecentTwo(currency: Currency): Promise<readonly AveragedRate[]> {
    return this.lastTwoRates.getOrLoad(currency, async () =>
      Object.freeze(await this.store.findRecent(currency, 2)),
    );
  }

  sinceTimestamp(currency: Currency, since: Date): Promise<readonly AveragedRate[]> {
    return this.ratesSince.getOrLoad(sinceKey(currency, since), async () =>
      Object.freeze(await this.store.findSince(currency, since)),
    );
  }

  invalidate(currency: Currency): void {
    this.lastRate.invalidate(currency);
    this.lastTwoRates.invalidate(currency);
    this.ratesSince.invalidatePrefix(sinceKey(currency));
    this.logger.debug(`Invalidated cached rates for ${currency}`);
  }

  private createCache<T>(name: string): ReadThroughCache<T> {
    return new ReadThroughCache<T>(name, {
      onHit: () => this.metricsService.cacheHits.inc({ cache: name }),
      onMiss: () => this.metricsService.cacheMisses.inc({ cache: name }),
    });
  }
}

function sinceKey(currency: Currency, since?: Date): string {
  return since ? `${currency}@${since.toISOString()}` : `${currency}@`;
}
