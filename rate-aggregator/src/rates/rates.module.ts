import { Module } from '@nestjs/common';

import { RateCacheService } from './cache/rate-cache.service';
import { RateAggregatorService } from './rate-aggregator.service';
import { rateStoreProvider } from './store';

@Module({
  providers: [rateStoreProvider, RateCacheService, RateAggregatorService],
  exports: [RateCacheService, RateAggregatorService],
})
export class RatesModule {}
