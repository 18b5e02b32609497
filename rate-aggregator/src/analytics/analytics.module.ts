import { Module } from '@nestjs/common';

import { AnalyticsService } from './analytics.service';
import { ExchangeRateController } from './exchange-rate.controller';
import { RatesModule } from '../rates';
import { SchedulerModule } from '../scheduler';

@Module({
  imports: [RatesModule, SchedulerModule],
  controllers: [ExchangeRateController],
  providers: [AnalyticsService],
  exports: [AnalyticsService],
})
export class AnalyticsModule {}
