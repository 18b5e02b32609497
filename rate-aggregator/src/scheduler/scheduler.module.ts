import { Module } from '@nestjs/common';

import { RateUpdateScheduler } from './rate-update.scheduler';
import { RatesModule } from '../rates';
import { SourcesModule } from '../sources';

@Module({
  imports: [SourcesModule, RatesModule],
  providers: [RateUpdateScheduler],
  exports: [RateUpdateScheduler],
})
export class SchedulerModule {}
