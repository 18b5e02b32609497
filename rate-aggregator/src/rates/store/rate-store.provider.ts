import { FactoryProvider, Logger } from '@nestjs/common';

import { AppConfigService } from '../../config';
import { InMemoryRateStore } from './in-memory-rate.store';
import { RATE_STORE, RateStore } from './rate-store.interface';
import { SqliteRateStore } from './sqlite-rate.store';

export const rateStoreProvider: FactoryProvider<RateStore> = {
  provide: RATE_STORE,
  inject: [AppConfigService],
  useFactory: (configService: AppConfigService): RateStore => {
    const { driver, sqlitePath } = configService.get('storage');

    if (driver === 'memory') {
      new Logger('RateStore').warn(
        'Using the in-memory rate store, the series is lost on restart',
      );
      return new InMemoryRateStore();
    }

    return new SqliteRateStore(sqlitePath);
  },
};
