import { Injectable, Logger } from '@nestjs/common';

import { HourlyChange, LastHourChange } from './analytics.types';
import { percentChange } from './percent-change.util';
import { Currency } from '../common';
import {
  AveragedRate,
  InsufficientDataException,
  RateCacheService,
  RateNotFoundException,
} from '../rates';

/** Derives changes of the averaged buy rate from the cached series. */
@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);

  constructor(private readonly rateCache: RateCacheService) {}

  async hourlyDynamics(currency: Currency): Promise<HourlyChange[]> {
    const rates = await this.rateCache.sinceTimestamp(currency, startOfToday());

    if (rates.length < 2) {
      this.logger.warn(`Insufficient data for hourly dynamics of ${currency}`);
      throw new InsufficientDataException(
        'Insufficient data for hourly dynamics per day',
      );
    }

    const dynamics: HourlyChange[] = [];
    for (let i = 1; i < rates.length; i++) {
      const changePercent = percentChange(rates[i - 1].buyRate, rates[i].buyRate);
      const timestamp = rates[i].timestamp;
      dynamics.push({
        timestamp,
        changePercent,
        description: `Time: ${timestamp.toISOString()}, change: ${changePercent}%`,
      });
    }

    this.logger.debug(`Hourly dynamics for ${currency}: ${dynamics.length} entries`);
    return dynamics;
  }

  async lastHourChange(currency: Currency): Promise<LastHourChange> {
    const [latest, previous] = await this.rateCache.mostRecentTwo(currency);

    if (!latest || !previous) {
      this.logger.warn(`Insufficient data for last hour change of ${currency}`);
      throw new InsufficientDataException(
        'There are not enough data to calculate the dynamics for the last hour',
      );
    }

    const changePercent = percentChange(previous.buyRate, latest.buyRate);
    return {
      currency,
      changePercent,
      description: `Dynamic for last hour for ${currency}: ${changePercent}%`,
    };
  }

  async latest(currency: Currency): Promise<AveragedRate> {
    const rate = await this.rateCache.mostRecent(currency);
    if (!rate) {
      throw new RateNotFoundException(currency);
    }
    return rate;
  }
}

function startOfToday(): Date {
  const start = new Date();
  start.setHours(0, 0, 0, 0);
  return start;
}
