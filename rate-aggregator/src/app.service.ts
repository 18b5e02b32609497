import { Injectable } from '@nestjs/common';

import { RateUpdateScheduler, SchedulerState } from './scheduler';

export interface HealthStatus {
  message: string;
  timestamp: string;
  scheduler: SchedulerState;
}

@Injectable()
export class AppService {
  constructor(private readonly scheduler: RateUpdateScheduler) {}

  getHealth(): HealthStatus {
    return {
      message: 'Exchange rate aggregator is running',
      timestamp: new Date().toISOString(),
      scheduler: this.scheduler.state,
    };
  }
}
