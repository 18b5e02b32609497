import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';

import { RunOutcome, SchedulerState } from './scheduler.types';
import { SUPPORTED_CURRENCIES } from '../common';
import { AppConfigService } from '../config';
import { MetricsService } from '../metrics/metrics.service';
import { RateAggregatorService } from '../rates';
import {
  Quote,
  SourceDisabledException,
  SourceName,
  SourcesManagerService,
} from '../sources';

/**
 * Fetches both providers and writes the averaged USD and EUR rates on a fixed
 * interval. At most one run executes at a time; triggers arriving while a run
 * is in progress are dropped, not queued.
 */
@Injectable()
export class RateUpdateScheduler
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(RateUpdateScheduler.name);
  private updateInterval?: NodeJS.Timeout;
  private currentState: SchedulerState = 'idle';

  constructor(
    private readonly configService: AppConfigService,
    private readonly sourcesManager: SourcesManagerService,
    private readonly rateAggregator: RateAggregatorService,
    private readonly metricsService: MetricsService,
  ) {}

  get state(): SchedulerState {
    return this.currentState;
  }

  onApplicationBootstrap(): void {
    const { enabled, intervalMs, runOnStart } = this.configService.get('scheduler');

    if (!enabled) {
      this.logger.log('Rate update scheduler is disabled in configuration');
      return;
    }

    this.logger.log(`Starting rate update scheduler with ${intervalMs}ms interval`);
    this.updateInterval = setInterval(() => this.runScheduled(), intervalMs);

    if (runOnStart) {
      this.runScheduled();
    }
  }

  onModuleDestroy(): void {
    if (this.updateInterval) {
      clearInterval(this.updateInterval);
      this.updateInterval = undefined;
      this.logger.log('Stopped rate update scheduler');
    }
  }

  async trigger(): Promise<RunOutcome> {
    if (this.currentState === 'running') {
      this.logger.warn('Rate update is already running, skipping execution');
      this.metricsService.schedulerRuns.inc({ outcome: 'skipped' });
      return 'skipped';
    }

    this.currentState = 'running';
    const endTimer = this.metricsService.schedulerRunDuration.startTimer();

    try {
      await this.updateAverageRates();
      this.logger.log('Average currency rates successfully updated');
      this.metricsService.schedulerRuns.inc({ outcome: 'completed' });
      return 'completed';
    } catch (error) {
      this.logger.error({ err: error }, 'Rate update failed');
      this.metricsService.schedulerRuns.inc({ outcome: 'failed' });
      this.metricsService.errorCount.inc({
        type: error instanceof Error ? error.name : 'unknown',
      });
      return 'failed';
    } finally {
      this.currentState = 'idle';
      endTimer();
    }
  }

  private async updateAverageRates(): Promise<void> {
    const privatBankQuotes = await this.fetchQuotes(SourceName.PRIVATBANK);
    const monobankQuotes = await this.fetchQuotes(SourceName.MONOBANK);

    for (const currency of SUPPORTED_CURRENCIES) {
      await this.rateAggregator.aggregate(privatBankQuotes, monobankQuotes, currency);
    }
  }

  private async fetchQuotes(sourceName: SourceName): Promise<Quote[]> {
    try {
      return await this.sourcesManager.fetchQuotes(sourceName);
    } catch (error) {
      if (error instanceof SourceDisabledException) {
        this.logger.warn(`Source ${sourceName} is disabled, using no quotes from it`);
        return [];
      }
      throw error;
    }
  }

  private runScheduled(): void {
    this.trigger().catch((error: unknown) => {
      this.logger.error({ err: error }, 'Unexpected rate update scheduler failure');
    });
  }
}
