import { Injectable, Logger } from '@nestjs/common';
import { ModuleRef } from '@nestjs/core';

import { SourceApiException, SourceDisabledException } from './exceptions';
import { Quote, SourceAdapter } from './source-adapter.interface';
import { SourceName } from './source-name.enum';
import { SOURCES_MAP } from './sources.providers';
import { MetricsService } from '../metrics/metrics.service';

@Injectable()
export class SourcesManagerService {
  private readonly logger = new Logger(SourcesManagerService.name);
  private readonly adaptersCache = new Map<SourceName, SourceAdapter>();

  constructor(
    private readonly moduleRef: ModuleRef,
    private readonly metricsService: MetricsService,
  ) {}

  async fetchQuotes(sourceName: SourceName): Promise<Quote[]> {
    const adapter = this.getAdapterByName(sourceName);
    this.logger.debug(`Fetching quotes from ${adapter.name}`);

    const endTimer = this.metricsService.fetchLatency.startTimer({
      source: adapter.name,
    });

    try {
      const quotes = await adapter.fetchQuotes();
      this.metricsService.quotesReceived.inc({ source: adapter.name }, quotes.length);
      return quotes;
    } catch (error) {
      if (error instanceof SourceApiException) {
        this.metricsService.sourceApiErrors.inc({
          source: adapter.name,
          status_code: error.statusCode?.toString() ?? 'none',
          error_type: 'request',
        });
      }
      throw error;
    } finally {
      endTimer();
    }
  }

  private getAdapterByName(sourceName: SourceName): SourceAdapter {
    const adapter = this.resolveAdapter(sourceName);
    if (!adapter.getConfig().enabled) {
      throw new SourceDisabledException(sourceName);
    }
    return adapter;
  }

  private resolveAdapter(sourceName: SourceName): SourceAdapter {
    const cached = this.adaptersCache.get(sourceName);
    if (cached) {
      return cached;
    }

    const adapter = this.moduleRef.get(SOURCES_MAP[sourceName]);
    this.adaptersCache.set(sourceName, adapter);
    return adapter;
  }
}
