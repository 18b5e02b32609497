import { Test } from '@nestjs/testing';

import { RateUpdateScheduler } from './rate-update.scheduler';
import { createConfigService } from '../../test/helpers/config.helper';
import { createDeferred, flushPromises } from '../../test/helpers/deferred';
import { quote } from '../../test/helpers/rates.helper';
import { Currency } from '../common';
import { AppConfigService } from '../config';
import { MetricsService } from '../metrics/metrics.service';
import { AveragedRate, RateAggregatorService, StorageException } from '../rates';
import {
  Quote,
  SourceApiException,
  SourceDisabledException,
  SourceName,
  SourcesManagerService,
} from '../sources';

const { PRIVATBANK, MONOBANK } = SourceName;

describe('RateUpdateScheduler', () => {
  const privatQuotes = [quote(PRIVATBANK, 'USD', 39.1, 39.6)];
  const monoQuotes = [quote(MONOBANK, 'USD', 39.3, 39.8)];

  let scheduler: RateUpdateScheduler;
  let metrics: MetricsService;
  let fetchQuotes: jest.Mock<Promise<Quote[]>, [SourceName]>;
  let aggregate: jest.Mock<Promise<AveragedRate>, [Quote[], Quote[], Currency]>;

  const savedRate = (currency: Currency): AveragedRate => ({
    id: 1,
    currency,
    buyRate: 39.2,
    sellRate: 39.7,
    timestamp: new Date(0),
  });

  const createScheduler = async (schedulerConfig: Record<string, unknown> = {}) => {
    fetchQuotes = jest.fn((source: SourceName) =>
      Promise.resolve(source === PRIVATBANK ? privatQuotes : monoQuotes),
    );
    aggregate = jest.fn((_a: Quote[], _b: Quote[], currency: Currency) =>
      Promise.resolve(savedRate(currency)),
    );

    const moduleRef = await Test.createTestingModule({
      providers: [
        RateUpdateScheduler,
        MetricsService,
        {
          provide: AppConfigService,
          useValue: createConfigService({
            scheduler: { runOnStart: false, ...schedulerConfig },
          }),
        },
        { provide: SourcesManagerService, useValue: { fetchQuotes } },
        { provide: RateAggregatorService, useValue: { aggregate } },
      ],
    }).compile();

    metrics = moduleRef.get(MetricsService);
    return moduleRef.get(RateUpdateScheduler);
  };

  const runs = async () => (await metrics.schedulerRuns.get()).values;

  beforeEach(async () => {
    scheduler = await createScheduler();
  });

  afterEach(() => {
    scheduler.onModuleDestroy();
    jest.useRealTimers();
  });

  describe('trigger', () => {
    test('fetches both providers then writes USD before EUR', async () => {
      await expect(scheduler.trigger()).resolves.toBe('completed');

      expect(fetchQuotes.mock.calls).toEqual([[PRIVATBANK], [MONOBANK]]);
      expect(aggregate.mock.calls).toEqual([
        [privatQuotes, monoQuotes, 'USD'],
        [privatQuotes, monoQuotes, 'EUR'],
      ]);
      expect(scheduler.state).toBe('idle');
      expect(await runs()).toEqual([{ value: 1, labels: { outcome: 'completed' } }]);
    });

    test('skips a trigger that arrives while a run is in progress', async () => {
      const pending = createDeferred<Quote[]>();
      fetchQuotes.mockReturnValueOnce(pending.promise);

      const first = scheduler.trigger();
      expect(scheduler.state).toBe('running');

      await expect(scheduler.trigger()).resolves.toBe('skipped');
      expect(fetchQuotes).toHaveBeenCalledTimes(1);

      pending.resolve(privatQuotes);
      await expect(first).resolves.toBe('completed');
      expect(scheduler.state).toBe('idle');
      expect(aggregate).toHaveBeenCalledTimes(2);
    });

    test('reports a failed write and returns to idle', async () => {
      aggregate
        .mockResolvedValueOnce(savedRate('USD'))
        .mockRejectedValueOnce(new StorageException('append a rate', new Error('locked')));

      await expect(scheduler.trigger()).resolves.toBe('failed');

      expect(aggregate.mock.calls.map(([, , currency]) => currency)).toEqual(['USD', 'EUR']);
      expect(scheduler.state).toBe('idle');
      expect((await metrics.errorCount.get()).values).toEqual([
        { value: 1, labels: { type: 'StorageException' } },
      ]);

      await expect(scheduler.trigger()).resolves.toBe('completed');
    });

    test('writes nothing when a provider request fails', async () => {
      fetchQuotes.mockRejectedValueOnce(
        new SourceApiException(PRIVATBANK, new Error('timeout of 10000ms exceeded')),
      );

      await expect(scheduler.trigger()).resolves.toBe('failed');

      expect(fetchQuotes).toHaveBeenCalledTimes(1);
      expect(aggregate).not.toHaveBeenCalled();
      expect(await runs()).toEqual([{ value: 1, labels: { outcome: 'failed' } }]);
    });

    test('averages with no quotes from a disabled provider', async () => {
      fetchQuotes.mockImplementation((source: SourceName) =>
        source === MONOBANK
          ? Promise.reject(new SourceDisabledException(source))
          : Promise.resolve(privatQuotes),
      );

      await expect(scheduler.trigger()).resolves.toBe('completed');

      expect(aggregate).toHaveBeenCalledWith(privatQuotes, [], 'USD');
      expect(aggregate).toHaveBeenCalledWith(privatQuotes, [], 'EUR');
    });
  });

  describe('schedule', () => {
    beforeEach(() => {
      jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
    });

    test('runs on every interval until destroyed', async () => {
      scheduler = await createScheduler({ intervalMs: 60000 });
      scheduler.onApplicationBootstrap();
      expect(fetchQuotes).not.toHaveBeenCalled();

      await jest.advanceTimersByTimeAsync(60000);
      expect(aggregate).toHaveBeenCalledTimes(2);

      await jest.advanceTimersByTimeAsync(60000);
      expect(aggregate).toHaveBeenCalledTimes(4);

      scheduler.onModuleDestroy();
      await jest.advanceTimersByTimeAsync(180000);
      expect(aggregate).toHaveBeenCalledTimes(4);
    });

    test('runs once right away when configured to', async () => {
      scheduler = await createScheduler({ intervalMs: 60000, runOnStart: true });
      scheduler.onApplicationBootstrap();

      expect(fetchQuotes).toHaveBeenCalledWith(PRIVATBANK);
      await flushPromises();
      expect(aggregate).toHaveBeenCalledTimes(2);
    });

    test('does nothing when disabled', async () => {
      scheduler = await createScheduler({ enabled: false, runOnStart: true });
      scheduler.onApplicationBootstrap();

      await jest.advanceTimersByTimeAsync(7200000);
      expect(fetchQuotes).not.toHaveBeenCalled();
    });
  });
});
