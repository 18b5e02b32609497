import { Test } from '@nestjs/testing';

import { MonobankAdapter } from './adapters/monobank';
import { PrivatBankAdapter } from './adapters/privatbank';
import { SourceApiException, SourceDisabledException } from './exceptions';
import { Quote, SourceAdapter } from './source-adapter.interface';
import { SourceName } from './source-name.enum';
import { SourcesManagerService } from './sources-manager.service';
import { quote } from '../../test/helpers/rates.helper';
import { parseConfig } from '../config';
import { MetricsService } from '../metrics/metrics.service';

function fakeAdapter(
  name: SourceName,
  fetchQuotes: () => Promise<Quote[]>,
  enabled = true,
): SourceAdapter {
  const config = { ...parseConfig({}).sources[name], enabled };
  return { name, getConfig: () => config, fetchQuotes };
}

describe('SourcesManagerService', () => {
  const privatQuotes = [quote(SourceName.PRIVATBANK, 'USD', 39.35, 39.95)];
  let privatFetch: jest.Mock<Promise<Quote[]>, []>;
  let monoFetch: jest.Mock<Promise<Quote[]>, []>;

  const createManager = async (monobankEnabled = true) => {
    privatFetch = jest.fn().mockResolvedValue(privatQuotes);
    monoFetch = jest.fn().mockRejectedValue(
      new SourceApiException('monobank', new Error('socket hang up')),
    );

    const moduleRef = await Test.createTestingModule({
      providers: [
        SourcesManagerService,
        MetricsService,
        {
          provide: PrivatBankAdapter,
          useValue: fakeAdapter(SourceName.PRIVATBANK, privatFetch),
        },
        {
          provide: MonobankAdapter,
          useValue: fakeAdapter(SourceName.MONOBANK, monoFetch, monobankEnabled),
        },
      ],
    }).compile();

    return moduleRef.get(SourcesManagerService);
  };

  test('fetches quotes through the adapter of a source', async () => {
    const manager = await createManager();

    await expect(manager.fetchQuotes(SourceName.PRIVATBANK)).resolves.toBe(privatQuotes);
    expect(privatFetch).toHaveBeenCalledTimes(1);
  });

  test('propagates adapter failures', async () => {
    const manager = await createManager();

    await expect(manager.fetchQuotes(SourceName.MONOBANK)).rejects.toThrow(
      'API error from monobank: socket hang up',
    );
  });

  test('rejects disabled sources without calling them', async () => {
    const manager = await createManager(false);

    await expect(manager.fetchQuotes(SourceName.MONOBANK)).rejects.toBeInstanceOf(
      SourceDisabledException,
    );
    expect(monoFetch).not.toHaveBeenCalled();
    await expect(manager.fetchQuotes(SourceName.PRIVATBANK)).resolves.toBe(privatQuotes);
  });
});
