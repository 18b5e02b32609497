import { PrivatBankAdapter } from './privatbank.adapter';
import { createConfigService } from '../../../../test/helpers/config.helper';
import { FakeHttp, FakeReply, createFakeHttp } from '../../../../test/helpers/http.helper';
import { SourceApiException, SourceUnauthorizedException } from '../../exceptions';
import { SourceName } from '../../source-name.enum';

describe('PrivatBankAdapter', () => {
  let http: FakeHttp;

  const createAdapter = (replies: FakeReply[]) => {
    const configService = createConfigService({
      sources: { privatbank: { retryDelayMs: 1 } },
    });
    http = createFakeHttp(configService, replies);
    return new PrivatBankAdapter(http.builder, configService);
  };

  afterEach(async () => {
    await http.rpsLimiter.shutdown();
  });

  test('parses decimal string rates', async () => {
    const adapter = createAdapter([
      {
        status: 200,
        data: [
          { ccy: 'EUR', base_ccy: 'UAH', buy: '42.10000', sale: '43.05000' },
          { ccy: 'USD', base_ccy: 'UAH', buy: '39.35000', sale: '39.95000' },
        ],
      },
    ]);

    const quotes = await adapter.fetchQuotes();

    expect(http.requests[0].url).toBe(
      'https://api.privatbank.ua/p24api/pubinfo?exchange&coursid=5',
    );
    expect(quotes.map(({ receivedAt: _, ...rest }) => rest)).toEqual([
      { currency: 'EUR', baseCurrency: 'UAH', buyRate: 42.1, sellRate: 43.05, source: SourceName.PRIVATBANK },
      { currency: 'USD', baseCurrency: 'UAH', buyRate: 39.35, sellRate: 39.95, source: SourceName.PRIVATBANK },
    ]);
  });

  test('makes a single attempt on 429', async () => {
    const adapter = createAdapter([{ status: 429, data: null }]);

    const error = await adapter.fetchQuotes().catch((e: unknown) => e);

    expect(http.requests).toHaveLength(1);
    expect(error).toBeInstanceOf(SourceApiException);
    expect(error).toMatchObject({ statusCode: 429, httpStatus: 400 });
  });

  test('maps 401 to an unauthorized error', async () => {
    const adapter = createAdapter([{ status: 401, data: null }]);

    await expect(adapter.fetchQuotes()).rejects.toBeInstanceOf(SourceUnauthorizedException);
  });

  test('maps server errors to bad gateway', async () => {
    const adapter = createAdapter([{ status: 503, data: null }]);

    await expect(adapter.fetchQuotes()).rejects.toMatchObject({
      name: 'SourceApiException',
      statusCode: 503,
      httpStatus: 502,
    });
  });

  test('rejects an empty list', async () => {
    const adapter = createAdapter([{ status: 200, data: [] }]);

    await expect(adapter.fetchQuotes()).rejects.toThrow(
      'API error from privatbank: Expected a non-empty array of rates',
    );
  });

  test('rejects non-numeric rates', async () => {
    const adapter = createAdapter([
      { status: 200, data: [{ ccy: 'USD', base_ccy: 'UAH', buy: 'n/a', sale: '39.9' }] },
    ]);

    await expect(adapter.fetchQuotes()).rejects.toThrow('Non-numeric rate for USD');
  });

  test('propagates network failures', async () => {
    const adapter = createAdapter([{ networkError: 'getaddrinfo ENOTFOUND api.privatbank.ua' }]);

    await expect(adapter.fetchQuotes()).rejects.toMatchObject({
      name: 'SourceApiException',
      httpStatus: 502,
    });
  });
});
