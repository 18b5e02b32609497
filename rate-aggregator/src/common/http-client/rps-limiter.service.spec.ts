import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';

import { RpsLimiterOptions, RpsLimiterService, isRetryableError } from './rps-limiter.service';

function httpError(status: number): AxiosError {
  const config = { headers: new AxiosHeaders() };
  const response: AxiosResponse = {
    data: null,
    status,
    statusText: String(status),
    headers: {},
    config,
  };
  return new AxiosError(`status ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
}

const options: RpsLimiterOptions = {
  rps: null,
  maxConcurrent: 1,
  maxRetries: 3,
  retryDelayMs: 1,
  retryStatuses: [429],
};

describe('isRetryableError', () => {
  test('accepts only responses with a listed status', () => {
    expect(isRetryableError(httpError(429), [429])).toBe(true);
    expect(isRetryableError(httpError(503), [429])).toBe(false);
    expect(isRetryableError(new AxiosError('timeout', 'ECONNABORTED'), [429])).toBe(false);
    expect(isRetryableError(new Error('boom'), [429])).toBe(false);
  });
});

describe('RpsLimiterService', () => {
  let limiter: RpsLimiterService;

  beforeEach(() => {
    limiter = new RpsLimiterService();
  });

  afterEach(async () => {
    await limiter.shutdown();
  });

  test('retries a retryable status up to maxRetries times, then rejects', async () => {
    const fn = jest.fn().mockRejectedValue(httpError(429));

    await expect(limiter.executeWithLimit('mono', options, fn)).rejects.toBeInstanceOf(AxiosError);
    expect(fn).toHaveBeenCalledTimes(4);
  });

  test('resolves once a retried request succeeds', async () => {
    const fn = jest
      .fn()
      .mockRejectedValueOnce(httpError(429))
      .mockRejectedValueOnce(httpError(429))
      .mockResolvedValue('ok');

    await expect(limiter.executeWithLimit('mono', options, fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  test('does not retry other statuses', async () => {
    const fn = jest.fn().mockRejectedValue(httpError(500));

    await expect(limiter.executeWithLimit('mono', options, fn)).rejects.toBeInstanceOf(AxiosError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('never retries with maxRetries 0', async () => {
    const fn = jest.fn().mockRejectedValue(httpError(429));

    await expect(
      limiter.executeWithLimit('privat', { ...options, maxRetries: 0 }, fn),
    ).rejects.toBeInstanceOf(AxiosError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('reuses the limiter of a key', () => {
    const first = limiter.getOrCreateLimiter('mono', options);
    expect(limiter.getOrCreateLimiter('mono', options)).toBe(first);
    expect(limiter.getOrCreateLimiter('privat', options)).not.toBe(first);
  });
});
