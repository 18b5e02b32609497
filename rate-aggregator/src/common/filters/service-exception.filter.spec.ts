import { HttpStatus } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';

import { ServiceExceptionFilter } from './service-exception.filter';
import { ServiceException } from '../exceptions/service.exception';

class TeapotException extends ServiceException {
  readonly httpStatus = HttpStatus.I_AM_A_TEAPOT;

  constructor() {
    super('No coffee here', TeapotException.name);
  }
}

class UpstreamDownException extends ServiceException {
  readonly httpStatus = HttpStatus.BAD_GATEWAY;

  constructor() {
    super('Upstream is down', UpstreamDownException.name);
  }
}

describe('ServiceExceptionFilter', () => {
  const filter = new ServiceExceptionFilter();
  let json: jest.Mock;
  let status: jest.Mock;
  let host: ExecutionContextHost;

  beforeEach(() => {
    jest.useFakeTimers({ now: new Date('2024-05-10T12:00:00.000Z') });
    json = jest.fn();
    status = jest.fn().mockReturnValue({ json });
    host = new ExecutionContextHost([
      { method: 'GET', url: '/api/exchange/last?currency=USD' },
      { status },
    ]);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test.each([
    { exception: new TeapotException(), code: 418, message: 'No coffee here' },
    { exception: new UpstreamDownException(), code: 502, message: 'Upstream is down' },
  ])('responds with $code for $exception.name', ({ exception, code, message }) => {
    filter.catch(exception, host);

    expect(status).toHaveBeenCalledWith(code);
    expect(json).toHaveBeenCalledWith({
      statusCode: code,
      timestamp: '2024-05-10T12:00:00.000Z',
      error: exception.name,
      message,
    });
  });
});
