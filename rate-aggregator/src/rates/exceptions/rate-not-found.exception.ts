import { HttpStatus } from '@nestjs/common';

import { ServiceException } from '../../common';

export class RateNotFoundException extends ServiceException {
  readonly httpStatus = HttpStatus.NOT_FOUND;

  constructor(readonly currency: string) {
    super(`Records for currency ${currency} not found`, RateNotFoundException.name);
  }
}
