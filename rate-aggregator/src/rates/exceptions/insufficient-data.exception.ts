import { HttpStatus } from '@nestjs/common';

import { ServiceException } from '../../common';

export class InsufficientDataException extends ServiceException {
  readonly httpStatus = HttpStatus.BAD_REQUEST;

  constructor(message: string) {
    super(message, InsufficientDataException.name);
  }
}
