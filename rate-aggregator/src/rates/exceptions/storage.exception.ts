import { HttpStatus } from '@nestjs/common';

import { ServiceException } from '../../common';

export class StorageException extends ServiceException {
  readonly httpStatus = HttpStatus.INTERNAL_SERVER_ERROR;

  constructor(operation: string, cause: unknown) {
    super(
      `Rate store failed to ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
      StorageException.name,
    );
    this.cause = cause;
  }
}
