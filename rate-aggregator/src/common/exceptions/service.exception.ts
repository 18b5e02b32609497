import { HttpStatus } from '@nestjs/common';

/**
 * Base class of every domain error. The HTTP boundary maps it to a response
 * through `httpStatus`; nothing inside the core depends on the status.
 */
export abstract class ServiceException extends Error {
  abstract readonly httpStatus: HttpStatus;

  protected constructor(message: string, name: string) {
    super(message);
    this.name = name;
  }
}
