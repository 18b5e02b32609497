import { HttpStatus } from '@nestjs/common';

import { SourceException } from './source.exception';

export class SourceUnauthorizedException extends SourceException {
  readonly httpStatus = HttpStatus.UNAUTHORIZED;

  constructor(readonly sourceName: string) {
    super(
      `Source ${sourceName} rejected the request with 401 Unauthorized`,
      SourceUnauthorizedException.name,
    );
  }
}
