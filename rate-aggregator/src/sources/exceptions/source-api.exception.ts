import { HttpStatus } from '@nestjs/common';

import { SourceException } from './source.exception';

/** A provider call failed: HTTP error, network failure or an unusable body. */
export class SourceApiException extends SourceException {
  readonly httpStatus: HttpStatus;

  constructor(
    readonly sourceName: string,
    originalError: Error,
    readonly statusCode?: number,
  ) {
    super(
      `API error from ${sourceName}: ${originalError.message}`,
      SourceApiException.name,
    );
    this.cause = originalError;
    this.httpStatus = toHttpStatus(statusCode);
  }
}

function toHttpStatus(statusCode: number | undefined): HttpStatus {
  if (statusCode === HttpStatus.NOT_FOUND) {
    return HttpStatus.NOT_FOUND;
  }
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return HttpStatus.BAD_REQUEST;
  }
  return HttpStatus.BAD_GATEWAY;
}
