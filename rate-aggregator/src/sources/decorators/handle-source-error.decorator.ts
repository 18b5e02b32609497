import { isAxiosError } from 'axios';

import {
  SourceApiException,
  SourceException,
  SourceUnauthorizedException,
} from '../exceptions';

type SourceMethod<A extends unknown[], R> = (...args: A) => Promise<R>;

/**
 * Rethrows anything an adapter method raises as a SourceException, so callers
 * only ever see the source error hierarchy.
 */
export function HandleSourceError() {
  return function <A extends unknown[], R>(
    _target: object,
    _propertyKey: string,
    descriptor: TypedPropertyDescriptor<SourceMethod<A, R>>,
  ): TypedPropertyDescriptor<SourceMethod<A, R>> {
    const originalMethod = descriptor.value;
    if (!originalMethod) {
      return descriptor;
    }

    descriptor.value = async function (
      this: { readonly name: string },
      ...args: A
    ): Promise<R> {
      try {
        return await originalMethod.apply(this, args);
      } catch (error) {
        throw toSourceException(this.name, error);
      }
    };

    return descriptor;
  };
}

function toSourceException(
  sourceName: string,
  error: unknown,
): SourceException {
  if (error instanceof SourceException) {
    return error;
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 401) {
      return new SourceUnauthorizedException(sourceName);
    }
    return new SourceApiException(sourceName, error, status);
  }

  return new SourceApiException(
    sourceName,
    error instanceof Error ? error : new Error(String(error)),
  );
}
