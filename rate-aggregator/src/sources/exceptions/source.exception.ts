import { ServiceException } from '../../common';

/** Failure attributable to a quote source or to resolving one. */
export abstract class SourceException extends ServiceException {}
