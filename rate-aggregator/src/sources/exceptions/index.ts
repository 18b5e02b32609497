export { SourceException } from './source.exception';
export { SourceApiException } from './source-api.exception';
export { SourceDisabledException } from './source-disabled.exception';
export { SourceUnauthorizedException } from './source-unauthorized.exception';
