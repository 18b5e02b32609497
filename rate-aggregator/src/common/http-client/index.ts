export { ConfiguredHttpClient } from './configured-http-client';
export { HttpClientBuilder } from './http-client.builder';
export { HttpClientModule } from './http-client.module';
export { RpsLimiterService, isRetryableError } from './rps-limiter.service';
export type { RpsLimiterOptions } from './rps-limiter.service';
export type { ClientOptions, ClientParams, HttpClient, RetryPolicy } from './types';
