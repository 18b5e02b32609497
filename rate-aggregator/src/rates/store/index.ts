export { InMemoryRateStore } from './in-memory-rate.store';
export { RATE_STORE } from './rate-store.interface';
export type { RateStore } from './rate-store.interface';
export { rateStoreProvider } from './rate-store.provider';
export { SqliteRateStore } from './sqlite-rate.store';
