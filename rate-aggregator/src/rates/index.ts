export { RatesModule } from './rates.module';
export { RateAggregatorService } from './rate-aggregator.service';
export * from './cache';
export * from './exceptions';
export * from './store';
export type { AveragedRate, NewAveragedRate } from './averaged-rate.interface';
