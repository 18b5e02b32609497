import { Currency } from '../common';

/** Persisted average of both providers for one currency. Never mutated. */
export interface AveragedRate {
  readonly id: number;
  readonly currency: Currency;
  readonly buyRate: number;
  readonly sellRate: number;
  readonly timestamp: Date;
}

export type NewAveragedRate = Omit<AveragedRate, 'id'>;
