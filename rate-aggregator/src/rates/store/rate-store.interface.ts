import { Currency } from '../../common';
import { AveragedRate, NewAveragedRate } from '../averaged-rate.interface';

export const RATE_STORE = Symbol('RATE_STORE');

/**
 * Append-only series of averaged rates per currency. Reads are ordered by
 * timestamp, ties by insertion order. Failures surface as StorageException.
 */
export interface RateStore {
  append(rate: NewAveragedRate): Promise<AveragedRate>;
  /** Newest first. */
  findRecent(currency: Currency, limit: number): Promise<AveragedRate[]>;
  /** Records with `timestamp >= since`, oldest first. */
  findSince(currency: Currency, since: Date): Promise<AveragedRate[]>;
}
