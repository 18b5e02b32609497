import { Currency } from '../common';

export interface HourlyChange {
  /** Timestamp of the later record of the pair. */
  timestamp: Date;
  changePercent: number;
  description: string;
}

export interface LastHourChange {
  currency: Currency;
  changePercent: number;
  description: string;
}
