import { Currency } from '../../common';
import { AveragedRate, NewAveragedRate } from '../averaged-rate.interface';
import { RateStore } from './rate-store.interface';

/** Process-lifetime store, kept sorted by timestamp on insert. */
export class InMemoryRateStore implements RateStore {
  private readonly series = new Map<Currency, AveragedRate[]>();
  private nextId = 1;

  async append(rate: NewAveragedRate): Promise<AveragedRate> {
    const record: AveragedRate = Object.freeze({
      id: this.nextId++,
      currency: rate.currency,
      buyRate: rate.buyRate,
      sellRate: rate.sellRate,
      timestamp: new Date(rate.timestamp.getTime()),
    });

    const series = this.series.get(rate.currency) ?? [];
    series.splice(upperBound(series, record.timestamp), 0, record);
    this.series.set(rate.currency, series);

    return record;
  }

  async findRecent(currency: Currency, limit: number): Promise<AveragedRate[]> {
    const series = this.series.get(currency) ?? [];
    return series.slice(Math.max(0, series.length - limit)).reverse();
  }

  async findSince(currency: Currency, since: Date): Promise<AveragedRate[]> {
    const series = this.series.get(currency) ?? [];
    return series.filter((rate) => rate.timestamp.getTime() >= since.getTime());
  }
}

// First index whose timestamp is strictly later, so equal timestamps keep insertion order
function upperBound(series: readonly AveragedRate[], timestamp: Date): number {
  const target = timestamp.getTime();
  let low = 0;
  let high = series.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (series[mid].timestamp.getTime() <= target) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}
