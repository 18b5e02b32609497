import { RateStore } from '../../src/rates/store';
import { newRate } from './rates.helper';

const at = (hour: number) => new Date(Date.UTC(2024, 4, 10, hour));

/** Behaviour every RateStore driver shares. */
export function describeRateStoreContract<S extends RateStore>(
  createStore: () => S,
  disposeStore?: (store: S) => void,
): void {
  describe('RateStore contract', () => {
    let store: S;

    beforeEach(() => {
      store = createStore();
    });

    afterEach(() => {
      disposeStore?.(store);
    });

    test('assigns increasing ids', async () => {
      const first = await store.append(newRate('USD', 39.5, at(9)));
      const second = await store.append(newRate('EUR', 42.5, at(9)));

      expect(second.id).toBeGreaterThan(first.id);
      expect(first).toEqual({
        id: first.id,
        currency: 'USD',
        buyRate: 39.5,
        sellRate: 40,
        timestamp: at(9),
      });
    });

    test('returns the most recent records newest first', async () => {
      await store.append(newRate('USD', 39.1, at(9)));
      await store.append(newRate('USD', 39.3, at(11)));
      await store.append(newRate('USD', 39.2, at(10)));
      await store.append(newRate('EUR', 42.0, at(12)));

      const recent = await store.findRecent('USD', 2);

      expect(recent.map((r) => r.buyRate)).toEqual([39.3, 39.2]);
      expect(await store.findRecent('USD', 10)).toHaveLength(3);
      expect(await store.findRecent('EUR', 1)).toHaveLength(1);
    });

    test('orders equal timestamps by insertion', async () => {
      await store.append(newRate('USD', 39.1, at(9)));
      await store.append(newRate('USD', 39.2, at(9)));

      expect((await store.findSince('USD', at(0))).map((r) => r.buyRate)).toEqual([39.1, 39.2]);
      expect((await store.findRecent('USD', 1))[0].buyRate).toBe(39.2);
    });

    test('finds records since a timestamp inclusively, oldest first', async () => {
      await store.append(newRate('USD', 39.1, at(8)));
      await store.append(newRate('USD', 39.2, at(9)));
      await store.append(newRate('USD', 39.3, at(10)));

      const since = await store.findSince('USD', at(9));

      expect(since.map((r) => r.buyRate)).toEqual([39.2, 39.3]);
    });

    test('returns nothing for a currency without records', async () => {
      expect(await store.findRecent('EUR', 1)).toEqual([]);
      expect(await store.findSince('EUR', at(0))).toEqual([]);
    });
  });
}
