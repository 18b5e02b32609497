/** Entry of `GET /bank/currency`. Currencies are ISO 4217 numeric codes. */
export interface MonobankRate {
  currencyCodeA: number;
  currencyCodeB: number;
  date: number;
  rateBuy?: number;
  rateSell?: number;
  rateCross?: number;
}

export const UAH_NUMERIC_CODE = 980;

export const NUMERIC_CURRENCY_CODES: Readonly<Record<number, string>> = {
  840: 'USD',
  978: 'EUR',
};
