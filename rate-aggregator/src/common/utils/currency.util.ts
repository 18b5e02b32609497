export const SUPPORTED_CURRENCIES = ['USD', 'EUR'] as const;
export const BASE_CURRENCY = 'UAH';

export type Currency = (typeof SUPPORTED_CURRENCIES)[number];

export function isSupportedCurrency(value: string): value is Currency {
  return SUPPORTED_CURRENCIES.some((currency) => currency === value);
}

export function matchesCurrency(code: string, currency: Currency): boolean {
  return code.toUpperCase() === currency;
}

/** Rounds half-up to two decimal places. */
export function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}
