import { SourceName } from './source-name.enum';
import { SourceConfig as SourceAdapterConfig } from '../config';

export type { SourceAdapterConfig };

/** One provider's buy/sell rate for a currency, as normalized by its adapter. */
export interface Quote {
  /** Currency code as the provider reports it (compared case-insensitively). */
  currency: string;
  baseCurrency: string;
  buyRate: number;
  sellRate: number;
  source: SourceName;
  receivedAt: Date;
}

export interface SourceAdapter {
  readonly name: SourceName;
  getConfig(): SourceAdapterConfig;
  /** Every call is an independent attempt; adapters keep no state between calls. */
  fetchQuotes(): Promise<Quote[]>;
}
