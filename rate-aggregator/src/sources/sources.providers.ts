import { Type } from '@nestjs/common';

import { MonobankAdapter } from './adapters/monobank';
import { PrivatBankAdapter } from './adapters/privatbank';
import { SourceAdapter } from './source-adapter.interface';
import { SourceName } from './source-name.enum';

export const SOURCES_MAP: Record<SourceName, Type<SourceAdapter>> = {
  [SourceName.PRIVATBANK]: PrivatBankAdapter,
  [SourceName.MONOBANK]: MonobankAdapter,
};

export const SOURCES_PROVIDERS = Object.values(SOURCES_MAP);
