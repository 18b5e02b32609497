import { ConfigService } from '@nestjs/config';

import { AppConfigService, Config, parseConfig } from '../../src/config';

/** AppConfigService over defaults merged with `raw`, as if read from YAML. */
export function createConfigService(
  raw: Record<string, unknown> = {},
): AppConfigService {
  return new AppConfigService(new ConfigService<Config, true>(parseConfig(raw)));
}
