import { Injectable } from '@nestjs/common';

import { AppConfigService } from '../../config';
import { UseProxyConfig } from './proxy.types';

@Injectable()
export class ProxyConfigService {
  constructor(private readonly configService: AppConfigService) {}

  get globalProxyUrl(): string | undefined {
    return this.configService.get('proxy') || undefined;
  }

  resolveProxyUrl(useProxy: UseProxyConfig): string | undefined {
    if (typeof useProxy === 'string') {
      return useProxy;
    }
    if (!useProxy) {
      return undefined;
    }

    const url = this.globalProxyUrl;
    if (!url) {
      throw new Error(
        'Source is configured with useProxy: true but the top-level proxy URL is not set',
      );
    }
    return url;
  }
}
