export { ProxyConfigService } from './proxy-config.service';
export { ProxyModule } from './proxy.module';
export type { UseProxyConfig } from './proxy.types';
