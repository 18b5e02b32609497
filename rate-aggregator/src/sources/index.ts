export { SourcesModule } from './sources.module';
export { SourcesManagerService } from './sources-manager.service';
export { SourceName } from './source-name.enum';
export { SOURCES_MAP, SOURCES_PROVIDERS } from './sources.providers';
export * from './exceptions';

export type {
  Quote,
  SourceAdapter,
  SourceAdapterConfig,
} from './source-adapter.interface';
