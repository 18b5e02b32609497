export { AppConfigModule } from './config.module';
export { AppConfigService } from './config.service';
export { loader, parseConfig, yamlLoader } from './loaders';
export * from './constants';
export type {
  Config,
  LoggerConfig,
  SchedulerConfig,
  SourceConfig,
  SourcesConfig,
  StorageConfig,
} from './schema';
