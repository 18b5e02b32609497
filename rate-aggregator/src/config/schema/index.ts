export * from './logger.schema';
export * from './scheduler.schema';
export * from './sources.schema';
export * from './storage.schema';
export * from './yaml.schema';
