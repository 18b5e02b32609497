export { AnalyticsModule } from './analytics.module';
export { AnalyticsService } from './analytics.service';
export { percentChange } from './percent-change.util';
export type { HourlyChange, LastHourChange } from './analytics.types';
