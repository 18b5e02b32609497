export { RateUpdateScheduler } from './rate-update.scheduler';
export { SchedulerModule } from './scheduler.module';
export type { RunOutcome, SchedulerState } from './scheduler.types';
