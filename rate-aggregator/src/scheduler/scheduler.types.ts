export type SchedulerState = 'idle' | 'running';

/** `skipped` means another run was in progress and this trigger did nothing. */
export type RunOutcome = 'completed' | 'failed' | 'skipped';
