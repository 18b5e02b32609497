import { Static, Type } from '@sinclair/typebox';

export const schedulerSchema = Type.Object(
  {
    enabled: Type.Boolean({
      default: true,
      description: 'Enable the periodic rate update job',
    }),
    intervalMs: Type.Integer({
      minimum: 1000,
      default: 3600000, // 1 hour
      description: 'Fixed interval between rate update runs in milliseconds',
    }),
    runOnStart: Type.Boolean({
      default: true,
      description: 'Trigger one rate update immediately after startup',
    }),
  },
  {
    default: {},
    description: 'Rate update scheduler configuration',
  },
);

export type SchedulerConfig = Static<typeof schedulerSchema>;
