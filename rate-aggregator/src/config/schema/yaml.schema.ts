import { Static, Type } from '@sinclair/typebox';

import { NODE_ENVIRONMENTS } from '../constants';
import { loggerSchema } from './logger.schema';
import { schedulerSchema } from './scheduler.schema';
import { sourcesSchema } from './sources.schema';
import { storageSchema } from './storage.schema';
import { variantsSchema } from '../utils/schema.util';

export const yamlValidationSchema = Type.Object(
  {
    port: Type.Integer({
      minimum: 1,
      maximum: 65535,
      default: 3000,
      description: 'Port for the HTTP server',
    }),
    environment: variantsSchema(NODE_ENVIRONMENTS, {
      default: 'development',
      description: 'Application environment mode',
    }),
    logger: loggerSchema,
    proxy: Type.Optional(
      Type.String({
        description:
          'Proxy URL used by sources with useProxy: true. Format: https://[user:pass@]host:port',
        examples: ['https://proxy.example.com:8080'],
        pattern: '^https?://.+',
      }),
    ),
    sources: sourcesSchema,
    scheduler: schedulerSchema,
    storage: storageSchema,
  },
  {
    default: {},
  },
);

export type Config = Static<typeof yamlValidationSchema>;
