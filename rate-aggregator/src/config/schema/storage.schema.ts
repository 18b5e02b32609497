import { Static, Type } from '@sinclair/typebox';

import { STORAGE_DRIVERS } from '../constants';
import { variantsSchema } from '../utils/schema.util';

export const storageSchema = Type.Object(
  {
    driver: variantsSchema(STORAGE_DRIVERS, {
      default: 'sqlite',
      description:
        'Averaged rate store. "memory" keeps the series for the process lifetime only.',
    }),
    sqlitePath: Type.String({
      default: 'data/rates.db',
      description:
        'SQLite database file used by the sqlite driver (":memory:" for a transient database)',
    }),
  },
  {
    default: {},
    description: 'Averaged rate storage configuration',
  },
);

export type StorageConfig = Static<typeof storageSchema>;
