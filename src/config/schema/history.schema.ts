import { Static, Type } from '@sinclair/typebox';

export const historySchema = Type.Object(
  {
    maxEntries: Type.Integer({
      minimum: 1,
      default: 1000,
      description:
        'Conversions kept by the in-memory history. The oldest are dropped first',
    }),
  },
  {
    description: 'Conversion history configuration',
    default: {},
  },
);

export type HistoryConfig = Static<typeof historySchema>;
