import { Static, Type } from '@sinclair/typebox';

interface CreateSourceSchemaParams {
  baseUrlDefault: string;
  maxRetriesDefault: number;
  retryStatusesDefault?: number[];
}

const createSourceSchema = ({
  baseUrlDefault,
  maxRetriesDefault,
  retryStatusesDefault = [429],
}: CreateSourceSchemaParams) =>
  Type.Object(
    {
      enabled: Type.Boolean({
        description: 'Enable or disable this quote source',
        default: true,
      }),
      baseUrl: Type.String({
        description: 'Base URL for API requests',
        pattern: '^https?://.+',
        default: baseUrlDefault,
      }),
      timeoutMs: Type.Integer({
        minimum: 1000,
        description: 'Request timeout in milliseconds',
        default: 10000,
      }),
      rps: Type.Union(
        [
          Type.Number({
            minimum: 0.0001,
            maximum: 1000,
            description:
              'Requests per second limit to prevent API rate limiting',
          }),
          Type.Null({
            description: 'Disable RPS limiting',
          }),
        ],
        {
          default: null,
          description:
            'Requests per second limit. Set to null to disable limiting',
        },
      ),
      maxConcurrent: Type.Integer({
        minimum: 1,
        description: 'Maximum number of concurrent requests',
        default: 1,
      }),
      useProxy: Type.Union(
        [
          Type.Boolean({
            description: 'Use global proxy configuration from config.proxy',
          }),
          Type.String({
            description: 'Custom proxy URL for this source',
            pattern: '^https?://.+',
          }),
        ],
        {
          description:
            'Proxy configuration: true/false for global proxy, or URL string for custom proxy',
          default: false,
        },
      ),
      maxRetries: Type.Integer({
        minimum: 0,
        maximum: 10,
        description:
          'Additional attempts after a retryable failure (0 disables retries)',
        default: maxRetriesDefault,
      }),
      retryDelayMs: Type.Integer({
        minimum: 0,
        maximum: 60000,
        description: 'Fixed delay in milliseconds between retry attempts',
        default: 5000,
      }),
      retryStatuses: Type.Array(Type.Integer({ minimum: 100, maximum: 599 }), {
        description: 'HTTP response statuses that trigger a retry',
        default: retryStatusesDefault,
      }),
    },
    { default: {} },
  );

export const privatbankSourceSchema = createSourceSchema({
  baseUrlDefault: 'https://api.privatbank.ua',
  maxRetriesDefault: 0,
});

export const monobankSourceSchema = createSourceSchema({
  baseUrlDefault: 'https://api.monobank.ua',
  maxRetriesDefault: 3,
});

export const sourcesSchema = Type.Object(
  {
    privatbank: privatbankSourceSchema,
    monobank: monobankSourceSchema,
  },
  { default: {} },
);

export type SourceConfig = Static<typeof privatbankSourceSchema>;
export type SourcesConfig = Static<typeof sourcesSchema>;
