import { Type, Static } from '@sinclair/typebox';

interface CreateSourceSchemaParams {
  sourceName: string;
  apiKeyRequired: boolean;
  apiKeyDescription: string;
  apiKeyExamples?: string[];
  enabledDefault: boolean;
  priorityDefault: number;
  rpsDefault: number;
  maxConcurrentDefault?: number;
  baseUrlDefault: string;
}

const createSourceSchema = ({
  sourceName,
  apiKeyRequired,
  apiKeyDescription,
  apiKeyExamples = [],
  enabledDefault,
  priorityDefault,
  rpsDefault,
  maxConcurrentDefault = 5,
  baseUrlDefault,
}: CreateSourceSchemaParams) => {
  return Type.Transform(
    Type.Object(
      {
        enabled: Type.Boolean({
          description: 'Enable or disable this rate source',
          default: enabledDefault,
        }),
        priority: Type.Integer({
          minimum: 0,
          description:
            'Position in the fallback chain. Lower values are tried first',
          default: priorityDefault,
        }),
        apiKey: Type.Optional(
          Type.String({
            description: apiKeyDescription,
            examples: apiKeyExamples,
            minLength: 1,
          }),
        ),
        baseUrl: Type.String({
          description: 'Base URL for API requests',
          pattern: '^https?://.+',
          default: baseUrlDefault,
        }),
        timeoutMs: Type.Integer({
          minimum: 100,
          description:
            'Upper bound for a single fetch. A timed out fetch falls back to the next source',
          default: 10000,
        }),
        maxConcurrent: Type.Integer({
          minimum: 1,
          description: 'Maximum number of concurrent requests',
          default: maxConcurrentDefault,
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
            default: rpsDefault,
            description:
              'Requests per second limit to prevent API rate limiting. Set to null to disable limiting',
          },
        ),
        useProxy: Type.Union(
          [
            Type.Boolean({
              description:
                'Use global proxy configuration from config.proxy',
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
      },
      {
        default: {},
      },
    ),
  )
    .Decode((value) => {
      if (!value.enabled) {
        return value;
      }

      if (apiKeyRequired && (!value.apiKey || value.apiKey.trim() === '')) {
        throw new Error(
          `API key is required when source is enabled (source: ${sourceName}, path: sources.${sourceName}.apiKey)`,
        );
      }

      return value;
    })
    .Encode((value) => value);
};

export const frankfurterSourceSchema = createSourceSchema({
  sourceName: 'frankfurter',
  apiKeyRequired: false,
  apiKeyDescription: 'No API key required for Frankfurter',
  enabledDefault: true,
  priorityDefault: 1,
  rpsDefault: 10,
  baseUrlDefault: 'https://api.frankfurter.app',
});

export const exchangerateApiSourceSchema = createSourceSchema({
  sourceName: 'exchangerateapi',
  apiKeyRequired: true,
  apiKeyDescription:
    'Required API key for ExchangeRate-API (free: 1,500 requests/month)',
  apiKeyExamples: ['your-exchangerate-api-key'],
  enabledDefault: false,
  priorityDefault: 2,
  rpsDefault: 1,
  baseUrlDefault: 'https://v6.exchangerate-api.com',
});

export const exchangerateHostSourceSchema = createSourceSchema({
  sourceName: 'exchangeratehost',
  apiKeyRequired: false,
  apiKeyDescription:
    'Optional API key for ExchangeRate Host (paid plans have higher limits)',
  apiKeyExamples: ['your-exchangerate-host-api-key'],
  enabledDefault: false,
  priorityDefault: 3,
  rpsDefault: 1,
  baseUrlDefault: 'https://api.exchangerate.host',
});

export const sourcesSchema = Type.Object(
  {
    frankfurter: frankfurterSourceSchema,
    exchangerateapi: exchangerateApiSourceSchema,
    exchangeratehost: exchangerateHostSourceSchema,
  },
  { default: {} },
);

export type SourcesConfig = Static<typeof sourcesSchema>;
export type SourceConfig = SourcesConfig[keyof SourcesConfig];
