import { IncomingMessage } from 'node:http';
import { Params } from 'nestjs-pino';

import { AppConfigService } from '../../config';

const QUIET_PATHS = ['/', '/metrics'];

function isQuietRequest(req: IncomingMessage): boolean {
  const path = req.url?.split('?')[0] ?? '';
  return QUIET_PATHS.includes(path) || path.startsWith('/docs');
}

export function createLoggerOptions(configService: AppConfigService): Params {
  const { level, isPrettyEnabled } = configService.get('logger');

  return {
    pinoHttp: {
      level,
      customLevels: {
        verbose: 10,
      },
      useOnlyCustomLevels: false,
      autoLogging: { ignore: isQuietRequest },
      customLogLevel: (_req, res, err) => {
        if (err || res.statusCode >= 500) return 'error';
        // rejected pairs and amounts are client errors, not ours
        if (res.statusCode >= 400) return 'info';
        return 'debug';
      },
      customSuccessMessage: (req, res) =>
        `${req.method} ${req.url} answered ${res.statusCode}`,
      customErrorMessage: (req, res, err) =>
        `${req.method} ${req.url} failed with ${res.statusCode}: ${err.message}`,
      serializers: {
        req: () => undefined,
      },
      redact: ['*.apiKey', '*.access_key'],
      ...(isPrettyEnabled ? { transport: { target: 'pino-pretty' } } : {}),
    },
  };
}
