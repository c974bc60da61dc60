import { ConfigService } from '@nestjs/config';

import { AppConfigService, Config } from '../../src/config';
import { parseConfig } from '../../src/config/loaders/yaml.loader';

/**
 * Builds an AppConfigService from schema defaults plus the given overrides,
 * the same way the YAML loader does for a config file.
 */
export function createTestConfig(
  overrides: Record<string, unknown> = {},
): AppConfigService {
  const config = parseConfig({
    environment: 'test',
    metrics: { collectDefaultMetrics: false },
    ...overrides,
  });

  return new AppConfigService(new ConfigService<Config, true>(config));
}
