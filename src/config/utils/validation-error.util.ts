import { TSchema } from '@sinclair/typebox';
import { AssertError } from '@sinclair/typebox/value';

function extractDescription(schema: TSchema | undefined): string | undefined {
  if (!schema) return undefined;
  if (typeof schema.description === 'string') return schema.description;
  if (Array.isArray(schema.anyOf)) {
    for (const variant of schema.anyOf) {
      if (variant && typeof variant.description === 'string') {
        return variant.description;
      }
    }
  }
  return undefined;
}

function getSchemaHint(path?: string): string {
  if (!path) return '';

  if (path.includes('port')) {
    return '\nTip: port should be a number between 1 and 65535';
  }
  if (path.includes('cache')) {
    return '\nTip: cache.ttlSeconds and cache.checkPeriodSeconds are whole seconds, 0 or greater';
  }
  if (path.includes('sources')) {
    return '\nTip: sources.<name>.timeoutMs is in milliseconds (at least 100), priority is a non-negative integer';
  }
  if (path.includes('logger')) {
    return '\nTip: logger.level should be one of: error, warn, info, debug, verbose';
  }

  return '';
}

function handleSchemaValidationError(error: AssertError): never {
  const errorDetails = error.error;

  if (!errorDetails) {
    throw new Error(
      [
        'YAML configuration validation failed.',
        'Please verify your YAML configuration structure.',
        '',
        'For help with configuration, see:',
        '- config.example.yaml file for reference',
        '- Schema definitions in src/config/schema/',
      ].join('\n'),
      { cause: error },
    );
  }

  const valueDisplay =
    errorDetails.value !== undefined
      ? ` (received: ${JSON.stringify(errorDetails.value)})`
      : '';
  const fieldDescription = extractDescription(errorDetails.schema);
  const fieldName = errorDetails.path
    ? errorDetails.path.replace(/^\//, '').replace(/\//g, '.')
    : 'unknown';

  const message = [
    `YAML configuration validation failed: ${fieldName}`,
    `Expected: ${errorDetails.message}${valueDisplay}`,
    fieldDescription ? `Description: ${fieldDescription}` : '',
    `Please set the correct value for the ${fieldName} field in your YAML config.`,
    getSchemaHint(errorDetails.path),
    '',
    'For help with configuration, see:',
    '- config.example.yaml file for reference',
    '- Schema definitions in src/config/schema/yaml.schema.ts',
  ]
    .filter(Boolean)
    .join('\n');

  throw new Error(message, { cause: error });
}

function handleGenericError(error: unknown, context: string): never {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const message = [
    context,
    `Error: ${errorMessage}`,
    'Please check your configuration file and try again.',
  ].join('\n');

  throw new Error(message, { cause: error });
}

export function handleValidationError(error: unknown, context: string): never {
  if (error instanceof AssertError) {
    handleSchemaValidationError(error);
  }

  handleGenericError(error, context);
}
