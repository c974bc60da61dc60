export const NODE_ENVIRONMENTS = ['development', 'production', 'test'] as const;
export const LOGGER_LEVELS = [
  'error',
  'warn',
  'info',
  'debug',
  'verbose',
] as const;
