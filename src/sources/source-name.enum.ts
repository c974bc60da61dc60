export enum SourceName {
  FRANKFURTER = 'frankfurter',
  EXCHANGERATE_API = 'exchangerate-api',
  EXCHANGERATE_HOST = 'exchangerate-host',
}

export function isSourceName(value: string): value is SourceName {
  return Object.values<string>(SourceName).includes(value);
}
