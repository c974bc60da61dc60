import { UseProxyConfig } from '../../proxy';

export interface ClientParams {
  sourceName: string;
  timeoutMs: number;
  rps: number | null;
  maxConcurrent: number;
  useProxy: UseProxyConfig;
  baseUrl?: string;
  defaultParams?: Record<string, unknown>;
  /** Values masked in logged URLs, e.g. an API key embedded in the path */
  secrets?: string[];
}

export interface ClientOptions extends Omit<ClientParams, 'useProxy'> {
  proxyUrl?: string;
}
