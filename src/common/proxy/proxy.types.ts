/** `true` uses the global `proxy` url, a string is a source-specific proxy url */
export type UseProxyConfig = boolean | string;
