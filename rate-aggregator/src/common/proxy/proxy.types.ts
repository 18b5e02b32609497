/** `true` uses the global `proxy` from config, a string is a source-specific proxy URL. */
export type UseProxyConfig = boolean | string;
