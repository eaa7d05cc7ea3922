export interface ProxySettings {
  host: string;
  port: number;
  username?: string;
  password?: string;
}

export interface ConnectionConfig {
  host: string;
  port: number;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  proxy?: ProxySettings;
  noProxy: boolean;
  targetId?: string;
  endpoint?: string;
}

export type SessionState = 'disconnected' | 'connecting' | 'connected' | 'attached' | 'closed';

export type TargetSelector =
  | string
  | { urlIncludes: string }
  | { titleIncludes: string };

export interface TargetInfo {
  targetId: string;
  type: string;
  title: string;
  url: string;
  attached?: boolean;
}
