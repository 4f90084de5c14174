import type { LogLevel } from '../lib/logger.js';

/**
 * 設定檔結構
 */
export interface AppConfig {
  /** OAuth2 token endpoint */
  tokenUrl?: string;
  clientId?: string;
  clientSecret?: string;
  scope?: string;
  /** client_credentials | resource_owner */
  grantType?: string;
  username?: string;
  password?: string;
  /** header | body */
  clientAuth?: string;
  /** 目標 API 的 base URL */
  baseUrl?: string;
  /** Token 快取檔路徑 */
  tokenCachePath?: string;
  /** 請求逾時（毫秒） */
  timeoutMs?: number;
  logLevel?: LogLevel;
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof AppConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'tokenUrl',
  'clientId',
  'clientSecret',
  'scope',
  'grantType',
  'username',
  'password',
  'clientAuth',
  'baseUrl',
  'tokenCachePath',
  'timeoutMs',
  'logLevel',
];

/** 各設定鍵對應的環境變數（環境變數優先於設定檔） */
export const ENV_VARS: Record<ConfigKey, string> = {
  tokenUrl: 'OAUTH_TOKEN_URL',
  clientId: 'OAUTH_CLIENT_ID',
  clientSecret: 'OAUTH_CLIENT_SECRET',
  scope: 'OAUTH_SCOPE',
  grantType: 'OAUTH_GRANT_TYPE',
  username: 'OAUTH_USERNAME',
  password: 'OAUTH_PASSWORD',
  clientAuth: 'OAUTH_CLIENT_AUTH',
  baseUrl: 'API_BASE_URL',
  tokenCachePath: 'TOKEN_CACHE_PATH',
  timeoutMs: 'REQUEST_TIMEOUT_MS',
  logLevel: 'LOG_LEVEL',
};
