/**
 * 指令共用：組裝服務與錯誤輸出
 */

import { ConfigService } from '../services/config.js';
import { TokenStore } from '../services/token-store.js';
import { TokenProvider } from '../services/token-provider.js';
import { TokenManager } from '../services/token-manager.js';
import { RestClient } from '../services/api.js';
import { exitCodeFor } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

export interface Services {
  config: ConfigService;
  tokens: TokenManager;
  api: RestClient;
}

/**
 * 依目前設定建立各服務（每次指令執行各建一次）
 */
export function createServices(config: ConfigService = new ConfigService()): Services {
  const store = new TokenStore(config.getTokenCachePath());
  const tokens = new TokenManager(store, new TokenProvider(), config.getAuthSettings());
  const api = new RestClient(tokens, {
    baseUrl: config.getBaseUrl(),
    timeoutMs: config.getTimeoutMs(),
  });

  return { config, tokens, api };
}

/**
 * 輸出錯誤訊息並設定退出碼
 */
export function reportError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  loggers.cli.error('Command failed', error instanceof Error ? error : null);
  console.error(`Error: ${message}`);
  process.exitCode = exitCodeFor(error);
}
