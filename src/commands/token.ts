/**
 * Token Command
 * Token 快取管理：查看狀態、清除、強制重新取得
 */

import { Command } from 'commander';
import { ConfigService } from '../services/config.js';
import { TokenStore } from '../services/token-store.js';
import { formatDuration } from '../lib/logger.js';
import { createServices, reportError } from './shared.js';

export interface TokenStatus {
  cachePath: string;
  valid: boolean;
  expiresAt: string | null;
  /** 剩餘有效秒數 */
  expiresIn: number | null;
}

/**
 * 讀取快取狀態（不輸出 token 本身）
 */
export function getTokenStatus(store: TokenStore, now: number = Date.now()): TokenStatus {
  const record = store.load();
  if (!record) {
    return { cachePath: store.getPath(), valid: false, expiresAt: null, expiresIn: null };
  }
  return {
    cachePath: store.getPath(),
    valid: true,
    expiresAt: new Date(record.expiresAt).toISOString(),
    expiresIn: Math.floor((record.expiresAt - now) / 1000),
  };
}

export const tokenCommand = new Command('token')
  .description('Token 快取管理');

/**
 * oauth-rest token status
 */
tokenCommand
  .command('status')
  .description('查看快取 token 的狀態')
  .option('--text', '輸出可讀文字格式')
  .action((options: { text?: boolean }) => {
    try {
      const config = new ConfigService();
      const status = getTokenStatus(new TokenStore(config.getTokenCachePath()));

      if (options.text) {
        console.log(`快取檔: ${status.cachePath}`);
        if (status.valid && status.expiresAt && status.expiresIn !== null) {
          console.log(`狀態: 有效`);
          console.log(`到期: ${status.expiresAt} (剩餘 ${formatDuration(status.expiresIn * 1000)})`);
        } else {
          console.log('狀態: 無有效 token');
        }
      } else {
        console.log(JSON.stringify(status, null, 2));
      }
    } catch (error) {
      reportError(error);
    }
  });

/**
 * oauth-rest token clear
 */
tokenCommand
  .command('clear')
  .description('刪除快取的 token')
  .action(() => {
    try {
      const config = new ConfigService();
      const store = new TokenStore(config.getTokenCachePath());
      const removed = store.clear();
      console.log(removed ? `已刪除 ${store.getPath()}` : '沒有快取的 token');
    } catch (error) {
      reportError(error);
    }
  });

/**
 * oauth-rest token fetch
 */
tokenCommand
  .command('fetch')
  .description('忽略快取，立即向 identity provider 取得新 token')
  .action(async () => {
    try {
      const { tokens } = createServices();
      tokens.invalidate();
      await tokens.getToken();

      const expiresAt = tokens.getExpiresAt();
      console.log(
        JSON.stringify(
          {
            success: true,
            expiresAt: expiresAt === null ? null : new Date(expiresAt).toISOString(),
          },
          null,
          2
        )
      );
    } catch (error) {
      reportError(error);
    }
  });
