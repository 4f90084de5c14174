/**
 * Token Manager
 * 組合 TokenStore 與 TokenProvider：只在必要時取得新 token
 */

import type { AuthSettings, TokenRecord } from '../types/auth.js';
import { CacheWriteError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { TokenStore } from './token-store.js';
import type { TokenProvider } from './token-provider.js';

export class TokenManager {
  private store: TokenStore;
  private provider: TokenProvider;
  private settings: AuthSettings;
  private current: TokenRecord | null;

  constructor(store: TokenStore, provider: TokenProvider, settings: AuthSettings) {
    this.store = store;
    this.provider = provider;
    this.settings = settings;
    this.current = store.load();
  }

  /**
   * 取得有效的 Access Token
   * - 記憶體中的 token 有效：直接返回
   * - 否則向 provider 取得新 token 並寫入快取
   */
  async getToken(): Promise<string> {
    if (this.current && this.isValid(this.current)) {
      return this.current.accessToken;
    }

    const record = await this.provider.obtain(this.settings);
    this.current = record;
    this.persist(record);

    return record.accessToken;
  }

  /**
   * 清除記憶體中的 token，下次 getToken 必定重新取得
   * 不動快取檔，成功取得新 token 時會覆寫
   */
  invalidate(): void {
    this.current = null;
  }

  isTokenValid(): boolean {
    return this.current !== null && this.isValid(this.current);
  }

  getExpiresAt(): number | null {
    return this.current ? this.current.expiresAt : null;
  }

  private isValid(record: TokenRecord): boolean {
    return record.accessToken.length > 0 && Date.now() < record.expiresAt;
  }

  /**
   * 快取寫入失敗只記錄，不中斷流程
   */
  private persist(record: TokenRecord): void {
    try {
      this.store.save(record);
    } catch (error) {
      if (!(error instanceof CacheWriteError)) {
        throw error;
      }
      loggers.auth.warn('Could not persist token; continuing with in-memory token', {
        path: error.path,
      }, error);
    }
  }
}
