/**
 * Token Store
 * Token 快取檔 - 跨程序保存單一 access token
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { PersistedToken, TokenRecord } from '../types/auth.js';
import { CacheWriteError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

export const DEFAULT_TOKEN_CACHE_PATH = path.join(
  os.homedir(),
  '.cache',
  'oauth-rest-cli',
  'token.json'
);

function isPersistedToken(value: unknown): value is PersistedToken {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record = value as Record<string, unknown>;
  return (
    typeof record.access_token === 'string' &&
    record.access_token.length > 0 &&
    typeof record.expires_at === 'number' &&
    Number.isFinite(record.expires_at)
  );
}

export class TokenStore {
  private filePath: string;

  constructor(filePath?: string) {
    this.filePath = filePath || DEFAULT_TOKEN_CACHE_PATH;
  }

  /**
   * 讀取快取的 token
   * 檔案不存在、格式錯誤或已過期時返回 null，不拋出錯誤
   */
  load(): TokenRecord | null {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch {
      // 沒有快取檔
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      loggers.store.warn('Ignoring malformed token cache', { path: this.filePath });
      return null;
    }

    if (!isPersistedToken(parsed)) {
      loggers.store.warn('Ignoring token cache with unexpected shape', { path: this.filePath });
      return null;
    }

    const expiresAt = parsed.expires_at * 1000;
    if (Date.now() >= expiresAt) {
      loggers.store.debug('Cached token has expired', { path: this.filePath, expiresAt });
      return null;
    }

    return { accessToken: parsed.access_token, expiresAt };
  }

  /**
   * 寫入快取（先寫暫存檔再 rename，權限僅限擁有者）
   * @throws CacheWriteError
   */
  save(record: TokenRecord): void {
    const data: PersistedToken = {
      access_token: record.accessToken,
      expires_at: Math.floor(record.expiresAt / 1000),
    };
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
      fs.writeFileSync(tmpPath, JSON.stringify(data), { encoding: 'utf-8', mode: 0o600 });
      fs.renameSync(tmpPath, this.filePath);
    } catch (error) {
      if (fs.existsSync(tmpPath)) {
        fs.rmSync(tmpPath, { force: true });
      }
      throw new CacheWriteError(this.filePath, error);
    }

    loggers.store.debug('Token cache written', { path: this.filePath });
  }

  /**
   * 刪除快取檔
   * @returns 是否有檔案被刪除
   */
  clear(): boolean {
    if (!fs.existsSync(this.filePath)) {
      return false;
    }
    fs.unlinkSync(this.filePath);
    return true;
  }

  getPath(): string {
    return this.filePath;
  }
}
