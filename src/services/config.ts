/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀寫與環境變數
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { AppConfig, ConfigKey } from '../types/config.js';
import { CONFIG_KEYS, ENV_VARS } from '../types/config.js';
import type { AuthSettings, ClientAuthStyle } from '../types/auth.js';
import { ConfigError } from '../lib/errors.js';
import { isLogLevel, loggers } from '../lib/logger.js';
import type { LogLevel } from '../lib/logger.js';
import { DEFAULT_TIMEOUT_MS } from './token-provider.js';
import { DEFAULT_TOKEN_CACHE_PATH } from './token-store.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'oauth-rest-cli');
const DEFAULT_CONFIG_FILE = 'config.json';

/** 覆寫設定檔路徑的環境變數 */
export const CONFIG_PATH_ENV = 'OAUTH_REST_CONFIG';

const SECRET_KEYS: readonly ('clientSecret' | 'password')[] = ['clientSecret', 'password'];

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

function isClientAuthStyle(value: unknown): value is ClientAuthStyle {
  return value === 'header' || value === 'body';
}

/**
 * 將 CLI 輸入的字串轉為設定值
 * @throws ConfigError 鍵不存在或值無效
 */
export function parseConfigValue(key: string, raw: string): AppConfig {
  if (!isConfigKey(key)) {
    throw new ConfigError(`unknown config key: ${key} (valid keys: ${CONFIG_KEYS.join(', ')})`);
  }

  switch (key) {
    case 'timeoutMs': {
      const timeoutMs = Number(raw);
      if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
        throw new ConfigError(`timeoutMs must be a positive integer, got: ${raw}`);
      }
      return { timeoutMs };
    }
    case 'logLevel':
      if (!isLogLevel(raw)) {
        throw new ConfigError(`logLevel must be one of debug, info, warn, error, got: ${raw}`);
      }
      return { logLevel: raw };
    case 'clientAuth':
      if (!isClientAuthStyle(raw)) {
        throw new ConfigError(`clientAuth must be header or body, got: ${raw}`);
      }
      return { clientAuth: raw };
    default: {
      const values: AppConfig = {};
      values[key] = raw;
      return values;
    }
  }
}

/**
 * 只保留已知的設定鍵與正確型別
 */
function sanitizeConfig(value: unknown): AppConfig {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }

  const config: AppConfig = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!isConfigKey(key)) continue;

    if (key === 'timeoutMs') {
      if (typeof entry === 'number') config.timeoutMs = entry;
    } else if (key === 'logLevel') {
      if (isLogLevel(entry)) config.logLevel = entry;
    } else if (typeof entry === 'string') {
      config[key] = entry;
    }
  }
  return config;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath =
      configPath || process.env[CONFIG_PATH_ENV] || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * 載入設定檔
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }

    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      return sanitizeConfig(JSON.parse(content));
    } catch (error) {
      loggers.config.warn(
        'Ignoring unreadable config file',
        { path: this.configPath },
        error instanceof Error ? error : undefined
      );
      return {};
    }
  }

  /**
   * 儲存設定檔（可能含 secret，權限僅限擁有者）
   */
  private save(): void {
    fs.mkdirSync(path.dirname(this.configPath), { recursive: true, mode: 0o700 });
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), {
      encoding: 'utf-8',
      mode: 0o600,
    });
  }

  /**
   * 取得設定檔中的值（不含環境變數）
   */
  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  /**
   * 合併設定值並寫入
   */
  set(values: AppConfig): void {
    this.config = { ...this.config, ...values };
    this.save();
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  /**
   * 取得設定內容，secret 以 **** 遮蔽
   */
  getMasked(): AppConfig {
    const masked: AppConfig = { ...this.config };
    for (const key of SECRET_KEYS) {
      if (masked[key] !== undefined) {
        masked[key] = '****';
      }
    }
    return masked;
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 取得字串設定（優先環境變數）
   */
  private resolve(key: ConfigKey): string | undefined {
    const envValue = process.env[ENV_VARS[key]];
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    const fileValue = this.config[key];
    return fileValue === undefined ? undefined : String(fileValue);
  }

  getAuthSettings(): AuthSettings {
    const clientAuth = this.resolve('clientAuth');
    if (clientAuth !== undefined && !isClientAuthStyle(clientAuth)) {
      throw new ConfigError(`${ENV_VARS.clientAuth} must be header or body, got: ${clientAuth}`);
    }

    return {
      tokenUrl: this.resolve('tokenUrl'),
      clientId: this.resolve('clientId'),
      clientSecret: this.resolve('clientSecret'),
      scope: this.resolve('scope'),
      grantType: this.resolve('grantType'),
      username: this.resolve('username'),
      password: this.resolve('password'),
      clientAuth: clientAuth ?? 'header',
      timeoutMs: this.getTimeoutMs(),
    };
  }

  getBaseUrl(): string | undefined {
    return this.resolve('baseUrl');
  }

  getTokenCachePath(): string {
    return this.resolve('tokenCachePath') ?? DEFAULT_TOKEN_CACHE_PATH;
  }

  /**
   * 逾時設定；無效值退回預設 30 秒
   */
  getTimeoutMs(): number {
    const raw = this.resolve('timeoutMs');
    if (raw === undefined) {
      return DEFAULT_TIMEOUT_MS;
    }
    const timeoutMs = Number(raw);
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      loggers.config.warn('Invalid timeout, using default', { value: raw, defaultMs: DEFAULT_TIMEOUT_MS });
      return DEFAULT_TIMEOUT_MS;
    }
    return timeoutMs;
  }

  getLogLevel(): LogLevel | undefined {
    const raw = this.resolve('logLevel');
    return isLogLevel(raw) ? raw : undefined;
  }
}

/**
 * 載入目錄下的 .env（已存在的環境變數不會被覆寫）
 * @returns 是否有載入檔案
 */
export function loadDotEnv(dir: string = process.cwd()): boolean {
  const envPath = path.join(dir, '.env');
  if (!fs.existsSync(envPath)) {
    return false;
  }
  process.loadEnvFile(envPath);
  return true;
}
