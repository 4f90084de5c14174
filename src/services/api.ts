/**
 * REST API Client
 * 帶 Bearer token 的 API 請求；401 時換新 token 重送一次
 */

import { ofetch } from 'ofetch';
import { ConfigError, RequestError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { formatResponseBody } from '../lib/response-formatter.js';
import { resolveRequestBody } from '../lib/request-body.js';
import { ENV_VARS } from '../types/config.js';
import { DEFAULT_TIMEOUT_MS } from './token-provider.js';
import type { TokenManager } from './token-manager.js';

export interface RestClientOptions {
  /** 目標 API 的 base URL */
  baseUrl?: string;
  /** 請求逾時（毫秒） */
  timeoutMs?: number;
}

// fetch 不允許這些方法帶 body
const BODILESS_METHODS = new Set(['GET', 'HEAD']);

interface RawResponse {
  status: number;
  body: string;
}

/**
 * 組合 base URL 與 path，兩者之間恰好一個斜線
 */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export class RestClient {
  private tokens: TokenManager;
  private baseUrl?: string;
  private timeoutMs: number;

  constructor(tokens: TokenManager, options: RestClientOptions = {}) {
    this.tokens = tokens;
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * 執行 API 請求並返回格式化後的回應內容
   * @param body 檔案路徑或文字內容
   */
  async execute(method: string, path: string, body?: string): Promise<string> {
    if (!this.baseUrl) {
      throw new ConfigError('missing required settings', [ENV_VARS.baseUrl]);
    }

    const url = joinUrl(this.baseUrl, path);
    const httpMethod = method.toUpperCase();
    let payload = resolveRequestBody(body);

    if (payload !== undefined && BODILESS_METHODS.has(httpMethod)) {
      loggers.api.warn('Dropping request body: method cannot carry one', { method: httpMethod, url });
      payload = undefined;
    }

    const token = await this.tokens.getToken();
    let response = await this.send(httpMethod, url, payload, token);

    if (response.status === 401) {
      // 只重試一次：清除 token、重新取得後重送相同請求
      loggers.api.info('Received 401, retrying once with a fresh token', { method: httpMethod, url });
      this.tokens.invalidate();
      const freshToken = await this.tokens.getToken();
      response = await this.send(httpMethod, url, payload, freshToken);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new RequestError(response.status, response.body);
    }

    return formatResponseBody(response.body);
  }

  private async send(
    method: string,
    url: string,
    payload: string | undefined,
    token: string
  ): Promise<RawResponse> {
    const startTime = Date.now();

    loggers.api.debug('API request started', { method, url });

    try {
      const response = await ofetch.raw(url, {
        method,
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
        },
        body: payload,
        responseType: 'text',
        ignoreResponseError: true,
        retry: 0,
        timeout: this.timeoutMs,
      });

      loggers.api.debug('API request completed', {
        method,
        url,
        statusCode: response.status,
        duration: Date.now() - startTime,
      });

      return {
        status: response.status,
        body: typeof response._data === 'string' ? response._data : '',
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      loggers.api.error(
        'API request failed',
        error instanceof Error ? error : null,
        { method, url, duration: Date.now() - startTime }
      );
      throw new RequestError(undefined, reason, error);
    }
  }
}
