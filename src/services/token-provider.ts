/**
 * Token Provider
 * OAuth2 認證服務 - 以 client_credentials 或 password grant 向 identity provider 取得 token
 */

import { ofetch, FetchError } from 'ofetch';
import type {
  AuthSettings,
  ClientAuthStyle,
  Grant,
  OAuthErrorResponse,
  TokenRecord,
  TokenResponse,
} from '../types/auth.js';
import { ENV_VARS } from '../types/config.js';
import { ConfigError, TokenExchangeError, UnsupportedGrantError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

// Token 提前 60 秒過期，避免請求途中失效
export const TOKEN_EXPIRY_BUFFER_MS = 60 * 1000;

// 回應沒有 expires_in 時假設有效一小時
export const DEFAULT_TOKEN_LIFETIME_MS = 60 * 60 * 1000;

export const DEFAULT_TIMEOUT_MS = 30 * 1000;

function isTokenResponse(value: unknown): value is TokenResponse {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const body = value as Record<string, unknown>;
  return typeof body.access_token === 'string' && body.access_token.length > 0;
}

function isOAuthErrorResponse(value: unknown): value is OAuthErrorResponse {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return typeof (value as Record<string, unknown>).error === 'string';
}

/**
 * 解析 token endpoint 的回應內容（成功與錯誤回應皆適用）
 * - JSON：解析為物件
 * - application/x-www-form-urlencoded：轉為 key/value 物件
 * - 其他：原始文字
 */
export function parseTokenResponseBody(text: string): unknown {
  const trimmed = text.trim();
  if (trimmed.startsWith('{')) {
    try {
      return JSON.parse(trimmed);
    } catch {
      return text;
    }
  }
  if (/^[^\s=&]+=/.test(trimmed)) {
    return Object.fromEntries(new URLSearchParams(trimmed));
  }
  return text;
}

/**
 * 驗證認證設定並轉換為 Grant
 * 在任何網路請求之前完成，缺漏欄位以環境變數名稱列出
 */
export function resolveGrant(settings: AuthSettings): Grant {
  const { tokenUrl, clientId, clientSecret, scope, grantType } = settings;

  const missing: string[] = [];
  if (!tokenUrl) missing.push(ENV_VARS.tokenUrl);
  if (!clientId) missing.push(ENV_VARS.clientId);
  if (!clientSecret) missing.push(ENV_VARS.clientSecret);
  if (!scope) missing.push(ENV_VARS.scope);
  if (!grantType) missing.push(ENV_VARS.grantType);

  if (!tokenUrl || !clientId || !clientSecret || !scope || !grantType) {
    throw new ConfigError('missing required settings', missing);
  }

  const base = {
    tokenUrl: tokenUrl.replace(/\/+$/, ''),
    clientId,
    clientSecret,
    scope,
  };

  switch (grantType) {
    case 'client_credentials':
      return { type: 'client_credentials', ...base };

    case 'resource_owner': {
      const { username, password } = settings;
      if (!username || !password) {
        const missingUser: string[] = [];
        if (!username) missingUser.push(ENV_VARS.username);
        if (!password) missingUser.push(ENV_VARS.password);
        throw new ConfigError('username/password must be set for password grant', missingUser);
      }
      return { type: 'resource_owner', ...base, username, password };
    }

    default:
      throw new UnsupportedGrantError(grantType);
  }
}

/**
 * 組出 token 請求的 form body 與 headers
 */
export function buildTokenRequest(
  grant: Grant,
  clientAuth: ClientAuthStyle = 'header'
): { headers: Record<string, string>; body: string } {
  const params = new URLSearchParams();

  switch (grant.type) {
    case 'client_credentials':
      params.set('grant_type', 'client_credentials');
      break;
    case 'resource_owner':
      params.set('grant_type', 'password');
      params.set('username', grant.username);
      params.set('password', grant.password);
      break;
  }
  params.set('scope', grant.scope);

  const headers: Record<string, string> = {
    Accept: 'application/json',
    'Content-Type': 'application/x-www-form-urlencoded',
  };

  if (clientAuth === 'header') {
    // RFC 6749 §2.3.1：id 與 secret 先做 form-urlencode 再 Base64
    const credentials = `${encodeURIComponent(grant.clientId)}:${encodeURIComponent(grant.clientSecret)}`;
    headers.Authorization = `Basic ${Buffer.from(credentials).toString('base64')}`;
  } else {
    params.set('client_id', grant.clientId);
    params.set('client_secret', grant.clientSecret);
  }

  return { headers, body: params.toString() };
}

/**
 * 計算過期時間（提前 buffer 秒過期）
 */
export function computeExpiresAt(
  expiresIn: number | string | undefined,
  now: number = Date.now()
): number {
  const seconds = typeof expiresIn === 'string' && expiresIn.trim() !== '' ? Number(expiresIn) : expiresIn;
  const lifetimeMs =
    typeof seconds === 'number' && Number.isFinite(seconds) && seconds > 0
      ? seconds * 1000
      : DEFAULT_TOKEN_LIFETIME_MS;
  return now + lifetimeMs - TOKEN_EXPIRY_BUFFER_MS;
}

export class TokenProvider {
  /**
   * 取得新的 token
   * 失敗不在此重試；沒有寫入快取的副作用
   */
  async obtain(settings: AuthSettings): Promise<TokenRecord> {
    const grant = resolveGrant(settings);
    const { headers, body } = buildTokenRequest(grant, settings.clientAuth);

    const response = await loggers.auth.trackAsync(
      'Token request',
      () => this.requestToken(grant.tokenUrl, headers, body, settings.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      { url: grant.tokenUrl, grantType: grant.type }
    );

    return {
      accessToken: response.access_token,
      expiresAt: computeExpiresAt(response.expires_in),
    };
  }

  /**
   * 請求新的 token
   */
  private async requestToken(
    tokenUrl: string,
    headers: Record<string, string>,
    body: string,
    timeoutMs: number
  ): Promise<TokenResponse> {
    let response: unknown;
    try {
      response = await ofetch<unknown>(tokenUrl, {
        method: 'POST',
        headers,
        body,
        timeout: timeoutMs,
        retry: 0,
        // 不依 Content-Type 判斷，form 格式的回應也要能解析
        parseResponse: parseTokenResponseBody,
      });
    } catch (error) {
      throw toExchangeError(error);
    }

    if (!isTokenResponse(response)) {
      throw new TokenExchangeError('token endpoint returned no access_token');
    }
    return response;
  }
}

function toExchangeError(error: unknown): TokenExchangeError {
  if (error instanceof FetchError) {
    const statusCode = error.statusCode ?? error.status;
    const data: unknown = error.data;

    if (isOAuthErrorResponse(data)) {
      const detail = data.error_description ? `${data.error}: ${data.error_description}` : data.error;
      return new TokenExchangeError(`${statusCode ?? 'network error'} ${detail}`, {
        cause: error,
        statusCode,
        oauthError: data.error,
      });
    }

    if (statusCode !== undefined) {
      const text = typeof data === 'string' ? data.trim() : '';
      return new TokenExchangeError(text ? `${statusCode} ${text}` : `${statusCode}`, {
        cause: error,
        statusCode,
      });
    }
  }

  const reason = error instanceof Error ? error.message : String(error);
  return new TokenExchangeError(reason, { cause: error });
}
