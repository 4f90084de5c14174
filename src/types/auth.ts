/**
 * OAuth2 Token Response
 */
export interface TokenResponse {
  access_token: string;
  /** 部分 provider 以字串回傳 */
  expires_in?: number | string;
  token_type?: string;
  scope?: string;
}

/**
 * OAuth2 錯誤回應（RFC 6749 §5.2）
 */
export interface OAuthErrorResponse {
  error: string;
  error_description?: string;
}

/**
 * Token with expiry
 */
export interface TokenRecord {
  accessToken: string;
  expiresAt: number; // Unix timestamp (ms)
}

/**
 * 快取檔案格式
 */
export interface PersistedToken {
  access_token: string;
  expires_at: number; // Unix timestamp (秒)
}

export type GrantType = 'client_credentials' | 'resource_owner';

/** Client 認證方式：Basic Authorization header 或 form 欄位 */
export type ClientAuthStyle = 'header' | 'body';

interface GrantBase {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  scope: string;
}

export interface ClientCredentialsGrant extends GrantBase {
  type: 'client_credentials';
}

export interface ResourceOwnerGrant extends GrantBase {
  type: 'resource_owner';
  username: string;
  password: string;
}

export type Grant = ClientCredentialsGrant | ResourceOwnerGrant;

/**
 * 認證設定（原始字串，尚未驗證）
 */
export interface AuthSettings {
  tokenUrl?: string;
  clientId?: string;
  clientSecret?: string;
  scope?: string;
  grantType?: string;
  username?: string;
  password?: string;
  clientAuth?: ClientAuthStyle;
  /** 請求逾時（毫秒） */
  timeoutMs?: number;
}
