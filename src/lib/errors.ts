/**
 * Error Types
 * 錯誤分類 - 每個錯誤都帶有穩定的 code，CLI 依此決定退出碼
 */

export abstract class AppError extends Error {
  public abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 認證設定缺漏或無效
 */
export class ConfigError extends AppError {
  public readonly code = 'CONFIG_ERROR';
  public readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(missing.length > 0 ? `${message}: ${missing.join(', ')}` : message);
    this.missing = missing;
  }
}

export class UnsupportedGrantError extends AppError {
  public readonly code = 'UNSUPPORTED_GRANT';
  public readonly grantType: string;

  constructor(grantType: string) {
    super(`unsupported grant type: ${grantType}`);
    this.grantType = grantType;
  }
}

/**
 * 向 identity provider 取得 token 失敗
 */
export class TokenExchangeError extends AppError {
  public readonly code = 'TOKEN_EXCHANGE_FAILED';
  public readonly statusCode?: number;
  /** OAuth2 `error` 欄位（如 invalid_client） */
  public readonly oauthError?: string;

  constructor(
    message: string,
    details: { cause?: unknown; statusCode?: number; oauthError?: string } = {}
  ) {
    super(`failed to obtain token: ${message}`, { cause: details.cause });
    this.statusCode = details.statusCode;
    this.oauthError = details.oauthError;
  }
}

/**
 * API 回應非 2xx，或請求無法送出
 */
export class RequestError extends AppError {
  public readonly code = 'REQUEST_FAILED';
  public readonly statusCode?: number;
  public readonly body: string;

  constructor(statusCode: number | undefined, body: string, cause?: unknown) {
    super(
      statusCode === undefined
        ? `request failed: ${body}`
        : `request failed: ${statusCode} ${body}`,
      { cause }
    );
    this.statusCode = statusCode;
    this.body = body;
  }
}

/**
 * 回應看起來是 JSON 但無法解析
 */
export class FormatError extends AppError {
  public readonly code = 'FORMAT_ERROR';
  public readonly raw: string;

  constructor(raw: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`response body is not valid JSON: ${reason}`, { cause });
    this.raw = raw;
  }
}

/**
 * Token 快取寫入失敗（不致命）
 */
export class CacheWriteError extends AppError {
  public readonly code = 'CACHE_WRITE_FAILED';
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`failed to write token cache ${path}: ${reason}`, { cause });
    this.path = path;
  }
}

/**
 * 錯誤對應的退出碼
 * 3: 設定錯誤、2: 認證或 API 錯誤、1: 其他
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UnsupportedGrantError) {
    return 3;
  }
  if (error instanceof TokenExchangeError || error instanceof RequestError) {
    return 2;
  }
  return 1;
}
