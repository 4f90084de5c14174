/**
 * Structured Logger - 結構化日誌系統
 * 特性：
 *   - JSON 格式輸出（一行一筆）
 *   - 日誌級別控制
 *   - 性能監控 (duration)
 *   - 錯誤堆棧記錄
 *
 * 日誌一律寫到 stderr，stdout 保留給 API 回應內容。
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  /** HTTP 方法 (GET, POST, 等) */
  method?: string;
  /** 請求 URL 或端點 */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 返回狀態碼 */
  statusCode?: number;
  /** 自定義數據 */
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'warn') */
  minLevel?: LogLevel;
  /** 是否包含堆棧追蹤 (default: false) */
  includeStack?: boolean;
  /** 輸出函數 (default: 寫入 stderr) */
  write?: (line: string) => void;
}

/** 日誌級別優先級 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

const writeToStderr = (line: string): void => {
  process.stderr.write(`${line}\n`);
};

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel ?? 'warn',
      includeStack: config.includeStack ?? false,
      write: config.write ?? writeToStderr,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: this.config.includeStack ? error.stack : undefined,
      };
    }

    this.config.write(JSON.stringify(entry));
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext, error?: Error): void {
    this.log('warn', message, context, error);
  }

  error(message: string, error?: Error | null, context?: LogContext): void {
    this.log('error', message, context, error ?? undefined);
  }

  /**
   * 設定日誌最小級別
   */
  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  setIncludeStack(includeStack: boolean): void {
    this.config.includeStack = includeStack;
  }

  /**
   * 執行帶日誌的非同步操作
   * 成功記 debug，失敗記 warn 並重新拋出
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();
      this.debug(`${operation} completed`, {
        ...context,
        duration: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      this.warn(
        `${operation} failed`,
        { ...context, duration: Date.now() - startTime },
        error instanceof Error ? error : new Error(String(error))
      );
      throw error;
    }
  }
}

/**
 * 預設的日誌記錄器實例
 * 按組件分類，便於按服務過濾日誌
 */
export const loggers = {
  cli: new StructuredLogger('CLI'),
  config: new StructuredLogger('Config'),
  auth: new StructuredLogger('Auth'),
  store: new StructuredLogger('TokenStore'),
  api: new StructuredLogger('API'),
};

/**
 * 統一調整所有組件的日誌級別（-v / -q / LOG_LEVEL）
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
    logger.setIncludeStack(level === 'debug');
  }
}

/**
 * 時間格式化輔助函數
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
