import { Command } from 'commander';
import { requestCommand } from './commands/request.js';
import { tokenCommand } from './commands/token.js';
import { configCommand } from './commands/config.js';
import { ConfigService, loadDotEnv } from './services/config.js';
import { loggers, setLogLevel } from './lib/logger.js';
import type { LogLevel } from './lib/logger.js';

export const cli = new Command();

cli
  .name('oauth-rest')
  .description('REST API client with OAuth2 token management')
  .version('0.1.0');

// 全域選項
cli
  .option('-q, --quiet', '安靜模式（只輸出錯誤日誌）')
  .option('-v, --verbose', '詳細模式（輸出 debug 日誌）');

export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * 執行指令前的準備：載入 .env，再依 -v / -q / LOG_LEVEL 設定日誌級別
 */
export function prepareRun(options: GlobalOptions, dir: string = process.cwd()): void {
  const envLoaded = loadDotEnv(dir);

  let level: LogLevel = new ConfigService().getLogLevel() ?? 'warn';
  if (options.verbose) {
    level = 'debug';
  } else if (options.quiet) {
    level = 'error';
  }
  setLogLevel(level);

  if (!envLoaded) {
    loggers.cli.debug('No .env file found, using process environment only', { dir });
  }
}

cli.hook('preAction', (_thisCommand, actionCommand) => {
  prepareRun(actionCommand.optsWithGlobals<GlobalOptions>());
});

// 註冊指令（request 為預設指令：oauth-rest GET /path）
cli.addCommand(requestCommand, { isDefault: true });
cli.addCommand(tokenCommand);
cli.addCommand(configCommand);
