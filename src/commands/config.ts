/**
 * Config Command
 * 設定管理：設定檔位置、查看、寫入與刪除
 */

import { Command } from 'commander';
import { ConfigService, isConfigKey, parseConfigValue } from '../services/config.js';
import { CONFIG_KEYS, ENV_VARS } from '../types/config.js';
import { ConfigError } from '../lib/errors.js';
import { reportError } from './shared.js';

export const configCommand = new Command('config')
  .description('設定管理（環境變數優先於設定檔）');

configCommand
  .command('path')
  .description('顯示設定檔路徑')
  .action(() => {
    console.log(new ConfigService().getConfigPath());
  });

configCommand
  .command('show')
  .description('顯示設定檔內容（secret 會被遮蔽）')
  .action(() => {
    console.log(JSON.stringify(new ConfigService().getMasked(), null, 2));
  });

configCommand
  .command('keys')
  .description('列出設定鍵與對應的環境變數')
  .action(() => {
    for (const key of CONFIG_KEYS) {
      console.log(`${key.padEnd(16)} ${ENV_VARS[key]}`);
    }
  });

configCommand
  .command('set <key> <value>')
  .description('寫入設定值')
  .action((key: string, value: string) => {
    try {
      const config = new ConfigService();
      config.set(parseConfigValue(key, value));
      console.log(`已設定 ${key}`);
    } catch (error) {
      reportError(error);
    }
  });

configCommand
  .command('unset <key>')
  .description('刪除設定值')
  .action((key: string) => {
    try {
      if (!isConfigKey(key)) {
        throw new ConfigError(`unknown config key: ${key}`);
      }
      new ConfigService().delete(key);
      console.log(`已刪除 ${key}`);
    } catch (error) {
      reportError(error);
    }
  });
