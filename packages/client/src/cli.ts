#!/usr/bin/env node

/**
 * @module cli
 * @description 隧道客户端命令行工具模块。
 * 提供 `suidao` CLI 命令，把本地端口通过中继服务器暴露到公网。
 * 控制连接结束后进程以非零状态退出，是否重启由外部进程管理器决定。
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { LogLevel, errorMessage, isLogLevel, setLogLevel } from '@suidao/shared';
import { Config, ConfigOverrides, SECRET_ENV, getDefaultConfigPath } from './config.js';
import { Controller } from './controller.js';

/**
 * 解析整数参数
 */
function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('必须是整数');
  }
  return parsed;
}

/**
 * 解析日志级别参数
 */
function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('必须是 debug、info、warn 或 error');
  }
  return value;
}

/**
 * `local` 命令的选项
 */
interface LocalOptions {
  to?: string;
  localHost?: string;
  port?: number;
  secret?: string;
  controlPort?: number;
  timeout?: number;
  config?: string;
  logLevel?: LogLevel;
  verbose?: boolean;
}

/**
 * 启动隧道并监听，直到收到 SIGINT/SIGTERM 或控制连接结束
 */
async function runLocal(localPort: number, options: LocalOptions): Promise<void> {
  const overrides: ConfigOverrides = {
    localPort,
    localHost: options.localHost,
    to: options.to,
    port: options.port,
    secret: options.secret,
    controlPort: options.controlPort,
    timeout: options.timeout,
    logLevel: options.verbose ? 'debug' : options.logLevel,
  };
  const config = await Config.load(overrides, options.config ?? getDefaultConfigPath());
  config.validate();
  setLogLevel(config.logLevel);

  const controller = await Controller.connect(config.toControllerOptions());
  console.log(chalk.green('隧道已建立'));
  console.log(chalk.gray(`  公网地址: ${config.to}:${controller.getRemotePort()}`));
  console.log(chalk.gray(`  本地服务: ${config.localHost}:${config.localPort}`));

  const abort = new AbortController();
  const shutdown = (): void => {
    console.log(chalk.yellow('\n正在关闭...'));
    abort.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await controller.listen(abort.signal);
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }

  if (!abort.signal.aborted) {
    throw new Error('服务器关闭了控制连接');
  }
}

const program = new Command();

program
  .name('suidao')
  .description(chalk.blue('隧道 - 把本地 TCP 端口暴露到公网'))
  .version('0.1.0');

program
  .command('local')
  .description('把本地端口通过中继服务器暴露到公网')
  .argument('<localPort>', '本地服务端口', parseInteger)
  .option('-t, --to <host>', '中继服务器地址')
  .option('-l, --local-host <host>', '本地服务地址（默认为 localhost）')
  .option('-p, --port <port>', '期望的公网端口（0 表示由服务器选择）', parseInteger)
  .option('-s, --secret <secret>', `共享密钥（也可以通过环境变量 ${SECRET_ENV} 提供）`)
  .option('--control-port <port>', '中继服务器控制端口', parseInteger)
  .option('--timeout <ms>', '连接和握手超时（毫秒）', parseInteger)
  .option('-c, --config <path>', '配置文件路径')
  .option('--log-level <level>', '日志级别：debug、info、warn 或 error（默认为 info）', parseLogLevel)
  .option('-v, --verbose', '输出调试日志，等同于 --log-level debug')
  .action(async (localPort: number, options: LocalOptions) => {
    try {
      await runLocal(localPort, options);
    } catch (error) {
      console.log(chalk.red(`错误: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.log(chalk.red(`错误: ${errorMessage(error)}`));
  process.exit(1);
});
