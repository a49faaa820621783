/**
 * @module config
 *
 * 客户端配置管理模块。
 *
 * 负责从配置文件、命令行参数、环境变量和默认值中加载、合并和验证客户端配置。
 * 配置优先级：命令行参数 > 环境变量 > 配置文件 > 默认值。
 * 默认配置文件路径为用户主目录下的 `.suidao/client.json`。
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LogLevel, PROTOCOL, isLogLevel, isPort } from '@suidao/shared';
import type { ControllerOptions } from './controller.js';

/** 从环境变量读取密钥时使用的变量名 */
export const SECRET_ENV = 'SUIDAO_SECRET';

/**
 * 客户端配置数据
 */
export interface ClientConfig {
  /** 本地服务的主机地址 */
  localHost: string;
  /** 本地服务的端口 */
  localPort: number;
  /** 中继服务器地址 */
  to: string;
  /** 期望的公网端口，0 表示由服务器选择 */
  port: number;
  /** 共享密钥 */
  secret?: string;
  /** 中继服务器控制端口 */
  controlPort: number;
  /** 连接和握手超时，单位毫秒 */
  timeout: number;
  /** 日志级别 */
  logLevel: LogLevel;
}

/**
 * 命令行中可以覆盖的配置项，未指定的为 `undefined`
 */
export interface ConfigOverrides {
  localHost?: string;
  localPort?: number;
  to?: string;
  port?: number;
  secret?: string;
  controlPort?: number;
  timeout?: number;
  logLevel?: LogLevel;
}

/**
 * 获取默认配置文件的完整路径。
 *
 * @returns 用户主目录下 `.suidao/client.json` 的绝对路径
 */
export function getDefaultConfigPath(): string {
  return path.join(os.homedir(), '.suidao', 'client.json');
}

/** 默认配置 */
const DEFAULTS: ClientConfig = {
  localHost: 'localhost',
  localPort: 0,
  to: '',
  port: 0,
  controlPort: PROTOCOL.CONTROL_PORT,
  timeout: PROTOCOL.NETWORK_TIMEOUT,
  logLevel: 'info',
};

/**
 * 从指定路径的 JSON 文件中加载配置。
 *
 * 文件不存在时返回空对象；文件存在但无法解析时抛出错误。
 *
 * @param configPath - 配置文件的绝对路径
 */
async function loadFromFile(configPath: string): Promise<ConfigOverrides> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(content);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`配置文件格式错误: ${configPath}`);
  }

  const result: ConfigOverrides = {};
  for (const [key, value] of Object.entries(parsed)) {
    switch (key) {
      case 'localHost':
      case 'to':
      case 'secret':
        if (typeof value !== 'string') {
          throw new Error(`配置项 ${key} 必须是字符串`);
        }
        result[key] = value;
        break;
      case 'localPort':
      case 'port':
      case 'controlPort':
      case 'timeout':
        if (typeof value !== 'number') {
          throw new Error(`配置项 ${key} 必须是数字`);
        }
        result[key] = value;
        break;
      case 'logLevel':
        if (typeof value !== 'string' || !isLogLevel(value)) {
          throw new Error(`配置项 logLevel 无效: ${String(value)}`);
        }
        result.logLevel = value;
        break;
      default:
        throw new Error(`未知的配置项: ${key}`);
    }
  }
  return result;
}

/**
 * 客户端配置类。
 *
 * @example
 * ```typescript
 * const config = await Config.load({ localPort: 8000, to: 'relay.example.com' });
 * config.validate();
 * const controller = await Controller.connect(config.toControllerOptions());
 * ```
 */
export class Config implements ClientConfig {
  localHost: string;
  localPort: number;
  to: string;
  port: number;
  secret?: string;
  controlPort: number;
  timeout: number;
  logLevel: LogLevel;

  /**
   * @param data - 客户端配置数据对象
   */
  constructor(data: ClientConfig) {
    this.localHost = data.localHost;
    this.localPort = data.localPort;
    this.to = data.to;
    this.port = data.port;
    this.secret = data.secret;
    this.controlPort = data.controlPort;
    this.timeout = data.timeout;
    this.logLevel = data.logLevel;
  }

  /**
   * 合并默认值、配置文件、环境变量和命令行参数并创建实例。
   *
   * @param overrides - 命令行参数
   * @param configPath - 配置文件路径，默认 {@link getDefaultConfigPath}
   * @param env - 环境变量，默认 `process.env`
   */
  static async load(
    overrides: ConfigOverrides = {},
    configPath: string = getDefaultConfigPath(),
    env: NodeJS.ProcessEnv = process.env
  ): Promise<Config> {
    const base: ClientConfig = { ...DEFAULTS, ...(await loadFromFile(configPath)) };
    const envSecret = env[SECRET_ENV] || undefined;

    return new Config({
      localHost: overrides.localHost ?? base.localHost,
      localPort: overrides.localPort ?? base.localPort,
      to: overrides.to ?? base.to,
      port: overrides.port ?? base.port,
      secret: overrides.secret ?? envSecret ?? base.secret,
      controlPort: overrides.controlPort ?? base.controlPort,
      timeout: overrides.timeout ?? base.timeout,
      logLevel: overrides.logLevel ?? base.logLevel,
    });
  }

  /**
   * 验证配置的合法性。
   *
   * @throws {Error} 当配置项不合法时抛出错误，包含具体的错误描述
   */
  validate(): void {
    if (!this.to) {
      throw new Error('中继服务器地址是必需的 (--to <host> 或配置文件)');
    }
    if (!isPort(this.localPort) || this.localPort === 0) {
      throw new Error(`本地端口无效: ${this.localPort}`);
    }
    if (!isPort(this.port)) {
      throw new Error(`公网端口无效: ${this.port}`);
    }
    if (!isPort(this.controlPort) || this.controlPort === 0) {
      throw new Error(`控制端口无效: ${this.controlPort}`);
    }
    if (!Number.isFinite(this.timeout) || this.timeout <= 0) {
      throw new Error(`超时时间无效: ${this.timeout}`);
    }
  }

  /**
   * 转换为 {@link Controller.connect} 的参数
   */
  toControllerOptions(): ControllerOptions {
    return {
      localHost: this.localHost,
      localPort: this.localPort,
      to: this.to,
      desiredPort: this.port,
      secret: this.secret,
      controlPort: this.controlPort,
      timeout: this.timeout,
    };
  }
}
