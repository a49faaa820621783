/**
 * @module logger
 *
 * 日志工具模块，提供带时间戳、分级和作用域的日志输出功能。
 */

/**
 * 日志级别，按严重程度递增
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** 当前进程的日志级别 */
let currentLevel: LogLevel = 'info';

/**
 * 设置进程级的日志级别，低于此级别的日志不输出
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * 检查字符串是否为合法的日志级别
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.keys(LEVEL_ORDER).includes(value);
}

/**
 * 格式化当前时间为日志时间戳
 *
 * @returns 格式化的时间字符串，格式为 HH:MM:SS.mmm
 */
function formatTimestamp(): string {
  const now = new Date();
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  const ms = String(now.getMilliseconds()).padStart(3, '0');
  return `${hours}:${minutes}:${seconds}.${ms}`;
}

/**
 * 日志器接口
 */
export interface Logger {
  debug(...message: unknown[]): void;
  info(...message: unknown[]): void;
  /** {@link Logger.info} 的别名 */
  log(...message: unknown[]): void;
  warn(...message: unknown[]): void;
  error(...message: unknown[]): void;
}

/**
 * 创建日志器
 *
 * @param scope - 作用域名称，输出时以 `[scope]` 跟在时间戳后面
 *
 * @example
 * ```typescript
 * const log = createLogger('controller');
 * log.info('已连接');  // [12:00:00.000] [controller] 已连接
 * ```
 */
export function createLogger(scope?: string): Logger {
  const write = (level: LogLevel, sink: (...args: unknown[]) => void, message: unknown[]): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) {
      return;
    }
    const prefix = [`[${formatTimestamp()}]`];
    if (scope) {
      prefix.push(`[${scope}]`);
    }
    sink(...prefix, ...message);
  };

  return {
    debug: (...message) => write('debug', console.debug, message),
    info: (...message) => write('info', console.log, message),
    log: (...message) => write('info', console.log, message),
    warn: (...message) => write('warn', console.warn, message),
    error: (...message) => write('error', console.error, message),
  };
}

/**
 * 不带作用域的默认日志器
 */
export const logger: Logger = createLogger();
