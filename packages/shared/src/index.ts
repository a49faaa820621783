/**
 * @module shared
 *
 * 隧道共享模块入口。
 *
 * 统一导出协议常量与错误类型、控制消息编解码、帧连接、认证器、连接工具和日志工具，
 * 作为 `@suidao/shared` 包的公共 API 入口。
 */

/** 导出协议常量、错误码和错误类 */
export * from './protocol.js';
/** 导出控制消息类型及编解码函数 */
export * from './messages.js';
/** 导出 0 字节分隔的帧连接 */
export * from './framed-connection.js';
/** 导出共享密钥认证器 */
export * from './auth.js';
/** 导出带超时的 TCP 连接工具 */
export * from './dial.js';
/** 导出日志工具 */
export * from './logger.js';
