/**
 * @module protocol
 *
 * 隧道协议定义模块。
 *
 * 本模块定义了隧道客户端与中继服务器通信所需的协议常量、错误码和错误类型，
 * 包括控制端口、最大帧长度、网络超时等关键参数。
 */

/**
 * 协议常量
 *
 * 定义隧道协议的基础参数。
 */
export const PROTOCOL = {
  /** 中继服务器的默认控制端口，控制连接和每个代理隧道连接都使用此端口 */
  CONTROL_PORT: 7835,
  /** 单帧 JSON 编码后的最大字节数（不含结尾的 0 字节） */
  MAX_FRAME_LENGTH: 256,
  /** 帧结束符 */
  FRAME_DELIMITER: 0x00,
  /** 建立连接、握手和等待初始响应的超时时间，单位毫秒 */
  NETWORK_TIMEOUT: 3000,
} as const;

/**
 * 协议错误码
 *
 * 涵盖传输错误、协议错误、认证错误和应用错误四大类。
 */
export enum ErrorCode {
  /** 建立 TCP 连接失败 */
  CONNECT_FAILED = 'CONNECT_FAILED',
  /** 读写 socket 失败 */
  IO_ERROR = 'IO_ERROR',
  /** 等待对端超时 */
  TIMED_OUT = 'TIMED_OUT',

  /** 帧长度超过 {@link PROTOCOL.MAX_FRAME_LENGTH} */
  FRAME_TOO_LARGE = 'FRAME_TOO_LARGE',
  /** 收到零长度的帧 */
  EMPTY_FRAME = 'EMPTY_FRAME',
  /** 连接在帧中途结束 */
  TRUNCATED_FRAME = 'TRUNCATED_FRAME',
  /** 收到除 "Heartbeat" 以外的裸字符串消息 */
  UNEXPECTED_UNIT_MESSAGE = 'UNEXPECTED_UNIT_MESSAGE',
  /** 消息不是合法的单键 JSON 对象，或负载类型不对 */
  MALFORMED_MESSAGE = 'MALFORMED_MESSAGE',
  /** 消息中的 UUID 无法解析 */
  INVALID_UUID = 'INVALID_UUID',
  /** 服务器在需要消息时关闭了连接 */
  UNEXPECTED_EOF = 'UNEXPECTED_EOF',
  /** 服务器对 Hello 的响应既不是 Hello 也不是 Error */
  UNEXPECTED_INITIAL_MESSAGE = 'UNEXPECTED_INITIAL_MESSAGE',

  /** 服务器要求认证，但客户端没有配置密钥 */
  AUTHENTICATION_REQUIRED = 'AUTHENTICATION_REQUIRED',
  /** 认证握手期间收到的不是 Challenge */
  UNEXPECTED_HANDSHAKE_MESSAGE = 'UNEXPECTED_HANDSHAKE_MESSAGE',

  /** 服务器返回了 Error 消息 */
  SERVER_REJECTED = 'SERVER_REJECTED',
}

/**
 * 隧道错误类
 *
 * 继承自 {@link Error}，附带 {@link ErrorCode} 错误码。
 * 底层错误通过 `cause` 保留。
 */
export class TunnelError extends Error {
  /**
   * @param code - 错误码
   * @param message - 可读的错误描述信息
   * @param cause - 引起此错误的底层错误
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TunnelError';
  }
}

/**
 * 判断一个错误是否为 {@link TunnelError}，可选地同时匹配错误码。
 */
export function isTunnelError(error: unknown, code?: ErrorCode): error is TunnelError {
  return error instanceof TunnelError && (code === undefined || error.code === code);
}

/**
 * 提取错误的描述信息
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
