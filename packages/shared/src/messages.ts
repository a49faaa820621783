/**
 * @module messages
 *
 * 隧道控制消息定义模块。
 *
 * 本模块定义了中继服务器与客户端之间通过控制连接传输的所有消息类型。
 * 每条消息在线路上是一个 JSON 值：`Heartbeat` 编码为裸字符串 `"Heartbeat"`，
 * 其余消息编码为以消息类型为唯一键的对象，例如 `{"Hello": 9000}`。
 */

import { ErrorCode, TunnelError } from './protocol.js';

/**
 * 服务端消息类型枚举（中继 → 客户端）
 *
 * 枚举值即线路上使用的键名。
 */
export enum ServerMessageType {
  /** 握手完成，携带服务器分配的公网端口 */
  HELLO = 'Hello',
  /** 认证挑战，携带一个随机 UUID */
  CHALLENGE = 'Challenge',
  /** 心跳 */
  HEARTBEAT = 'Heartbeat',
  /** 公网端口上有新的连接到达，携带连接 UUID */
  CONNECTION = 'Connection',
  /** 服务器拒绝请求，携带错误描述 */
  ERROR = 'Error',
}

/**
 * 客户端消息类型枚举（客户端 → 中继）
 */
export enum ClientMessageType {
  /** 请求一个公网端口，0 表示由服务器选择 */
  HELLO = 'Hello',
  /** 对认证挑战的应答 */
  AUTHENTICATE = 'Authenticate',
  /** 认领一个待处理的连接 */
  ACCEPT = 'Accept',
}

export interface ServerHelloMessage {
  type: ServerMessageType.HELLO;
  /** 服务器分配的公网端口 */
  port: number;
}

export interface ChallengeMessage {
  type: ServerMessageType.CHALLENGE;
  /** 挑战 UUID（小写规范格式） */
  id: string;
}

export interface HeartbeatMessage {
  type: ServerMessageType.HEARTBEAT;
}

export interface ConnectionMessage {
  type: ServerMessageType.CONNECTION;
  /** 待认领连接的 UUID（小写规范格式） */
  id: string;
}

export interface ErrorMessage {
  type: ServerMessageType.ERROR;
  /** 服务器给出的错误描述，原样保留 */
  message: string;
}

/**
 * 所有服务端消息的联合类型
 */
export type ServerMessage =
  | ServerHelloMessage
  | ChallengeMessage
  | HeartbeatMessage
  | ConnectionMessage
  | ErrorMessage;

export interface ClientHelloMessage {
  type: ClientMessageType.HELLO;
  /** 期望的公网端口，0 表示由服务器选择 */
  port: number;
}

export interface AuthenticateMessage {
  type: ClientMessageType.AUTHENTICATE;
  /** HMAC 应答的十六进制字符串 */
  tag: string;
}

export interface AcceptMessage {
  type: ClientMessageType.ACCEPT;
  /** 要认领的连接 UUID */
  id: string;
}

/**
 * 所有客户端消息的联合类型
 */
export type ClientMessage = ClientHelloMessage | AuthenticateMessage | AcceptMessage;

/** 8-4-4-4-12 位十六进制的 UUID 文本，不限制版本和变体位 */
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * 线路上的消息对象：恰好一个键，键名为消息类型
 */
type WireObject = Record<string, unknown>;

function malformed(message: string, cause?: unknown): TunnelError {
  return new TunnelError(ErrorCode.MALFORMED_MESSAGE, message, cause);
}

/**
 * 检查值是否为合法端口号（0 ~ 65535 的整数）
 */
export function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 65535;
}

/**
 * 检查字符串是否为 UUID 文本
 */
export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/**
 * 取出 UUID 的 16 个原始字节
 *
 * @throws {TunnelError} 不是 UUID 文本时为 `INVALID_UUID`
 */
export function uuidBytes(id: string): Buffer {
  if (!isUuid(id)) {
    throw new TunnelError(ErrorCode.INVALID_UUID, `UUID 无效: ${id}`);
  }
  return Buffer.from(id.replace(/-/g, ''), 'hex');
}

/**
 * 解析 UUID 字符串并规范化为小写格式
 *
 * @throws {TunnelError} 负载不是字符串时为 `MALFORMED_MESSAGE`，不是合法 UUID 时为 `INVALID_UUID`
 */
function readUuid(tag: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw malformed(`${tag} 消息的负载必须是字符串`);
  }
  if (!isUuid(value)) {
    throw new TunnelError(ErrorCode.INVALID_UUID, `${tag} 消息中的 UUID 无效: ${value}`);
  }
  return value.toLowerCase();
}

function readString(tag: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw malformed(`${tag} 消息的负载必须是字符串`);
  }
  return value;
}

function readPort(tag: string, value: unknown): number {
  if (!isPort(value)) {
    throw malformed(`${tag} 消息的端口无效: ${JSON.stringify(value)}`);
  }
  return value;
}

/**
 * 把帧内容解析为 JSON，并拆成裸字符串或单键对象
 */
function parseFrame(data: Uint8Array): { unit: string } | { tag: string; value: unknown } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(data).toString('utf-8'));
  } catch (error) {
    throw malformed('消息不是合法的 JSON', error);
  }

  if (typeof parsed === 'string') {
    return { unit: parsed };
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw malformed('消息必须是字符串或对象');
  }

  const entries = Object.entries(parsed);
  if (entries.length !== 1) {
    throw malformed(`消息对象必须恰好包含一个键，实际为 ${entries.length} 个`);
  }
  const [tag, value] = entries[0];
  return { tag, value };
}

/**
 * 解码服务端消息
 *
 * 先尝试按裸字符串解析：`"Heartbeat"` 得到心跳，其他字符串视为错误。
 * 否则按单键对象解析，键名必须是 `Hello`、`Challenge`、`Connection`、`Error` 之一。
 *
 * @param data - 一帧的内容（不含结尾的 0 字节）
 * @throws {TunnelError} `UNEXPECTED_UNIT_MESSAGE`、`MALFORMED_MESSAGE` 或 `INVALID_UUID`
 */
export function decodeServerMessage(data: Uint8Array): ServerMessage {
  const frame = parseFrame(data);

  if ('unit' in frame) {
    if (frame.unit === ServerMessageType.HEARTBEAT) {
      return { type: ServerMessageType.HEARTBEAT };
    }
    throw new TunnelError(ErrorCode.UNEXPECTED_UNIT_MESSAGE, `意外的无负载消息: ${frame.unit}`);
  }

  const { tag, value } = frame;
  switch (tag) {
    case ServerMessageType.HELLO:
      return { type: ServerMessageType.HELLO, port: readPort(tag, value) };
    case ServerMessageType.CHALLENGE:
      return { type: ServerMessageType.CHALLENGE, id: readUuid(tag, value) };
    case ServerMessageType.CONNECTION:
      return { type: ServerMessageType.CONNECTION, id: readUuid(tag, value) };
    case ServerMessageType.ERROR:
      return { type: ServerMessageType.ERROR, message: readString(tag, value) };
    default:
      throw malformed(`未知的消息类型: ${tag}`);
  }
}

/**
 * 解码客户端消息，规则与 {@link decodeServerMessage} 相同
 *
 * 客户端本身不需要它，供测试中的中继替身读取客户端发出的消息。
 */
export function decodeClientMessage(data: Uint8Array): ClientMessage {
  const frame = parseFrame(data);
  if ('unit' in frame) {
    throw new TunnelError(ErrorCode.UNEXPECTED_UNIT_MESSAGE, `意外的无负载消息: ${frame.unit}`);
  }

  const { tag, value } = frame;
  switch (tag) {
    case ClientMessageType.HELLO:
      return { type: ClientMessageType.HELLO, port: readPort(tag, value) };
    case ClientMessageType.AUTHENTICATE:
      return { type: ClientMessageType.AUTHENTICATE, tag: readString(tag, value) };
    case ClientMessageType.ACCEPT:
      return { type: ClientMessageType.ACCEPT, id: readUuid(tag, value) };
    default:
      throw malformed(`未知的消息类型: ${tag}`);
  }
}

/**
 * 编码 Hello 消息
 *
 * @param port - 期望的公网端口，0 表示由服务器选择
 */
export function encodeHello(port: number): WireObject {
  return { [ClientMessageType.HELLO]: port };
}

/**
 * 编码 Authenticate 消息
 */
export function encodeAuthenticate(tag: string): WireObject {
  return { [ClientMessageType.AUTHENTICATE]: tag };
}

/**
 * 编码 Accept 消息
 */
export function encodeAccept(id: string): WireObject {
  return { [ClientMessageType.ACCEPT]: id };
}

/**
 * 编码任意客户端消息
 */
export function encodeClientMessage(msg: ClientMessage): WireObject {
  switch (msg.type) {
    case ClientMessageType.HELLO:
      return encodeHello(msg.port);
    case ClientMessageType.AUTHENTICATE:
      return encodeAuthenticate(msg.tag);
    case ClientMessageType.ACCEPT:
      return encodeAccept(msg.id);
    default: {
      const unreachable: never = msg;
      throw malformed(`未知的客户端消息: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * 编码任意服务端消息
 *
 * 与 {@link decodeServerMessage} 互逆，供测试中的中继替身使用。
 */
export function encodeServerMessage(msg: ServerMessage): string | WireObject {
  switch (msg.type) {
    case ServerMessageType.HEARTBEAT:
      return ServerMessageType.HEARTBEAT;
    case ServerMessageType.HELLO:
      return { [ServerMessageType.HELLO]: msg.port };
    case ServerMessageType.CHALLENGE:
      return { [ServerMessageType.CHALLENGE]: msg.id };
    case ServerMessageType.CONNECTION:
      return { [ServerMessageType.CONNECTION]: msg.id };
    case ServerMessageType.ERROR:
      return { [ServerMessageType.ERROR]: msg.message };
    default: {
      const unreachable: never = msg;
      throw malformed(`未知的服务端消息: ${JSON.stringify(unreachable)}`);
    }
  }
}
