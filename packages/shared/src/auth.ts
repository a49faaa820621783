/**
 * @module auth
 *
 * 共享密钥认证。
 *
 * 中继服务器对每一个新连接（控制连接或代理隧道连接）都发出一个随机 UUID 作为挑战，
 * 客户端用 SHA-256(密钥) 作为 HMAC-SHA256 的 key，对 UUID 的 16 个原始字节计算应答。
 */

import { createHash, createHmac, timingSafeEqual } from 'crypto';
import { FramedConnection } from './framed-connection.js';
import { ServerMessageType, encodeAuthenticate, uuidBytes } from './messages.js';
import { ErrorCode, TunnelError } from './protocol.js';

/**
 * 认证器
 *
 * 构造时从密钥派生出固定长度的 key，之后不再持有其他状态。
 */
export class Authenticator {
  private readonly key: Buffer;

  /**
   * @param secret - 与中继服务器共享的密钥
   */
  constructor(secret: string) {
    this.key = createHash('sha256').update(secret, 'utf-8').digest();
  }

  /**
   * 计算挑战的应答
   *
   * @param challengeId - 挑战 UUID
   * @returns 小写十六进制的 HMAC-SHA256
   * @throws {TunnelError} 挑战不是 UUID 文本时为 `INVALID_UUID`
   */
  answer(challengeId: string): string {
    return createHmac('sha256', this.key).update(uuidBytes(challengeId)).digest('hex');
  }

  /**
   * 校验应答是否正确
   */
  validate(challengeId: string, tag: string): boolean {
    const expected = Buffer.from(this.answer(challengeId), 'utf-8');
    const actual = Buffer.from(tag, 'utf-8');
    return expected.length === actual.length && timingSafeEqual(expected, actual);
  }

  /**
   * 在一个新连接上完成客户端握手：接收挑战，发送应答
   *
   * @throws {TunnelError} 对端关闭为 `UNEXPECTED_EOF`，收到的不是挑战为 `UNEXPECTED_HANDSHAKE_MESSAGE`
   */
  async clientHandshake(conn: FramedConnection): Promise<void> {
    const msg = await conn.receiveServerMessage(true);
    if (!msg) {
      throw new TunnelError(ErrorCode.UNEXPECTED_EOF, '服务器在认证握手时关闭了连接');
    }
    if (msg.type !== ServerMessageType.CHALLENGE) {
      throw new TunnelError(ErrorCode.UNEXPECTED_HANDSHAKE_MESSAGE, `认证握手时收到意外消息: ${msg.type}`);
    }
    await conn.send(encodeAuthenticate(this.answer(msg.id)));
  }
}
