/**
 * @module proxy-session
 *
 * 代理会话模块。
 *
 * 中继服务器每通知一个新连接，客户端就重新连接一次中继服务器，
 * 认领该连接后在隧道连接和本地服务连接之间双向转发原始字节。
 */

import { Socket } from 'net';
import {
  Authenticator,
  FramedConnection,
  createLogger,
  dial,
  encodeAccept,
} from '@suidao/shared';
import { relay } from './relay.js';

const log = createLogger('proxy');

/**
 * 建立隧道所需的配置，由控制器在握手时确定
 */
export interface TunnelSettings {
  /** 本地服务的主机地址 */
  localHost: string;
  /** 本地服务的端口 */
  localPort: number;
  /** 中继服务器地址 */
  to: string;
  /** 中继服务器控制端口 */
  controlPort: number;
  /** 连接和握手超时，单位毫秒 */
  timeout: number;
  /** 认证器，未配置密钥时为 `null` */
  auth: Authenticator | null;
}

/**
 * 代理会话
 *
 * 一次性对象，生命周期内只持有隧道 socket 和本地 socket。
 */
export class ProxySession {
  /**
   * @param id - 中继服务器分配的连接 UUID
   * @param settings - 隧道配置
   */
  constructor(
    readonly id: string,
    private readonly settings: TunnelSettings
  ) {}

  /**
   * 运行会话，直到任一方向的连接结束。
   *
   * 1. 重新连接中继服务器的控制端口
   * 2. 配置了密钥时完成认证握手（中继对每个新连接都会发出挑战）
   * 3. 发送 Accept 认领连接
   * 4. 清除截止时间，取出已缓冲的字节
   * 5. 连接本地服务，先写入已缓冲的字节，再开始双向转发
   *
   * @throws 握手、认领或连接本地服务失败时抛出；此时已打开的 socket 都会被关闭
   */
  async run(): Promise<void> {
    const { to, controlPort, localHost, localPort, timeout, auth } = this.settings;

    const tunnel = new FramedConnection(await dial(to, controlPort, timeout), timeout);
    let buffered: Buffer;
    let local: Socket;
    try {
      if (auth) {
        await auth.clientHandshake(tunnel);
      }
      await tunnel.send(encodeAccept(this.id));
      tunnel.clearDeadline();
      buffered = tunnel.drainBuffered();
      local = await dial(localHost, localPort, timeout);
    } catch (error) {
      await tunnel.close();
      throw error;
    }

    log.debug(`代理会话 ${this.id}: ${to}:${controlPort} <-> ${localHost}:${localPort}，已缓冲 ${buffered.length} 字节`);

    // 写入队列保证缓冲字节先于后续转发的数据到达本地服务
    if (buffered.length > 0) {
      local.write(buffered);
    }
    await relay(local, tunnel.getSocket());
  }
}
