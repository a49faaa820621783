/**
 * @module controller
 *
 * 客户端控制器模块。
 *
 * 管理客户端与中继服务器之间的控制连接：连接、可选的认证握手、请求公网端口，
 * 然后在监听循环中处理心跳和新连接通知，为每个新连接派发一个独立的代理会话。
 */

import { EventEmitter } from 'events';
import {
  Authenticator,
  ErrorCode,
  FramedConnection,
  PROTOCOL,
  ServerMessageType,
  TunnelError,
  createLogger,
  dial,
  encodeHello,
  errorMessage,
} from '@suidao/shared';
import { ProxySession, TunnelSettings } from './proxy-session.js';

const log = createLogger('controller');

/**
 * 控制器选项
 */
export interface ControllerOptions {
  /** 本地服务的主机地址 */
  localHost: string;
  /** 本地服务的端口 */
  localPort: number;
  /** 中继服务器地址 */
  to: string;
  /** 期望的公网端口，0 或不填表示由服务器选择 */
  desiredPort?: number;
  /** 共享密钥，不填表示不认证 */
  secret?: string;
  /** 中继服务器控制端口，默认 {@link PROTOCOL.CONTROL_PORT} */
  controlPort?: number;
  /** 连接和握手超时，单位毫秒，默认 {@link PROTOCOL.NETWORK_TIMEOUT} */
  timeout?: number;
}

/**
 * 客户端控制器类。
 *
 * 通过 {@link Controller.connect} 创建，创建成功即已完成握手并拿到公网端口。
 *
 * 事件：
 * - `heartbeat(at: Date)`：收到心跳
 * - `connection(id: string)`：收到新连接通知，代理会话已派发
 * - `proxyClosed(id: string)`：代理会话正常结束
 * - `proxyError(id: string, error: Error)`：代理会话出错结束
 * - `disconnected`：监听循环退出
 */
export class Controller extends EventEmitter {
  private connected = true;
  private activeProxies = 0;
  private lastHeartbeat: Date | null = null;
  private closing: Promise<void> | null = null;

  private constructor(
    private readonly conn: FramedConnection,
    private readonly settings: TunnelSettings,
    private readonly remotePort: number
  ) {
    super();
  }

  /**
   * 连接到中继服务器并完成握手。
   *
   * 连接 → 认证（配置了密钥时）→ 发送 Hello → 等待 Hello 或 Error。
   * 任何一步失败都会关闭 socket 并 reject，不会返回半初始化的控制器。
   *
   * @throws {TunnelError} `SERVER_REJECTED`、`AUTHENTICATION_REQUIRED`、`UNEXPECTED_INITIAL_MESSAGE`、
   * `UNEXPECTED_EOF`，以及连接、握手和帧读写的各类错误
   */
  static async connect(options: ControllerOptions): Promise<Controller> {
    const settings: TunnelSettings = {
      localHost: options.localHost,
      localPort: options.localPort,
      to: options.to,
      controlPort: options.controlPort ?? PROTOCOL.CONTROL_PORT,
      timeout: options.timeout ?? PROTOCOL.NETWORK_TIMEOUT,
      auth: options.secret ? new Authenticator(options.secret) : null,
    };

    log.debug(`正在连接 ${settings.to}:${settings.controlPort}...`);
    const socket = await dial(settings.to, settings.controlPort, settings.timeout);
    const conn = new FramedConnection(socket, settings.timeout);

    try {
      if (settings.auth) {
        await settings.auth.clientHandshake(conn);
      }
      await conn.send(encodeHello(options.desiredPort ?? 0));
      const remotePort = await Controller.awaitHello(conn);

      log.info(`已连接到服务器，公网端口 ${remotePort}`);
      return new Controller(conn, settings, remotePort);
    } catch (error) {
      await conn.close();
      throw error;
    }
  }

  /**
   * 等待服务器对 Hello 的唯一响应
   */
  private static async awaitHello(conn: FramedConnection): Promise<number> {
    const msg = await conn.receiveServerMessage(true);
    if (!msg) {
      throw new TunnelError(ErrorCode.UNEXPECTED_EOF, '服务器在握手时关闭了连接');
    }

    switch (msg.type) {
      case ServerMessageType.HELLO:
        return msg.port;
      case ServerMessageType.ERROR:
        throw new TunnelError(ErrorCode.SERVER_REJECTED, `服务器错误: ${msg.message}`);
      case ServerMessageType.CHALLENGE:
        throw new TunnelError(ErrorCode.AUTHENTICATION_REQUIRED, '服务器要求认证，但没有提供密钥');
      default:
        throw new TunnelError(ErrorCode.UNEXPECTED_INITIAL_MESSAGE, `意外的初始消息: ${msg.type}`);
    }
  }

  /**
   * 获取服务器分配的公网端口
   */
  getRemotePort(): number {
    return this.remotePort;
  }

  /**
   * 控制连接是否处于活动状态
   */
  isConnected(): boolean {
    return this.connected;
  }

  /**
   * 获取当前活跃的代理会话数
   */
  getActiveProxyCount(): number {
    return this.activeProxies;
  }

  /**
   * 获取最近一次收到心跳的时间，从未收到时为 `null`
   */
  getLastHeartbeat(): Date | null {
    return this.lastHeartbeat;
  }

  /**
   * 关闭控制连接。
   *
   * 无论调用多少次，底层 socket 只关闭一次，所有调用方拿到同一个 Promise。
   * 已经在运行的代理会话不受影响。
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.connected = false;
      this.closing = this.conn.close();
    }
    return this.closing;
  }

  /**
   * 监听服务器消息，直到连接结束或被取消。
   *
   * 监听期间的读取没有超时，长时间空闲是正常的。
   * `signal` 触发时从外部关闭控制连接，阻塞中的读取随之看到连接结束，循环正常退出。
   *
   * @param signal - 取消信号
   * @throws {TunnelError} 服务器返回 Error 时为 `SERVER_REJECTED`，以及帧读取和解码错误
   */
  async listen(signal?: AbortSignal): Promise<void> {
    const onAbort = (): void => {
      log.debug('收到停止请求，正在关闭控制连接');
      void this.close();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) {
      onAbort();
    }

    try {
      await this.receiveLoop();
      log.info('控制连接已结束');
    } catch (error) {
      log.error('控制连接出错:', errorMessage(error));
      throw error;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await this.close();
      this.emit('disconnected');
    }
  }

  private async receiveLoop(): Promise<void> {
    for (;;) {
      const msg = await this.conn.receiveServerMessage(false);
      if (!msg) {
        return;
      }

      switch (msg.type) {
        case ServerMessageType.HEARTBEAT:
          this.lastHeartbeat = new Date();
          this.emit('heartbeat', this.lastHeartbeat);
          break;
        case ServerMessageType.CONNECTION:
          this.dispatch(msg.id);
          break;
        case ServerMessageType.HELLO:
        case ServerMessageType.CHALLENGE:
          log.warn(`意外的控制消息: ${msg.type}`);
          break;
        case ServerMessageType.ERROR:
          throw new TunnelError(ErrorCode.SERVER_REJECTED, `服务器错误: ${msg.message}`);
        default: {
          const unreachable: never = msg;
          log.warn('未知的服务器消息:', unreachable);
        }
      }
    }
  }

  /**
   * 派发一个代理会话，不等待其结束
   */
  private dispatch(id: string): void {
    this.emit('connection', id);
    this.handleConnection(id).then(
      () => {
        log.debug(`代理会话 ${id} 已结束`);
        this.emit('proxyClosed', id);
      },
      (error: unknown) => {
        log.warn(`代理会话 ${id} 出错:`, errorMessage(error));
        this.emit('proxyError', id, error instanceof Error ? error : new Error(String(error)));
      }
    );
  }

  private async handleConnection(id: string): Promise<void> {
    this.activeProxies++;
    try {
      const session = new ProxySession(id, this.settings);
      await session.run();
    } finally {
      this.activeProxies--;
    }
  }
}
