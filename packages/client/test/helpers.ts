/**
 * 客户端测试共享工具函数
 *
 * 提供进程内的中继服务器替身和本地服务替身，测试不访问任何外部网络。
 */

import { createServer, Server, Socket } from 'net';
import {
  Authenticator,
  ClientMessage,
  ClientMessageType,
  FramedConnection,
  ServerMessageType,
  encodeServerMessage,
} from '@suidao/shared';
import { v4 as uuidv4 } from 'uuid';
import { expect } from 'vitest';
import { Controller, ControllerOptions } from '../src/controller.js';
import { listen } from '../../shared/test/helpers.js';

export { ByteCollector, createSocketPair, destroyAll, getClosedPort, waitForClose } from '../../shared/test/helpers.js';

/**
 * 等待指定毫秒
 */
export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * 按顺序接收 socket 的队列
 */
class SocketQueue {
  private readonly ready: Socket[] = [];
  private readonly waiters: Array<(socket: Socket) => void> = [];

  push(socket: Socket): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(socket);
    } else {
      this.ready.push(socket);
    }
  }

  next(timeout: number): Promise<Socket> {
    const socket = this.ready.shift();
    if (socket) {
      return Promise.resolve(socket);
    }
    return new Promise<Socket>((resolve, reject) => {
      const waiter = (accepted: Socket): void => {
        clearTimeout(timer);
        resolve(accepted);
      };
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(new Error('等待新连接超时'));
      }, timeout);
      this.waiters.push(waiter);
    });
  }
}

/**
 * 监听随机端口并记录所有连接的 TCP 服务
 */
class TestServer {
  protected readonly sockets = new Set<Socket>();
  protected readonly queue = new SocketQueue();

  protected constructor(
    private readonly server: Server,
    readonly port: number
  ) {
    server.on('connection', (socket) => {
      this.sockets.add(socket);
      socket.once('close', () => this.sockets.delete(socket));
      socket.on('error', () => socket.destroy());
      this.onConnection(socket);
      this.queue.push(socket);
    });
  }

  protected onConnection(_socket: Socket): void {}

  /**
   * 当前仍打开的连接数
   */
  get openConnections(): number {
    return this.sockets.size;
  }

  /**
   * 销毁所有连接并停止监听
   */
  async close(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    await new Promise<void>((resolve) => this.server.close(() => resolve()));
  }
}

/**
 * 中继服务器替身
 *
 * 测试代码通过 {@link FakeRelay.accept} 依次拿到客户端建立的每个连接，
 * 再用 {@link FramedConnection} 扮演服务器一方。
 */
export class FakeRelay extends TestServer {
  static async start(): Promise<FakeRelay> {
    const server = createServer();
    const port = await listen(server);
    return new FakeRelay(server, port);
  }

  /**
   * 等待客户端的下一个连接
   */
  async accept(timeout = 2000): Promise<FramedConnection> {
    return new FramedConnection(await this.queue.next(timeout));
  }
}

/**
 * 本地服务替身
 *
 * `echo` 为 true 时把收到的字节原样写回。
 */
export class LocalService extends TestServer {
  private echo = false;

  static async start(echo: boolean): Promise<LocalService> {
    const server = createServer();
    const port = await listen(server);
    const service = new LocalService(server, port);
    service.echo = echo;
    return service;
  }

  protected override onConnection(socket: Socket): void {
    if (this.echo) {
      socket.pipe(socket);
    }
  }

  /**
   * 等待下一个来自代理会话的连接
   */
  nextConnection(timeout = 2000): Promise<Socket> {
    return this.queue.next(timeout);
  }
}

/**
 * 中继一方的握手：可选地发出挑战并校验应答，然后读取一条客户端消息
 *
 * @returns 挑战之后收到的第一条客户端消息
 */
export async function serverHandshake(conn: FramedConnection, secret?: string): Promise<ClientMessage | null> {
  if (secret) {
    const id = uuidv4();
    await conn.send(encodeServerMessage({ type: ServerMessageType.CHALLENGE, id }));
    const reply = await conn.receiveClientMessage(true);
    expect(reply?.type).toBe(ClientMessageType.AUTHENTICATE);
    if (reply?.type === ClientMessageType.AUTHENTICATE) {
      expect(new Authenticator(secret).validate(id, reply.tag)).toBe(true);
    }
  }
  return conn.receiveClientMessage(true);
}

/**
 * 隧道的控制器和中继一方的控制连接
 */
export interface Tunnel {
  controller: Controller;
  control: FramedConnection;
}

/**
 * 通过替身中继建立一条隧道
 *
 * @param remotePort - 中继回复的公网端口
 */
export async function openTunnel(
  relay: FakeRelay,
  options: Partial<ControllerOptions> = {},
  remotePort = 9000
): Promise<Tunnel> {
  const connecting = Controller.connect({
    localHost: '127.0.0.1',
    localPort: 1,
    to: '127.0.0.1',
    controlPort: relay.port,
    timeout: 1000,
    ...options,
  });
  const control = await relay.accept();
  const hello = await serverHandshake(control, options.secret);
  expect(hello).toEqual({ type: ClientMessageType.HELLO, port: options.desiredPort ?? 0 });
  await control.send(encodeServerMessage({ type: ServerMessageType.HELLO, port: remotePort }));
  return { controller: await connecting, control };
}

/**
 * 通知客户端有新连接，并在中继一方认领客户端建立的隧道连接
 *
 * @returns 握手完成后的隧道连接（中继一方），以及握手帧之后已读入的字节
 */
export async function claimConnection(
  relay: FakeRelay,
  control: FramedConnection,
  id: string,
  secret?: string
): Promise<{ tunnel: FramedConnection; leftover: Buffer }> {
  await control.send(encodeServerMessage({ type: ServerMessageType.CONNECTION, id }));
  const tunnel = await relay.accept();
  expect(await serverHandshake(tunnel, secret)).toEqual({ type: ClientMessageType.ACCEPT, id });
  return { tunnel, leftover: tunnel.drainBuffered() };
}
