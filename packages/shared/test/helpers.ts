/**
 * 测试共享工具函数
 */

import { createServer, connect, Socket, Server } from 'net';

/**
 * 一对已连接的 TCP socket
 */
export interface SocketPair {
  /** 主动连接的一端 */
  client: Socket;
  /** 服务端 accept 得到的一端 */
  peer: Socket;
}

/**
 * 监听 127.0.0.1 的随机端口
 */
export async function listen(server: Server): Promise<number> {
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      server.off('error', reject);
      resolve();
    });
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('无法获取监听地址');
  }
  return address.port;
}

/**
 * 获取一个当前没有被监听的端口
 */
export async function getClosedPort(): Promise<number> {
  const server = createServer();
  const port = await listen(server);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

/**
 * 通过本地回环建立一对 socket
 */
export async function createSocketPair(): Promise<SocketPair> {
  const server = createServer();
  const port = await listen(server);

  const accepted = new Promise<Socket>((resolve) => server.once('connection', resolve));
  const client = connect(port, '127.0.0.1');
  await new Promise<void>((resolve, reject) => {
    client.once('connect', resolve);
    client.once('error', reject);
  });
  const peer = await accepted;
  server.close();
  return { client, peer };
}

/**
 * 销毁一组 socket
 */
export function destroyAll(...sockets: Socket[]): void {
  for (const socket of sockets) {
    socket.destroy();
  }
}

/**
 * 等待 socket 关闭
 */
export function waitForClose(socket: Socket): Promise<void> {
  if (socket.closed) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve) => socket.once('close', () => resolve()));
}

/**
 * 收集 socket 上收到的所有字节
 *
 * 构造时会恢复 socket 的流动状态，包括此前被显式暂停的 socket。
 */
export class ByteCollector {
  private data: Buffer = Buffer.alloc(0);
  private waiters: Array<() => void> = [];

  constructor(socket: Socket) {
    socket.on('data', (chunk: Buffer) => {
      this.data = Buffer.concat([this.data, chunk]);
      for (const wake of this.waiters) {
        wake();
      }
    });
    socket.resume();
  }

  /** 已收到的字节（UTF-8 字符串） */
  get text(): string {
    return this.data.toString('utf-8');
  }

  /** 已收到的字节 */
  get bytes(): Buffer {
    return this.data;
  }

  /**
   * 等待收到至少 `length` 个字节
   */
  waitFor(length: number, timeout = 2000): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      const check = (): boolean => {
        if (this.data.length < length) {
          return false;
        }
        clearTimeout(timer);
        this.waiters = this.waiters.filter((w) => w !== wake);
        resolve(this.data);
        return true;
      };
      const wake = (): void => {
        check();
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== wake);
        reject(new Error(`等待 ${length} 字节超时，已收到 ${this.data.length} 字节`));
      }, timeout);
      if (!check()) {
        this.waiters.push(wake);
      }
    });
  }
}
