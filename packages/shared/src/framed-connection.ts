/**
 * @module framed-connection
 *
 * 以 0 字节分隔的 JSON 帧连接。
 *
 * 控制连接和代理隧道连接在握手阶段都使用这种帧格式：
 * 每条消息是一个 UTF-8 JSON 值，后跟一个 `0x00` 结束符，单帧不超过 256 字节。
 * 握手结束后，代理隧道通过 {@link FramedConnection.drainBuffered} 取回已读入但未消费的字节，
 * 然后把 socket 交给原始字节转发。
 */

import { Socket } from 'net';
import { ErrorCode, PROTOCOL, TunnelError } from './protocol.js';
import {
  ClientMessage,
  ServerMessage,
  decodeClientMessage,
  decodeServerMessage,
} from './messages.js';

/**
 * 正在等待数据的 receive 调用
 */
interface PendingRead {
  wake: () => void;
  fail: (error: Error) => void;
}

/**
 * 距离截止时间的剩余毫秒数，`null` 表示没有截止时间
 */
function remaining(deadline: number | null): number | null {
  return deadline === null ? null : deadline - Date.now();
}

/**
 * 帧连接
 *
 * 读取是拉取式的：只有在 {@link receive} 等待数据时 socket 才处于流动状态，
 * 因此已缓冲但未消费的数据最多是一个网络数据块。
 *
 * 截止时间是一个绝对时刻，期间到达的字节不会推迟它。
 * `receive(true)` 开始时设为当前时间加超时，`receive(false)` 和 {@link clearDeadline} 会清除它；
 * `send` 的每次写入各自以当前时间加超时为界。
 * 本地调用 {@link close} 之后，读取一律视为正常结束。
 */
export class FramedConnection {
  private buffer: Buffer = Buffer.alloc(0);
  private ended = false;
  private failure: Error | null = null;
  private pending: PendingRead | null = null;
  private detached = false;
  private closed: Promise<void> | null = null;
  private deadline: number | null = null;

  /**
   * @param socket - 已连接的 socket
   * @param timeout - 读写截止时间，单位毫秒
   */
  constructor(
    private readonly socket: Socket,
    private readonly timeout: number = PROTOCOL.NETWORK_TIMEOUT
  ) {
    socket.on('data', this.onData);
    socket.on('end', this.onEnd);
    socket.on('close', this.onEnd);
    socket.on('error', this.onError);
    socket.pause();
  }

  /**
   * 获取底层 socket
   */
  getSocket(): Socket {
    return this.socket;
  }

  /**
   * 发送一个 JSON 值
   *
   * @throws {TunnelError} 编码超过最大帧长度时为 `FRAME_TOO_LARGE`（此时不写入任何字节），
   * 写入失败或超时为 `IO_ERROR`
   */
  async send(value: unknown): Promise<void> {
    const payload = Buffer.from(JSON.stringify(value), 'utf-8');
    if (payload.length > PROTOCOL.MAX_FRAME_LENGTH) {
      throw new TunnelError(ErrorCode.FRAME_TOO_LARGE, `帧过大: ${payload.length} 字节`);
    }
    if (this.socket.destroyed || !this.socket.writable) {
      throw new TunnelError(ErrorCode.IO_ERROR, '写入失败: 连接已关闭');
    }

    const frame = Buffer.concat([payload, Buffer.from([PROTOCOL.FRAME_DELIMITER])]);

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new TunnelError(ErrorCode.IO_ERROR, '写入超时'));
      }, this.timeout);
      this.socket.write(frame, (error) => {
        clearTimeout(timer);
        if (error) {
          reject(new TunnelError(ErrorCode.IO_ERROR, `写入失败: ${error.message}`, error));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * 读取下一帧
   *
   * @param applyTimeout - 为 true 时应用读截止时间（握手和初始响应），
   * 为 false 时清除截止时间（长期监听，可以无限期阻塞）
   * @returns 帧内容（不含结束符）；对端在未发送任何字节时正常关闭，或本地已调用 {@link close}，返回 `null`
   * @throws {TunnelError} `TIMED_OUT`、`EMPTY_FRAME`、`FRAME_TOO_LARGE`、`TRUNCATED_FRAME` 或 `IO_ERROR`
   */
  async receive(applyTimeout: boolean): Promise<Buffer | null> {
    if (this.detached) {
      throw new TunnelError(ErrorCode.IO_ERROR, '读取失败: 连接已转交给原始转发');
    }
    this.deadline = applyTimeout ? Date.now() + this.timeout : null;

    for (;;) {
      if (this.closed) {
        return null;
      }
      const frame = this.takeFrame();
      if (frame) {
        return frame;
      }
      if (this.failure) {
        throw new TunnelError(ErrorCode.IO_ERROR, `读取失败: ${this.failure.message}`, this.failure);
      }
      if (this.ended) {
        if (this.buffer.length === 0) {
          return null;
        }
        throw new TunnelError(ErrorCode.TRUNCATED_FRAME, `连接在帧中途结束（已收到 ${this.buffer.length} 字节）`);
      }
      await this.waitForData();
    }
  }

  /**
   * 读取并解码下一条服务端消息
   */
  async receiveServerMessage(applyTimeout: boolean): Promise<ServerMessage | null> {
    const frame = await this.receive(applyTimeout);
    return frame ? decodeServerMessage(frame) : null;
  }

  /**
   * 读取并解码下一条客户端消息
   */
  async receiveClientMessage(applyTimeout: boolean): Promise<ClientMessage | null> {
    const frame = await this.receive(applyTimeout);
    return frame ? decodeClientMessage(frame) : null;
  }

  /**
   * 清除读写截止时间
   */
  clearDeadline(): void {
    this.deadline = null;
  }

  /**
   * 取出已读入但尚未作为帧消费的字节，并停止在此 socket 上读取帧
   *
   * 中继可能在握手帧之后立即开始发送隧道数据，这些字节必须原样交给本地服务。
   * socket 本身不会被关闭，保持暂停状态，由调用方接管。
   */
  drainBuffered(): Buffer {
    this.detached = true;
    this.socket.off('data', this.onData);
    this.socket.off('end', this.onEnd);

    const buffered = this.buffer;
    this.buffer = Buffer.alloc(0);
    return buffered;
  }

  /**
   * 关闭底层 socket
   *
   * @returns socket 完全关闭后 resolve
   */
  close(): Promise<void> {
    if (!this.closed) {
      this.closed = new Promise<void>((resolve) => {
        if (this.socket.closed) {
          resolve();
          return;
        }
        this.socket.once('close', () => resolve());
        this.socket.destroy();
      });
    }
    return this.closed;
  }

  /**
   * 从缓冲区切出第一帧
   *
   * 缓冲区里超过最大帧长度仍没有结束符时立即报错，不必等到结束符到达。
   */
  private takeFrame(): Buffer | null {
    const end = this.buffer.indexOf(PROTOCOL.FRAME_DELIMITER);
    if (end === -1) {
      if (this.buffer.length > PROTOCOL.MAX_FRAME_LENGTH) {
        throw new TunnelError(ErrorCode.FRAME_TOO_LARGE, `帧过大: 超过 ${PROTOCOL.MAX_FRAME_LENGTH} 字节`);
      }
      return null;
    }
    if (end === 0) {
      throw new TunnelError(ErrorCode.EMPTY_FRAME, '收到空帧');
    }
    if (end > PROTOCOL.MAX_FRAME_LENGTH) {
      throw new TunnelError(ErrorCode.FRAME_TOO_LARGE, `帧过大: ${end} 字节`);
    }

    const frame = Buffer.from(this.buffer.subarray(0, end));
    this.buffer = this.buffer.subarray(end + 1);
    return frame;
  }

  private waitForData(): Promise<void> {
    const left = remaining(this.deadline);
    if (left !== null && left <= 0) {
      return Promise.reject(new TunnelError(ErrorCode.TIMED_OUT, '等待消息超时'));
    }

    return new Promise<void>((resolve, reject) => {
      const timer =
        left === null
          ? null
          : setTimeout(() => {
              this.pending?.fail(new TunnelError(ErrorCode.TIMED_OUT, '等待消息超时'));
            }, left);
      const settle = (): void => {
        this.pending = null;
        if (timer) {
          clearTimeout(timer);
        }
      };
      this.pending = {
        wake: () => {
          settle();
          resolve();
        },
        fail: (error) => {
          settle();
          this.socket.pause();
          reject(error);
        },
      };
      this.socket.resume();
    });
  }

  private readonly onData = (chunk: Buffer): void => {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    this.socket.pause();
    this.pending?.wake();
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    this.pending?.wake();
  };

  private readonly onError = (error: Error): void => {
    this.failure = error;
    this.pending?.wake();
  };
}
