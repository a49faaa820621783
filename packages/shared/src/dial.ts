/**
 * @module dial
 *
 * 带超时的 TCP 连接工具。
 */

import { Socket, connect } from 'net';
import { ErrorCode, PROTOCOL, TunnelError } from './protocol.js';

/**
 * 连接到指定地址，超时未连上则销毁 socket 并报错
 *
 * 连接成功后不再保留任何 `error` 监听器，调用方需要在同一个同步流程中接管 socket。
 *
 * @param host - 目标主机
 * @param port - 目标端口
 * @param timeout - 连接超时，单位毫秒
 * @throws {TunnelError} 超时为 `TIMED_OUT`，其他连接失败为 `CONNECT_FAILED`
 */
export function dial(host: string, port: number, timeout: number = PROTOCOL.NETWORK_TIMEOUT): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    const address = `${host}:${port}`;
    const socket = connect({ host, port });

    const timer = setTimeout(() => {
      socket.off('connect', onConnect);
      socket.destroy();
      reject(new TunnelError(ErrorCode.TIMED_OUT, `连接 ${address} 超时`));
    }, timeout);

    const onConnect = (): void => {
      clearTimeout(timer);
      socket.off('error', onError);
      resolve(socket);
    };

    const onError = (error: Error): void => {
      clearTimeout(timer);
      reject(new TunnelError(ErrorCode.CONNECT_FAILED, `连接 ${address} 失败: ${error.message}`, error));
    };

    socket.once('connect', onConnect);
    socket.once('error', onError);
  });
}
