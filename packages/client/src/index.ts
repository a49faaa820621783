/**
 * @module @suidao/client
 *
 * 隧道客户端入口模块。
 *
 * 作为库使用时，通过 {@link Controller.connect} 建立隧道，再调用 `listen` 处理连接：
 *
 * @example
 * ```typescript
 * const controller = await Controller.connect({ localHost: 'localhost', localPort: 8000, to: 'relay.example.com' });
 * console.log(controller.getRemotePort());
 * await controller.listen(abortController.signal);
 * ```
 */

export { Controller } from './controller.js';
export type { ControllerOptions } from './controller.js';
export { ProxySession } from './proxy-session.js';
export type { TunnelSettings } from './proxy-session.js';
export { relay } from './relay.js';
export { Config, SECRET_ENV, getDefaultConfigPath } from './config.js';
export type { ClientConfig, ConfigOverrides } from './config.js';
