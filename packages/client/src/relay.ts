/**
 * @module relay
 *
 * 双向字节转发。
 */

import { Socket } from 'net';
import { pipeline } from 'stream/promises';

/** 由于另一方向先结束、socket 被强制关闭而产生的错误码 */
const PREMATURE_CLOSE = 'ERR_STREAM_PREMATURE_CLOSE';

function isPrematureClose(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === PREMATURE_CLOSE;
}

/**
 * 在两个 socket 之间双向转发字节，任一方向结束或出错即终止。
 *
 * 第一个方向结束后立即销毁两个 socket，另一方向随之结束。连接正常结束不算错误。
 *
 * @returns 两个方向都结束后 resolve
 * @throws 先结束的方向的错误；后结束的方向只有在错误不是强制关闭引起时才会抛出
 */
export async function relay(a: Socket, b: Socket): Promise<void> {
  const directions = [pipeline(a, b), pipeline(b, a)].map((task, index) =>
    task.then(
      () => ({ index, error: null }),
      (error: unknown) => ({ index, error })
    )
  );

  const first = await Promise.race(directions);
  a.destroy();
  b.destroy();
  const second = await directions[1 - first.index];

  if (first.error !== null) {
    throw first.error;
  }
  if (second.error !== null && !isPrematureClose(second.error)) {
    throw second.error;
  }
}
