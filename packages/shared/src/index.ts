export { PropscanError } from './errors/propscan-error';
export { ConcurrentPool } from './utils/concurrent-pool';
export { isPlainObject } from './utils/is-plain-object';
export { Semaphore } from './utils/semaphore';
export { sleep } from './utils/sleep';
export {
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
