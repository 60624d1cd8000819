/**
 * @tunnelkeeper/host
 *
 * Config store, tunnel drivers, forwarding compiler, reconciler, forward
 * daemon and supervisor hooks.
 */

export * from "./config/index.js";
export * from "./lib/command.js";
export { acquireLock, isLocked, type LockOptions, type LockResult } from "./lib/lock.js";
export { writeFileAtomic } from "./lib/fs.js";
export { WorkerPool } from "./lib/pool.js";
export * from "./services/store/index.js";
export * from "./services/tunnel/index.js";
export * from "./services/forwarding/index.js";
export * from "./services/reconciler/index.js";
export * from "./services/daemon/index.js";
export * from "./services/supervisor/index.js";
export * from "./services/prereqs/index.js";
export * from "./runtime.js";
