// src/state_io/index.ts

export { stableStringify } from "./stable_stringify";
export { atomicWriteFileSync, atomicWriteJsonSync } from "./atomic_write";
export type { FsyncMode } from "./atomic_write";
export { acquireMonitorLock, releaseMonitorLock } from "./lock";
export type { LockHandle } from "./lock";
export { errnoCode } from "./errno";
